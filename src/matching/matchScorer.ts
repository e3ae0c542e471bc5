/**
 * Match Scorer
 * Scores a query candidate against a pool of market questions.
 *
 * finalConfidence = clamp(prior * priorWeight + similarity * similarityWeight, 0, 1)
 */

import { MarketQuestion } from '../types';
import { DEFAULT_MATCHING_OPTIONS, MatchingOptions, QueryCandidate, ScoredCandidate } from './types';
import { TextNormalizer, textNormalizer } from './textNormalizer';
import { jaccardSimilarity } from './similarity';

export type ScoringWeights = Pick<MatchingOptions, 'priorWeight' | 'similarityWeight'>;

export class MatchScorer {
  private readonly weights: ScoringWeights;
  // Token sets depend only on the question text, so they are kept per market object
  private tokenCache = new WeakMap<MarketQuestion, Set<string>>();

  constructor(
    weights?: Partial<ScoringWeights>,
    private readonly normalizer: TextNormalizer = textNormalizer
  ) {
    this.weights = {
      priorWeight: weights?.priorWeight ?? DEFAULT_MATCHING_OPTIONS.priorWeight,
      similarityWeight: weights?.similarityWeight ?? DEFAULT_MATCHING_OPTIONS.similarityWeight,
    };
  }

  /**
   * Best market for a candidate; the first market wins on equal similarity
   */
  score(candidate: QueryCandidate, marketPool: readonly MarketQuestion[]): ScoredCandidate {
    const candidateTokens = this.normalizer.normalize(candidate.text);
    let best: MarketQuestion | null = null;
    let bestSimilarity = 0;

    for (const market of marketPool) {
      const similarity = jaccardSimilarity(candidateTokens, this.questionTokens(market));
      if (best === null || similarity > bestSimilarity) {
        best = market;
        bestSimilarity = similarity;
      }
    }

    return { market: best, similarity: bestSimilarity };
  }

  finalConfidence(priorConfidence: number, similarity: number): number {
    const raw = priorConfidence * this.weights.priorWeight + similarity * this.weights.similarityWeight;
    return Math.max(0, Math.min(1, raw));
  }

  private questionTokens(market: MarketQuestion): Set<string> {
    let tokens = this.tokenCache.get(market);
    if (!tokens) {
      tokens = this.normalizer.normalize(market.question);
      this.tokenCache.set(market, tokens);
    }
    return tokens;
  }
}
