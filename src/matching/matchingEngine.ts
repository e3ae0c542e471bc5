/**
 * Matching Engine
 * Runs every query strategy for a contract, scores each candidate against the
 * market pool and keeps the single best match per contract.
 *
 * Contracts are independent of each other: two contracts may map to the same
 * market (e.g. YES and NO of one question).
 */

import { ContractSide, MarketQuestion } from '../types';
import { DEFAULT_MATCHING_OPTIONS, MatchingOptions, MatchReport, MatchResult } from './types';
import { QueryStrategyGenerator, strategyPriority } from './strategies';
import { MatchScorer } from './matchScorer';
import { partitionMarkets } from './marketValidator';
import { TextNormalizer, textNormalizer } from './textNormalizer';

export class MatchingEngine {
  private readonly options: MatchingOptions;
  private readonly generator: QueryStrategyGenerator;
  private readonly scorer: MatchScorer;

  constructor(options?: Partial<MatchingOptions>, normalizer: TextNormalizer = textNormalizer) {
    this.options = { ...DEFAULT_MATCHING_OPTIONS, ...options };
    this.generator = new QueryStrategyGenerator(this.options, normalizer);
    this.scorer = new MatchScorer(this.options, normalizer);
  }

  get minConfidenceThreshold(): number {
    return this.options.minConfidenceThreshold;
  }

  /**
   * Best match per contract, above the confidence threshold
   */
  match(contracts: readonly ContractSide[], marketPool: readonly MarketQuestion[]): MatchResult[] {
    return this.run(contracts, marketPool).results;
  }

  /**
   * Full report: matches, contracts without a match and flagged markets
   */
  run(contracts: readonly ContractSide[], marketPool: readonly MarketQuestion[]): MatchReport {
    const { valid, flagged } = partitionMarkets(marketPool, this.options.priceSumTolerance);
    const results: MatchResult[] = [];
    const noMatch: ContractSide[] = [];

    for (const contract of contracts) {
      const best = this.bestMatch(contract, valid);
      if (best && best.finalConfidence >= this.options.minConfidenceThreshold) {
        results.push(best);
      } else {
        noMatch.push(contract);
      }
    }

    return { results, noMatch, flaggedMarkets: flagged };
  }

  /**
   * Highest-confidence match for one contract, before threshold filtering
   */
  bestMatch(contract: ContractSide, marketPool: readonly MarketQuestion[]): MatchResult | null {
    if (marketPool.length === 0) {
      return null;
    }

    let best: MatchResult | null = null;

    for (const candidate of this.generator.generateCandidates(contract, marketPool)) {
      const { market, similarity } = this.scorer.score(candidate, marketPool);
      if (!market) continue;

      const finalConfidence = this.scorer.finalConfidence(candidate.priorConfidence, similarity);
      const isBetter =
        best === null ||
        finalConfidence > best.finalConfidence ||
        (finalConfidence === best.finalConfidence &&
          strategyPriority(candidate.strategyId) < strategyPriority(best.strategyId));

      if (isBetter) {
        best = {
          contract,
          matchedQuestion: market,
          strategyId: candidate.strategyId,
          similarity,
          finalConfidence,
        };
      }
    }

    return best;
  }
}
