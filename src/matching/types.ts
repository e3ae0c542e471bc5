/**
 * Matching Types
 * Candidates, strategy ids and match results for contract-to-market matching
 */

import { ContractSide, MarketIssue, MarketQuestion } from '../types';

/**
 * Closed set of query strategies, listed in fixed priority order
 */
export const STRATEGY_IDS = [
  'original_pattern',
  'direct_name',
  'constructed_win',
  'domain_pattern_1',
  'domain_pattern_2',
  'domain_pattern_3',
  'domain_pattern_4',
  'fuzzy_reconstruction',
  'simple_fallback',
  'similarity_bridge',
] as const;

export type StrategyId = typeof STRATEGY_IDS[number];

export interface QueryCandidate {
  readonly text: string;
  readonly strategyId: StrategyId;
  readonly priorConfidence: number;
}

/**
 * Text a strategy reasons about: a pool market's question or the
 * contract's own market title
 */
export interface StrategyContext {
  text: string;
  tokens: Set<string>;
  keyTerms: string[];
}

export interface ScoredCandidate {
  market: MarketQuestion | null;
  similarity: number;
}

export interface MatchResult {
  contract: ContractSide;
  matchedQuestion: MarketQuestion;
  strategyId: StrategyId;
  similarity: number;
  finalConfidence: number;
}

export interface MatchReport {
  results: MatchResult[];
  // Contracts whose best candidate did not clear the threshold
  noMatch: ContractSide[];
  flaggedMarkets: MarketIssue[];
}

export interface MatchingOptions {
  minConfidenceThreshold: number;
  priorWeight: number;
  similarityWeight: number;
  priceSumTolerance: number;
  markerWords: string[];
  domainSuffix: string;
  bridgeSimilarityCutoff: number;
}

export const DEFAULT_MATCHING_OPTIONS: MatchingOptions = {
  minConfidenceThreshold: 0.6,
  priorWeight: 0.5,
  similarityWeight: 0.5,
  priceSumTolerance: 0.01,
  markerWords: ['win', 'control', 'be elected', 'become', 'lead'],
  domainSuffix: 'election',
  bridgeSimilarityCutoff: 0.3,
};
