/**
 * Arbitrage Types
 * Opportunities produced by pairing matched contracts across venues
 */

import { ContractSide, MarketIssue, VenueId } from '../types';
import { MatchReport } from '../matching/types';

export type ArbitrageClassification = 'pure_arb' | 'stat_arb' | 'rejected';

export interface ArbitrageLeg {
  contract: ContractSide;
  venue: VenueId;
  marketId: string;
  question: string;
  // Price of the contract's side on this venue; NaN when it could not be read
  price: number;
  confidence: number;
  liquidity: number;
  closingTime: number | null;
}

/**
 * Immutable result of evaluating one leg pair in one scan
 */
export interface ArbitrageOpportunity {
  legA: ArbitrageLeg;
  legB: ArbitrageLeg;
  combinedCost: number;
  edge: number;
  classification: ArbitrageClassification;
  // Lower of the two legs' match confidences
  matchConfidence: number;
  fees: { legA: number; legB: number };
  slippage: number;
  resolutionAligned: boolean;
  recommendedSize: number;
  reasons: string[];
}

export interface ArbitrageOptions {
  minEdgeThreshold: number;
  highConfidenceCutoff: number;
  resolutionToleranceMs: number;
  venueFees: Record<VenueId, number>;
  defaultVenueFee: number;
  bankrollCap: number;
  depthFraction: number;
}

/**
 * What the calculator reads; fees are looked up by the scanner and passed in
 */
export type PricingOptions = Omit<ArbitrageOptions, 'venueFees' | 'defaultVenueFee'>;

export const DEFAULT_ARBITRAGE_OPTIONS: ArbitrageOptions = {
  minEdgeThreshold: 0.02,
  highConfidenceCutoff: 0.9,
  resolutionToleranceMs: 7 * 24 * 60 * 60 * 1000,
  venueFees: { polymarket: 0.01, predictit: 0.02 },
  defaultVenueFee: 0.02,
  bankrollCap: 10000,
  depthFraction: 0.1,
};

/**
 * Everything one scan cycle produced
 */
export interface ScanSnapshot {
  scannedAt: number;
  venues: VenueId[];
  matchReports: Record<VenueId, MatchReport>;
  // Ranked by edge, highest first
  opportunities: ArbitrageOpportunity[];
  flaggedMarkets: MarketIssue[];
}
