/**
 * Shared market vocabulary used by both the matching/arbitrage half
 * and the odds sequence half.
 */

export type VenueId = string;

export type OutcomeSide = 'YES' | 'NO';

/**
 * One tradable outcome of a market question on a venue
 */
export interface ContractSide {
  name: string;
  side: OutcomeSide;
  venue: VenueId;
  // Title of the market this contract belongs to on its own venue, when known
  marketTitle?: string;
}

/**
 * Canonical record of one market on one venue
 */
export interface MarketQuestion {
  id: string;
  venue: VenueId;
  question: string;
  outcomePrices: Record<string, number>;
  closingTime: number | null;
  volume: number;
  liquidity: number;
}

/**
 * A market that failed validation and was left out of scoring
 */
export interface MarketIssue {
  marketId: string;
  venue: VenueId;
  reason: string;
}

export interface OddsObservation {
  eventId: string;
  timestamp: number;
  probability: number;
}

/**
 * An observation that failed validation and was left out of segmentation
 */
export interface ObservationIssue {
  eventId: string;
  timestamp: number;
  reason: string;
}

export function contractKey(contract: ContractSide): string {
  return `${contract.name.trim().toLowerCase()}|${contract.side}`;
}
