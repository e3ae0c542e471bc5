import assert from 'node:assert/strict';
import { ContractSide, MarketQuestion, OddsObservation } from '../src/types';
import { MatchResult } from '../src/matching/types';

export const HOUSE_QUESTION = 'Will the Republicans control the US House after the 2024 election?';
export const CLOSING = Date.UTC(2024, 10, 5);
export const MINUTE = 60 * 1000;

export function market(overrides: Partial<MarketQuestion> = {}): MarketQuestion {
  return {
    id: 'pm-house',
    venue: 'polymarket',
    question: HOUSE_QUESTION,
    outcomePrices: { Yes: 0.55, No: 0.45 },
    closingTime: CLOSING,
    volume: 250000,
    liquidity: 50000,
    ...overrides,
  };
}

export function contract(overrides: Partial<ContractSide> = {}): ContractSide {
  return { name: 'Republican', side: 'YES', venue: 'predictit', ...overrides };
}

export function matchResult(
  question: Partial<MarketQuestion>,
  finalConfidence: number,
  side: ContractSide = contract()
): MatchResult {
  return {
    contract: side,
    matchedQuestion: market(question),
    strategyId: 'original_pattern',
    similarity: 1,
    finalConfidence,
  };
}

export function observations(eventId: string, points: Array<[number, number]>): OddsObservation[] {
  const start = Date.UTC(2024, 0, 1);
  return points.map(([minutes, probability]) => ({
    eventId,
    timestamp: start + minutes * MINUTE,
    probability,
  }));
}

export function assertClose(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < epsilon, `expected ${actual} to be within ${epsilon} of ${expected}`);
}
