/**
 * Market Validator
 * Flags malformed market records before they reach scoring
 */

import { MarketIssue, MarketQuestion } from '../types';

// Absorbs float noise when a sum sits exactly on the tolerance
const FLOAT_SLACK = 1e-9;

export function validateMarket(market: MarketQuestion, priceSumTolerance: number): MarketIssue[] {
  const issues: MarketIssue[] = [];
  const flag = (reason: string) => issues.push({ marketId: market.id, venue: market.venue, reason });

  if (!market.question || !market.question.trim()) {
    flag('empty question');
  }

  const entries = Object.entries(market.outcomePrices ?? {});
  if (entries.length === 0) {
    flag('no outcome prices');
    return issues;
  }

  let pricesValid = true;
  for (const [label, price] of entries) {
    if (!Number.isFinite(price) || price < 0 || price > 1) {
      flag(`price for "${label}" outside [0, 1]: ${price}`);
      pricesValid = false;
    }
  }

  if (pricesValid && entries.length === 2) {
    const sum = entries.reduce((total, [, price]) => total + price, 0);
    if (Math.abs(sum - 1) > priceSumTolerance + FLOAT_SLACK) {
      flag(`binary outcome prices sum to ${sum.toFixed(4)}`);
    }
  }

  return issues;
}

/**
 * Split a pool into scorable markets and the issues of the rest
 */
export function partitionMarkets(
  marketPool: readonly MarketQuestion[],
  priceSumTolerance: number
): { valid: MarketQuestion[]; flagged: MarketIssue[] } {
  const valid: MarketQuestion[] = [];
  const flagged: MarketIssue[] = [];

  for (const market of marketPool) {
    const issues = validateMarket(market, priceSumTolerance);
    if (issues.length === 0) {
      valid.push(market);
    } else {
      flagged.push(...issues);
    }
  }

  return { valid, flagged };
}
