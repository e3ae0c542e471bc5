/**
 * Arbitrage Calculator
 * Prices a cross-venue hedge: buy leg A's side on venue A and the
 * complementary side of leg B on venue B.
 *
 *   combinedCost = priceA + (1 - priceB) + feeA + feeB + slippage
 *   edge         = 1 - combinedCost
 *
 * Negative edges are reported as they are; nothing is clamped.
 */

import Decimal from 'decimal.js';
import { MatchResult } from '../matching/types';
import {
  ArbitrageClassification,
  ArbitrageLeg,
  ArbitrageOpportunity,
  DEFAULT_ARBITRAGE_OPTIONS,
  PricingOptions,
} from './types';

export class ArbitrageCalculator {
  private readonly options: PricingOptions;

  constructor(options?: Partial<PricingOptions>) {
    this.options = {
      minEdgeThreshold: options?.minEdgeThreshold ?? DEFAULT_ARBITRAGE_OPTIONS.minEdgeThreshold,
      highConfidenceCutoff: options?.highConfidenceCutoff ?? DEFAULT_ARBITRAGE_OPTIONS.highConfidenceCutoff,
      resolutionToleranceMs: options?.resolutionToleranceMs ?? DEFAULT_ARBITRAGE_OPTIONS.resolutionToleranceMs,
      bankrollCap: options?.bankrollCap ?? DEFAULT_ARBITRAGE_OPTIONS.bankrollCap,
      depthFraction: options?.depthFraction ?? DEFAULT_ARBITRAGE_OPTIONS.depthFraction,
    };
  }

  evaluate(
    legA: MatchResult,
    legB: MatchResult,
    feeA: number,
    feeB: number,
    slippage: number
  ): ArbitrageOpportunity {
    const a = toLeg(legA);
    const b = toLeg(legB);
    const reasons: string[] = [];

    if (Number.isNaN(a.price)) reasons.push(`no ${a.contract.side} price on ${a.venue} market ${a.marketId}`);
    if (Number.isNaN(b.price)) reasons.push(`no ${b.contract.side} price on ${b.venue} market ${b.marketId}`);

    const matchConfidence = Math.min(a.confidence, b.confidence);
    const confident = matchConfidence >= this.options.highConfidenceCutoff;
    if (!confident) {
      reasons.push(`match confidence ${matchConfidence.toFixed(2)} below ${this.options.highConfidenceCutoff}`);
    }

    const resolutionAligned = this.resolutionAligned(a.closingTime, b.closingTime);
    if (!resolutionAligned) {
      reasons.push('resolution windows do not overlap');
    }

    const recommendedSize = this.recommendedSize(a.liquidity, b.liquidity);
    const base = {
      legA: a,
      legB: b,
      matchConfidence,
      fees: { legA: feeA, legB: feeB },
      slippage,
      resolutionAligned,
      recommendedSize,
    };

    if (Number.isNaN(a.price) || Number.isNaN(b.price)) {
      return { ...base, combinedCost: NaN, edge: NaN, classification: 'rejected', reasons };
    }

    const combined = new Decimal(a.price)
      .plus(new Decimal(1).minus(b.price))
      .plus(feeA)
      .plus(feeB)
      .plus(slippage);
    const edge = new Decimal(1).minus(combined);

    let classification: ArbitrageClassification;
    if (edge.lt(this.options.minEdgeThreshold)) {
      reasons.unshift(`edge ${edge.toFixed(4)} below minimum ${this.options.minEdgeThreshold}`);
      classification = 'rejected';
    } else if (confident && resolutionAligned) {
      classification = 'pure_arb';
    } else {
      classification = 'stat_arb';
    }

    return {
      ...base,
      combinedCost: combined.toNumber(),
      edge: edge.toNumber(),
      classification,
      reasons,
    };
  }

  /**
   * Closing times must both be known and within the configured tolerance
   */
  resolutionAligned(closingA: number | null, closingB: number | null): boolean {
    if (closingA === null || closingB === null) {
      return false;
    }
    return Math.abs(closingA - closingB) <= this.options.resolutionToleranceMs;
  }

  /**
   * min(depth A, depth B, bankroll cap); reported, never enforced here
   */
  recommendedSize(liquidityA: number, liquidityB: number): number {
    const depth = (liquidity: number) =>
      Number.isFinite(liquidity) && liquidity > 0
        ? new Decimal(liquidity).times(this.options.depthFraction)
        : new Decimal(0);

    return Decimal.min(depth(liquidityA), depth(liquidityB), this.options.bankrollCap).toNumber();
  }
}

/**
 * Price of the matched contract's side in its question's outcome prices.
 * Labels match the side ("Yes"/"No") or the contract name; a missing side of a
 * binary market is the complement of the other side.
 */
export function sidePrice(match: MatchResult): number | null {
  const entries = Object.entries(match.matchedQuestion.outcomePrices);
  const side = match.contract.side.toLowerCase();
  const opposite = side === 'yes' ? 'no' : 'yes';
  const name = match.contract.name.trim().toLowerCase();
  const find = (label: string) => entries.find(([key]) => key.trim().toLowerCase() === label)?.[1];

  const direct = find(side);
  if (direct !== undefined) return direct;

  const complement = find(opposite);
  if (complement !== undefined && entries.length === 2) {
    return new Decimal(1).minus(complement).toNumber();
  }

  const named = find(name);
  if (named !== undefined) {
    return side === 'yes' ? named : new Decimal(1).minus(named).toNumber();
  }

  return null;
}

function toLeg(match: MatchResult): ArbitrageLeg {
  const market = match.matchedQuestion;
  return {
    contract: match.contract,
    venue: market.venue,
    marketId: market.id,
    question: market.question,
    price: sidePrice(match) ?? NaN,
    confidence: match.finalConfidence,
    liquidity: market.liquidity,
    closingTime: market.closingTime,
  };
}
