/**
 * Slippage Model
 * Estimates per-leg execution slippage from market liquidity, as a price fraction
 */

import Decimal from 'decimal.js';

export interface SlippageTier {
  minLiquidity: number;
  slippage: number;
}

// Highest tier first; liquidity must exceed minLiquidity
const DEFAULT_TIERS: SlippageTier[] = [
  { minLiquidity: 10000, slippage: 0.001 },
  { minLiquidity: 1000, slippage: 0.003 },
  { minLiquidity: 0, slippage: 0.01 },
];

const UNKNOWN_LIQUIDITY_SLIPPAGE = 0.005;

export class SlippageModel {
  constructor(
    private readonly tiers: SlippageTier[] = DEFAULT_TIERS,
    private readonly unknownLiquiditySlippage: number = UNKNOWN_LIQUIDITY_SLIPPAGE
  ) {}

  /**
   * Estimate slippage for one leg
   */
  estimateLeg(liquidity: number | null | undefined): number {
    if (liquidity === null || liquidity === undefined || !Number.isFinite(liquidity) || liquidity <= 0) {
      return this.unknownLiquiditySlippage;
    }

    for (const tier of this.tiers) {
      if (liquidity > tier.minLiquidity) {
        return tier.slippage;
      }
    }

    return this.tiers[this.tiers.length - 1]?.slippage ?? this.unknownLiquiditySlippage;
  }

  /**
   * Estimate slippage for a two-legged trade
   */
  estimatePair(leg1Liquidity: number | null | undefined, leg2Liquidity: number | null | undefined): number {
    return new Decimal(this.estimateLeg(leg1Liquidity))
      .plus(this.estimateLeg(leg2Liquidity))
      .toNumber();
  }
}

export const slippageModel = new SlippageModel();
