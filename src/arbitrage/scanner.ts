/**
 * Arbitrage Scanner
 * One scan cycle: match the contract list against every venue's snapshot,
 * pair each contract's legs across venues and rank the priced opportunities.
 */

import { ContractSide, MarketQuestion, VenueId, contractKey } from '../types';
import { MatchingOptions, MatchResult } from '../matching/types';
import { MatchingEngine } from '../matching/matchingEngine';
import { MissingInputError } from '../errors';
import { ArbitrageCalculator } from './arbitrageCalculator';
import { SlippageModel, slippageModel } from './slippageModel';
import {
  ArbitrageOpportunity,
  ArbitrageOptions,
  DEFAULT_ARBITRAGE_OPTIONS,
  ScanSnapshot,
} from './types';

export interface ScannerOptions {
  matching?: Partial<MatchingOptions>;
  arbitrage?: Partial<ArbitrageOptions>;
}

export class ArbitrageScanner {
  private readonly engine: MatchingEngine;
  private readonly calculator: ArbitrageCalculator;
  private readonly venueFees: Record<VenueId, number>;
  private readonly defaultVenueFee: number;

  constructor(options: ScannerOptions = {}, private readonly slippage: SlippageModel = slippageModel) {
    const arbitrage: Partial<ArbitrageOptions> = options.arbitrage ?? {};
    const { venueFees, defaultVenueFee, ...pricing } = arbitrage;
    this.engine = new MatchingEngine(options.matching);
    this.calculator = new ArbitrageCalculator(pricing);
    this.venueFees = venueFees ?? DEFAULT_ARBITRAGE_OPTIONS.venueFees;
    this.defaultVenueFee = defaultVenueFee ?? DEFAULT_ARBITRAGE_OPTIONS.defaultVenueFee;
  }

  scan(
    contracts: readonly ContractSide[],
    snapshots: Record<VenueId, readonly MarketQuestion[]>,
    scannedAt: number = Date.now()
  ): ScanSnapshot {
    const venues = Object.keys(snapshots);
    if (venues.length === 0) {
      throw new MissingInputError('No market snapshot supplied for any venue');
    }
    if (contracts.length === 0) {
      throw new MissingInputError('Contract list is empty');
    }

    const matchReports: ScanSnapshot['matchReports'] = {};
    const legsByContract = new Map<string, Map<VenueId, MatchResult>>();

    for (const venue of venues) {
      const report = this.engine.run(contracts, snapshots[venue]);
      matchReports[venue] = report;

      for (const result of report.results) {
        const key = contractKey(result.contract);
        const legs = legsByContract.get(key) ?? new Map<VenueId, MatchResult>();
        // Same contract listed twice keeps its first match per venue
        if (!legs.has(venue)) legs.set(venue, result);
        legsByContract.set(key, legs);
      }
    }

    const opportunities: ArbitrageOpportunity[] = [];
    for (const legs of legsByContract.values()) {
      for (const [venueA, legA] of legs) {
        for (const [venueB, legB] of legs) {
          if (venueA === venueB) continue;
          opportunities.push(this.price(legA, legB));
        }
      }
    }

    return {
      scannedAt,
      venues,
      matchReports,
      opportunities: rankOpportunities(opportunities),
      flaggedMarkets: venues.flatMap(venue => matchReports[venue].flaggedMarkets),
    };
  }

  feeFor(venue: VenueId): number {
    return this.venueFees[venue] ?? this.defaultVenueFee;
  }

  private price(legA: MatchResult, legB: MatchResult): ArbitrageOpportunity {
    const slippage = this.slippage.estimatePair(legA.matchedQuestion.liquidity, legB.matchedQuestion.liquidity);
    return this.calculator.evaluate(
      legA,
      legB,
      this.feeFor(legA.matchedQuestion.venue),
      this.feeFor(legB.matchedQuestion.venue),
      slippage
    );
  }
}

/**
 * Highest edge first; unpriced opportunities last
 */
export function rankOpportunities(opportunities: ArbitrageOpportunity[]): ArbitrageOpportunity[] {
  const score = (opp: ArbitrageOpportunity) => (Number.isNaN(opp.edge) ? -Infinity : opp.edge);
  return [...opportunities].sort((a, b) => score(b) - score(a));
}

export function actionable(snapshot: ScanSnapshot): ArbitrageOpportunity[] {
  return snapshot.opportunities.filter(opp => opp.classification !== 'rejected');
}
