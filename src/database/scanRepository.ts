/**
 * Scan Repository
 * Persists scan snapshots and odds progression statistics
 */

import { Database, Queryable } from './client';
import { ArbitrageOpportunity, ScanSnapshot } from '../arbitrage/types';
import { OddsAnalysisReport } from '../odds/types';

export interface ScanRunSummary {
  id: number;
  scannedAt: number;
  venues: string[];
  opportunityCount: number;
  actionableCount: number;
  flaggedMarketCount: number;
}

interface ScanRunRow {
  id: number;
  scanned_at: Date;
  venues: string[];
  opportunity_count: number;
  actionable_count: number;
  flagged_market_count: number;
}

// NUMERIC columns take null for an unpriced value
function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

export class ScanRepository {
  constructor(private readonly db: Database) {}

  /**
   * Store one scan with its match results and opportunities; returns the scan id
   */
  async saveScan(snapshot: ScanSnapshot): Promise<number> {
    const actionableCount = snapshot.opportunities.filter(opp => opp.classification !== 'rejected').length;

    return this.db.transaction(async (client) => {
      const result = await client.query<{ id: number }>(
        `INSERT INTO scan_runs (scanned_at, venues, opportunity_count, actionable_count, flagged_market_count)
         VALUES (to_timestamp($1 / 1000.0), $2, $3, $4, $5)
         RETURNING id`,
        [
          snapshot.scannedAt,
          snapshot.venues,
          snapshot.opportunities.length,
          actionableCount,
          snapshot.flaggedMarkets.length,
        ]
      );
      const scanId = result.rows[0]?.id;
      if (scanId === undefined) {
        throw new Error('scan_runs insert returned no id');
      }

      for (const venue of snapshot.venues) {
        const report = snapshot.matchReports[venue];
        if (!report) continue;

        for (const match of report.results) {
          await client.query(
            `INSERT INTO match_results (
              scan_id, venue, contract_name, contract_side, market_id, question,
              strategy_id, similarity, final_confidence, matched
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, true)`,
            [
              scanId,
              venue,
              match.contract.name,
              match.contract.side,
              match.matchedQuestion.id,
              match.matchedQuestion.question,
              match.strategyId,
              match.similarity,
              match.finalConfidence,
            ]
          );
        }

        for (const contract of report.noMatch) {
          await client.query(
            `INSERT INTO match_results (scan_id, venue, contract_name, contract_side, matched)
             VALUES ($1, $2, $3, $4, false)`,
            [scanId, venue, contract.name, contract.side]
          );
        }
      }

      for (const opp of snapshot.opportunities) {
        await this.insertOpportunity(client, scanId, opp);
      }

      return scanId;
    });
  }

  private async insertOpportunity(client: Queryable, scanId: number, opp: ArbitrageOpportunity): Promise<void> {
    await client.query(
      `INSERT INTO arbitrage_opportunities (
        scan_id, contract_name, contract_side, venue_a, market_a_id, price_a,
        venue_b, market_b_id, price_b, combined_cost, edge, classification,
        match_confidence, recommended_size, reasons, metadata
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)`,
      [
        scanId,
        opp.legA.contract.name,
        opp.legA.contract.side,
        opp.legA.venue,
        opp.legA.marketId,
        finiteOrNull(opp.legA.price),
        opp.legB.venue,
        opp.legB.marketId,
        finiteOrNull(opp.legB.price),
        finiteOrNull(opp.combinedCost),
        finiteOrNull(opp.edge),
        opp.classification,
        opp.matchConfidence,
        opp.recommendedSize,
        opp.reasons,
        JSON.stringify({ fees: opp.fees, slippage: opp.slippage, resolutionAligned: opp.resolutionAligned }),
      ]
    );
  }

  /**
   * Store one row per threshold triple; returns the number of rows written
   */
  async saveProgressionStats(report: OddsAnalysisReport, analyzedAt: number = Date.now()): Promise<number> {
    let written = 0;
    for (const stat of report.stats) {
      await this.db.query(
        `INSERT INTO progression_stats (
          analyzed_at, from_threshold, to_threshold, direction,
          events_reaching_from, events_also_reaching_to, rate,
          event_ids_reaching_from, event_ids_reaching_to,
          sequences_reaching_from, sequences_also_reaching_to
        ) VALUES (to_timestamp($1 / 1000.0), $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
        [
          analyzedAt,
          stat.fromThreshold,
          stat.toThreshold,
          stat.direction,
          stat.eventsReachingFrom,
          stat.eventsAlsoReachingTo,
          stat.rateDefined ? stat.rate : null,
          stat.eventIdsReachingFrom,
          stat.eventIdsReachingTo,
          stat.sequencesReachingFrom,
          stat.sequencesAlsoReachingTo,
        ]
      );
      written++;
    }
    return written;
  }

  async getRecentScans(limit: number = 20): Promise<ScanRunSummary[]> {
    const result = await this.db.query<ScanRunRow>(
      `SELECT id, scanned_at, venues, opportunity_count, actionable_count, flagged_market_count
       FROM scan_runs
       ORDER BY scanned_at DESC
       LIMIT $1`,
      [limit]
    );

    return result.rows.map(row => ({
      id: row.id,
      scannedAt: new Date(row.scanned_at).getTime(),
      venues: row.venues,
      opportunityCount: row.opportunity_count,
      actionableCount: row.actionable_count,
      flaggedMarketCount: row.flagged_market_count,
    }));
  }
}
