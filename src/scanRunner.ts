/**
 * Scan Runner
 * Periodic cross-venue scan: load contracts and venue snapshots, match,
 * price, persist and alert.
 */

import { ScanConfig, loadScanConfig } from './config';
import { DatabaseClient } from './database/client';
import { ScanRepository } from './database/scanRepository';
import { ArbitrageScanner, actionable } from './arbitrage/scanner';
import { ArbitrageOpportunity } from './arbitrage/types';
import { ContractFileSource, SnapshotFileSource, listSnapshotVenues } from './sources/snapshotFileSource';
import { GammaMarketSource } from './sources/gammaMarketSource';
import { MarketSource } from './sources/types';
import { TelegramNotifier } from './services/telegramNotifier';
import { MarketQuestion, VenueId, contractKey } from './types';

export function opportunityKey(opp: ArbitrageOpportunity): string {
  return `${contractKey(opp.legA.contract)}|${opp.legA.venue}:${opp.legA.marketId}|${opp.legB.venue}:${opp.legB.marketId}`;
}

/**
 * Opportunities not alerted yet, recorded in `alerted` as they are returned.
 * Keys that dropped out of the current actionable set are forgotten, so an
 * opportunity that closes and later reopens alerts again.
 */
export function takeFreshOpportunities(found: ArbitrageOpportunity[], alerted: Set<string>): ArbitrageOpportunity[] {
  const current = new Set(found.map(opportunityKey));
  for (const key of alerted) {
    if (!current.has(key)) alerted.delete(key);
  }

  const fresh = found.filter(opp => !alerted.has(opportunityKey(opp)));
  for (const opp of fresh) {
    alerted.add(opportunityKey(opp));
  }
  return fresh;
}

/**
 * One snapshot file per venue; Polymarket comes from the Gamma API when no
 * snapshot file covers it
 */
export function buildMarketSources(config: ScanConfig): MarketSource[] {
  const venues = listSnapshotVenues(config.sources.snapshotDir);
  const sources: MarketSource[] = venues.map(venue => new SnapshotFileSource(venue, config.sources.snapshotDir));
  if (!venues.includes('polymarket')) {
    sources.push(new GammaMarketSource(config.sources.gammaApiUrl, config.sources.gammaMarketLimit));
  }
  return sources;
}

class ScanRunner {
  private scanner: ArbitrageScanner;
  private sources: MarketSource[];
  private contracts: ContractFileSource;
  private db: DatabaseClient;
  private repository: ScanRepository;
  private notifier: TelegramNotifier | null = null;
  private alerted = new Set<string>();
  private isRunning: boolean = false;
  private scanInterval: NodeJS.Timeout | null = null;
  private stats = {
    cyclesRun: 0,
    opportunitiesFound: 0,
    alertsSent: 0,
    startTime: Date.now(),
  };

  constructor(private readonly config: ScanConfig) {
    this.scanner = new ArbitrageScanner({ matching: config.matching, arbitrage: config.arbitrage });
    this.sources = buildMarketSources(config);
    this.contracts = new ContractFileSource(config.sources.contractsFile);
    this.db = new DatabaseClient(config.databaseUrl);
    this.repository = new ScanRepository(this.db);

    if (config.telegram.enabled) {
      this.notifier = new TelegramNotifier(config.telegram.botToken, config.telegram.chatId);
      console.log('✅ Telegram notifications enabled');
    }
  }

  async start(): Promise<void> {
    console.log('\n=== Cross-Venue Arbitrage Scanner ===');
    console.log(`Venues: ${this.sources.map(source => source.venue).join(', ')}`);
    console.log(`Min Confidence: ${this.config.matching.minConfidenceThreshold}`);
    console.log(`Min Edge: ${(this.config.arbitrage.minEdgeThreshold * 100).toFixed(2)}%`);
    console.log(`Scan Interval: ${this.config.sources.scanIntervalMs}ms`);
    console.log('');

    try {
      await this.db.initialize();
    } catch (err) {
      console.warn('⚠️  Database initialization failed, continuing in memory-only mode:', err instanceof Error ? err.message : err);
    }

    const contracts = await this.contracts.loadContracts();
    await this.notifier?.sendStartupMessage(this.sources.map(source => source.venue), contracts.length);

    this.isRunning = true;
    await this.runScanCycle();
    this.scanInterval = setInterval(() => {
      void this.runScanCycle();
    }, this.config.sources.scanIntervalMs);

    process.on('SIGINT', () => void this.stop());
    process.on('SIGTERM', () => void this.stop());

    console.log('\nScanner is running. Press Ctrl+C to stop.\n');
  }

  async stop(): Promise<void> {
    console.log('\nStopping scanner...');
    this.isRunning = false;

    if (this.scanInterval) {
      clearInterval(this.scanInterval);
    }

    this.printSummary();
    await this.db.close();
    process.exit(0);
  }

  private async fetchSnapshots(): Promise<Record<VenueId, MarketQuestion[]>> {
    const snapshots: Record<VenueId, MarketQuestion[]> = {};
    for (const source of this.sources) {
      try {
        snapshots[source.venue] = await source.fetchMarkets();
      } catch (err) {
        console.error(`❌ Failed to load ${source.venue} markets:`, err instanceof Error ? err.message : err);
      }
    }
    return snapshots;
  }

  private async runScanCycle(): Promise<void> {
    if (!this.isRunning) return;

    try {
      this.stats.cyclesRun++;

      const contracts = await this.contracts.loadContracts();
      const snapshots = await this.fetchSnapshots();
      const snapshot = this.scanner.scan(contracts, snapshots);

      const found = actionable(snapshot);
      const fresh = takeFreshOpportunities(found, this.alerted);
      this.stats.opportunitiesFound += fresh.length;

      console.log(
        `[${new Date(snapshot.scannedAt).toISOString()}] ${snapshot.opportunities.length} pairs priced, ` +
        `${found.length} actionable (${fresh.length} new), ${snapshot.flaggedMarkets.length} markets flagged`
      );
      for (const venue of snapshot.venues) {
        const report = snapshot.matchReports[venue];
        console.log(`   ${venue}: ${report.results.length} matched, ${report.noMatch.length} unmatched`);
      }

      for (const opp of fresh) {
        this.logOpportunity(opp);
      }

      if (this.db.isConfigured()) {
        try {
          const scanId = await this.repository.saveScan(snapshot);
          console.log(`✅ Scan ${scanId} saved`);
        } catch (err) {
          console.error('❌ Failed to save scan:', err instanceof Error ? err.message : err);
        }
      }

      if (this.notifier && fresh.length > 0) {
        this.stats.alertsSent += await this.notifier.sendOpportunityAlerts(fresh);
      }
    } catch (err) {
      console.error('❌ Scan cycle error:', err instanceof Error ? err.message : err);
      await this.notifier?.sendErrorNotification(err instanceof Error ? err.message : String(err));
    }
  }

  private logOpportunity(opp: ArbitrageOpportunity): void {
    const label = opp.classification === 'pure_arb' ? 'PURE ARB' : 'STAT ARB';

    console.log(`\n📊 ${label}: ${opp.legA.contract.name} (${opp.legA.contract.side})`);
    console.log(`   Edge: ${(opp.edge * 100).toFixed(2)}% | Cost: ${opp.combinedCost.toFixed(4)} | Confidence: ${opp.matchConfidence.toFixed(2)}`);
    console.log(`   ${opp.legA.venue}: ${opp.legA.question.substring(0, 60)} @ ${opp.legA.price.toFixed(3)}`);
    console.log(`   ${opp.legB.venue}: ${opp.legB.question.substring(0, 60)} @ ${opp.legB.price.toFixed(3)}`);
    console.log(`   Size: $${opp.recommendedSize.toFixed(2)}`);
  }

  private printSummary(): void {
    const runtime = (Date.now() - this.stats.startTime) / 1000 / 60;

    console.log('\n=== Session Summary ===');
    console.log(`Runtime: ${runtime.toFixed(1)} minutes`);
    console.log(`Scan Cycles: ${this.stats.cyclesRun}`);
    console.log(`Opportunities Found: ${this.stats.opportunitiesFound}`);
    console.log(`Alerts Sent: ${this.stats.alertsSent}`);
    console.log('');
  }
}

async function main(): Promise<void> {
  const runner = new ScanRunner(loadScanConfig());
  await runner.start();
}

if (require.main === module) {
  main().catch((error) => {
    console.error('❌ Fatal:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
