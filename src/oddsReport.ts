/**
 * Odds Report
 * One-shot threshold progression analysis over the odds history directory
 */

import * as fs from 'fs';
import { loadScanConfig } from './config';
import { DatabaseClient } from './database/client';
import { ScanRepository } from './database/scanRepository';
import { MissingInputError } from './errors';
import { loadOddsHistory } from './odds/historyLoader';
import { OddsSequenceAnalyzer } from './odds/oddsSequenceAnalyzer';
import { OddsAnalysisReport } from './odds/types';

const pct = (value: number) => `${(value * 100).toFixed(2)}%`;

export function formatOddsReport(report: OddsAnalysisReport): string[] {
  const lines = [
    `Events processed: ${report.eventsProcessed}`,
    `Sequences analysed: ${report.sequenceCount}`,
    `Max gap (minutes): ${report.maxGapMs / 60000}`,
    `Observations flagged: ${report.flaggedObservations.length}`,
    '',
  ];

  for (const stat of report.stats) {
    lines.push(`Threshold path: ${pct(stat.fromThreshold)} -> ${pct(stat.toThreshold)} (${stat.direction})`);
    lines.push(`  Sequences reaching first threshold: ${stat.sequencesReachingFrom}`);
    lines.push(`  Sequences reaching full path: ${stat.sequencesAlsoReachingTo}`);
    lines.push(`  Sequence success ratio: ${pct(stat.sequenceRate)}`);
    lines.push(`  Events reaching first threshold: ${stat.eventsReachingFrom}`);
    lines.push(`  Events reaching full path: ${stat.eventsAlsoReachingTo}`);
    lines.push(`  Event success ratio: ${stat.rateDefined ? pct(stat.rate) : 'undefined'}`);
    if (stat.fromCrossings !== undefined) {
      lines.push(`  Crossings into first threshold: ${stat.fromCrossings}`);
    }
    lines.push('');
  }

  return lines;
}

async function main(): Promise<void> {
  const config = loadScanConfig();
  const dataDir = config.sources.oddsDataDir;
  if (!fs.existsSync(dataDir)) {
    throw new MissingInputError(`Data directory ${dataDir} does not exist.`);
  }

  const analyzer = new OddsSequenceAnalyzer(config.odds);
  const history = loadOddsHistory(dataDir);
  const report = analyzer.analyze(history);

  for (const line of formatOddsReport(report)) {
    console.log(line);
  }

  if (config.sources.oddsOutputJson) {
    fs.writeFileSync(config.sources.oddsOutputJson, JSON.stringify({ dataDir, ...report }, null, 2));
    console.log(`✅ Report written to ${config.sources.oddsOutputJson}`);
  }

  if (config.databaseUrl) {
    const db = new DatabaseClient(config.databaseUrl);
    try {
      await db.initialize();
      const written = await new ScanRepository(db).saveProgressionStats(report);
      console.log(`✅ ${written} progression stat row(s) saved`);
    } catch (err) {
      console.error('❌ Failed to save progression stats:', err instanceof Error ? err.message : err);
    } finally {
      await db.close();
    }
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('❌ Fatal:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
