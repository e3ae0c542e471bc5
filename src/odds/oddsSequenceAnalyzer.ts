/**
 * Odds Sequence Analyzer
 * Validate, segment and aggregate threshold progressions over an odds history
 */

import { segmentHistory } from './sequenceSegmenter';
import { ConfigValidationError } from '../errors';
import { analyzeProgressions, validateTriple } from './thresholdProgression';
import { DEFAULT_MAX_GAP_MS, OddsAnalysisOptions, OddsAnalysisReport, OddsHistory } from './types';

export class OddsSequenceAnalyzer {
  private readonly options: OddsAnalysisOptions;

  constructor(options?: Partial<OddsAnalysisOptions>) {
    this.options = {
      maxGapMs: DEFAULT_MAX_GAP_MS,
      thresholds: [],
      includeCrossingCounts: false,
      ...options,
    };
    // Fails before any history is read
    const problems = this.options.thresholds.flatMap(validateTriple);
    if (!Number.isFinite(this.options.maxGapMs) || this.options.maxGapMs <= 0) {
      problems.push(`maxGapMs must be a positive number, got ${this.options.maxGapMs}`);
    }
    if (problems.length > 0) {
      throw new ConfigValidationError(problems);
    }
  }

  analyze(history: OddsHistory): OddsAnalysisReport {
    const { sequences, flagged } = segmentHistory(history, this.options.maxGapMs);
    const stats = analyzeProgressions(sequences, this.options.thresholds, {
      includeCrossingCounts: this.options.includeCrossingCounts,
    });

    return {
      eventsProcessed: Object.keys(history).length,
      sequenceCount: sequences.length,
      maxGapMs: this.options.maxGapMs,
      flaggedObservations: flagged,
      stats,
    };
  }
}
