import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { OddsSequenceAnalyzer } from '../../src/odds/oddsSequenceAnalyzer';
import { ConfigValidationError } from '../../src/errors';
import { formatOddsReport } from '../../src/oddsReport';
import { MINUTE, observations } from '../helpers';

const triple = { fromThreshold: 0.8, toThreshold: 0.95, direction: 'rising' as const };

describe('OddsSequenceAnalyzer', () => {
  const analyzer = new OddsSequenceAnalyzer({ maxGapMs: 60 * MINUTE, thresholds: [triple] });

  it('reports a progression inside one sequence', () => {
    const report = analyzer.analyze({
      house: observations('house', [[0, 0.7], [10, 0.82], [20, 0.91], [30, 0.96]]),
    });

    assert.equal(report.eventsProcessed, 1);
    assert.equal(report.sequenceCount, 1);
    assert.equal(report.stats[0].eventsReachingFrom, 1);
    assert.equal(report.stats[0].eventsAlsoReachingTo, 1);
    assert.equal(report.stats[0].rate, 1);
  });

  it('does not carry a progression across a gap', () => {
    const report = analyzer.analyze({
      house: observations('house', [[0, 0.7], [10, 0.82], [100, 0.91], [110, 0.96]]),
    });

    assert.equal(report.sequenceCount, 2);
    assert.equal(report.stats[0].eventsReachingFrom, 1);
    assert.equal(report.stats[0].eventsAlsoReachingTo, 0);
    assert.equal(report.stats[0].rate, 0);
    assert.equal(report.stats[0].rateDefined, true);
  });

  it('flags malformed observations without failing', () => {
    const report = analyzer.analyze({
      house: observations('house', [[0, 0.7], [5, 1.5], [10, 0.82]]),
    });

    assert.equal(report.flaggedObservations.length, 1);
    assert.equal(report.flaggedObservations[0].reason, 'probability outside [0, 1]: 1.5');
    assert.equal(report.stats[0].eventsReachingFrom, 1);
  });

  it('marks the rate undefined when nothing reaches the first level', () => {
    const report = analyzer.analyze({ flat: observations('flat', [[0, 0.4], [10, 0.45]]) });
    assert.equal(report.stats[0].rate, 0);
    assert.equal(report.stats[0].rateDefined, false);
  });

  it('rejects invalid configuration before analysing', () => {
    assert.throws(
      () => new OddsSequenceAnalyzer({ thresholds: [{ fromThreshold: 0.9, toThreshold: 0.8, direction: 'rising' }] }),
      ConfigValidationError
    );
    assert.throws(() => new OddsSequenceAnalyzer({ maxGapMs: 0 }), {
      message: 'Invalid configuration: maxGapMs must be a positive number, got 0',
    });
  });
});

describe('formatOddsReport', () => {
  it('prints totals and one block per triple', () => {
    const analyzer = new OddsSequenceAnalyzer({ thresholds: [triple], includeCrossingCounts: true });
    const report = analyzer.analyze({
      house: observations('house', [[0, 0.7], [10, 0.82], [20, 0.91], [30, 0.96]]),
    });

    assert.deepEqual(formatOddsReport(report), [
      'Events processed: 1',
      'Sequences analysed: 1',
      'Max gap (minutes): 60',
      'Observations flagged: 0',
      '',
      'Threshold path: 80.00% -> 95.00% (rising)',
      '  Sequences reaching first threshold: 1',
      '  Sequences reaching full path: 1',
      '  Sequence success ratio: 100.00%',
      '  Events reaching first threshold: 1',
      '  Events reaching full path: 1',
      '  Event success ratio: 100.00%',
      '  Crossings into first threshold: 1',
      '',
    ]);
  });
});
