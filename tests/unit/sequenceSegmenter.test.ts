import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  partitionObservations,
  segmentEvent,
  segmentHistory,
  validateObservation,
} from '../../src/odds/sequenceSegmenter';
import { MINUTE, observations } from '../helpers';

const HOUR = 60 * MINUTE;

describe('segmentEvent', () => {
  it('keeps closely spaced observations in one sequence', () => {
    const points = observations('house', [[0, 0.7], [10, 0.82], [20, 0.91], [30, 0.96]]);
    const sequences = segmentEvent('house', points, HOUR);

    assert.equal(sequences.length, 1);
    assert.deepEqual(sequences[0], { eventId: 'house', index: 0, observations: points });
  });

  it('splits where the gap exceeds the maximum', () => {
    const points = observations('house', [[0, 0.7], [10, 0.82], [100, 0.91], [110, 0.96]]);
    const sequences = segmentEvent('house', points, HOUR);

    assert.deepEqual(
      sequences.map(sequence => [sequence.index, sequence.observations.map(o => o.probability)]),
      [[0, [0.7, 0.82]], [1, [0.91, 0.96]]]
    );
  });

  it('does not split on a gap equal to the maximum', () => {
    const points = observations('house', [[0, 0.5], [60, 0.6]]);
    assert.equal(segmentEvent('house', points, HOUR).length, 1);
  });

  it('sorts by time and reproduces the input without loss', () => {
    const points = observations('house', [[200, 0.4], [0, 0.1], [150, 0.3], [5, 0.2]]);
    const sequences = segmentEvent('house', points, HOUR);
    const sorted = [...points].sort((a, b) => a.timestamp - b.timestamp);

    assert.deepEqual(sequences.flatMap(sequence => sequence.observations), sorted);
    for (let i = 1; i < sequences.length; i++) {
      const previous = sequences[i - 1].observations;
      const gap = sequences[i].observations[0].timestamp - previous[previous.length - 1].timestamp;
      assert.ok(gap > HOUR);
    }
    for (const sequence of sequences) {
      for (let j = 1; j < sequence.observations.length; j++) {
        assert.ok(sequence.observations[j].timestamp - sequence.observations[j - 1].timestamp <= HOUR);
      }
    }
  });

  it('accepts a single observation', () => {
    const sequences = segmentEvent('solo', observations('solo', [[0, 0.5]]), HOUR);
    assert.equal(sequences.length, 1);
    assert.equal(sequences[0].observations.length, 1);
  });

  it('returns no sequence for no observations', () => {
    assert.deepEqual(segmentEvent('empty', [], HOUR), []);
  });
});

describe('validateObservation', () => {
  it('flags values outside the probability domain', () => {
    const [first] = observations('x', [[0, 1.2]]);
    assert.equal(validateObservation(first), 'probability outside [0, 1]: 1.2');
  });

  it('flags non-finite values and timestamps', () => {
    assert.equal(validateObservation({ eventId: 'x', timestamp: 0, probability: NaN }), 'invalid probability: NaN');
    assert.equal(validateObservation({ eventId: 'x', timestamp: NaN, probability: 0.5 }), 'invalid timestamp: NaN');
  });

  it('accepts the domain bounds', () => {
    assert.equal(validateObservation({ eventId: 'x', timestamp: 0, probability: 0 }), null);
    assert.equal(validateObservation({ eventId: 'x', timestamp: 0, probability: 1 }), null);
  });
});

describe('partitionObservations', () => {
  it('drops malformed observations and records them', () => {
    const points = observations('x', [[0, 0.5], [10, -0.1], [20, 0.6]]);
    const { valid, flagged } = partitionObservations(points);

    assert.deepEqual(valid.map(o => o.probability), [0.5, 0.6]);
    assert.deepEqual(flagged, [
      { eventId: 'x', timestamp: points[1].timestamp, reason: 'probability outside [0, 1]: -0.1' },
    ]);
  });
});

describe('segmentHistory', () => {
  it('segments every event independently', () => {
    const { sequences, flagged } = segmentHistory(
      {
        a: observations('a', [[0, 0.5], [120, 0.6]]),
        b: observations('b', [[0, 0.2], [10, 1.5]]),
      },
      HOUR
    );

    assert.deepEqual(
      sequences.map(sequence => `${sequence.eventId}#${sequence.index}`),
      ['a#0', 'a#1', 'b#0']
    );
    assert.equal(flagged.length, 1);
  });
});
