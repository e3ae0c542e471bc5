/**
 * Sequence Segmenter
 * Splits an event's odds history into gap-bounded sequences
 */

import { ObservationIssue, OddsObservation } from '../types';
import { OddsHistory, OddsSequence } from './types';

export function validateObservation(observation: OddsObservation): string | null {
  if (!Number.isFinite(observation.timestamp)) {
    return `invalid timestamp: ${observation.timestamp}`;
  }
  if (!Number.isFinite(observation.probability)) {
    return `invalid probability: ${observation.probability}`;
  }
  if (observation.probability < 0 || observation.probability > 1) {
    return `probability outside [0, 1]: ${observation.probability}`;
  }
  return null;
}

/**
 * Drop malformed observations, keeping a record of each
 */
export function partitionObservations(observations: readonly OddsObservation[]): {
  valid: OddsObservation[];
  flagged: ObservationIssue[];
} {
  const valid: OddsObservation[] = [];
  const flagged: ObservationIssue[] = [];

  for (const observation of observations) {
    const reason = validateObservation(observation);
    if (reason) {
      flagged.push({ eventId: observation.eventId, timestamp: observation.timestamp, reason });
    } else {
      valid.push(observation);
    }
  }

  return { valid, flagged };
}

/**
 * Sort by time, then start a new sequence whenever the gap to the previous
 * observation exceeds maxGapMs
 */
export function segmentEvent(
  eventId: string,
  observations: readonly OddsObservation[],
  maxGapMs: number
): OddsSequence[] {
  const ordered = [...observations].sort((a, b) => a.timestamp - b.timestamp);
  const sequences: OddsSequence[] = [];
  let current: OddsObservation[] = [];

  for (const observation of ordered) {
    const previous = current[current.length - 1];
    if (previous && observation.timestamp - previous.timestamp > maxGapMs) {
      sequences.push({ eventId, index: sequences.length, observations: current });
      current = [];
    }
    current.push(observation);
  }

  if (current.length > 0) {
    sequences.push({ eventId, index: sequences.length, observations: current });
  }

  return sequences;
}

/**
 * Validate and segment every event of a history
 */
export function segmentHistory(
  history: OddsHistory,
  maxGapMs: number
): { sequences: OddsSequence[]; flagged: ObservationIssue[] } {
  const sequences: OddsSequence[] = [];
  const flagged: ObservationIssue[] = [];

  for (const [eventId, observations] of Object.entries(history)) {
    const partition = partitionObservations(observations);
    flagged.push(...partition.flagged);
    sequences.push(...segmentEvent(eventId, partition.valid, maxGapMs));
  }

  return { sequences, flagged };
}
