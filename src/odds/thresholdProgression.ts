/**
 * Threshold Progression
 * Does a sequence that crosses one probability level go on to cross another?
 *
 * A level is crossed at observation i when observation i-1 sits outside the
 * level's region and observation i sits inside it. Rising regions are
 * value >= level, falling regions value <= level. A sequence that opens
 * inside a region has not crossed into it.
 */

import { OddsObservation } from '../types';
import { ConfigValidationError } from '../errors';
import {
  OddsSequence,
  ProgressionDirection,
  SequenceProgression,
  ThresholdProgressionStat,
  ThresholdTriple,
} from './types';

export function inRegion(probability: number, level: number, direction: ProgressionDirection): boolean {
  return direction === 'rising' ? probability >= level : probability <= level;
}

function crossesAt(
  observations: readonly OddsObservation[],
  index: number,
  level: number,
  direction: ProgressionDirection
): boolean {
  if (index === 0) return false;
  return (
    !inRegion(observations[index - 1].probability, level, direction) &&
    inRegion(observations[index].probability, level, direction)
  );
}

/**
 * First-crossing evaluation of one sequence. The "to" level counts only when
 * it is crossed after the first "from" crossing; equal levels are reached
 * together.
 */
export function evaluateSequence(
  observations: readonly OddsObservation[],
  triple: ThresholdTriple
): SequenceProgression {
  const { fromThreshold, toThreshold, direction } = triple;
  let firstFrom = -1;
  let fromCrossings = 0;

  for (let i = 1; i < observations.length; i++) {
    if (crossesAt(observations, i, fromThreshold, direction)) {
      fromCrossings++;
      if (firstFrom < 0) firstFrom = i;
    }
  }

  if (firstFrom < 0) {
    return { reachedFrom: false, reachedTo: false, fromCrossings };
  }

  if (fromThreshold === toThreshold) {
    return { reachedFrom: true, reachedTo: true, fromCrossings };
  }

  let reachedTo = false;
  for (let i = firstFrom + 1; i < observations.length && !reachedTo; i++) {
    reachedTo = crossesAt(observations, i, toThreshold, direction);
  }

  return { reachedFrom: true, reachedTo, fromCrossings };
}

/**
 * Problems with one triple, empty when it is usable
 */
export function validateTriple(triple: ThresholdTriple): string[] {
  const label = `${triple.fromThreshold}:${triple.toThreshold}:${triple.direction}`;
  const problems: string[] = [];

  for (const level of [triple.fromThreshold, triple.toThreshold]) {
    if (!Number.isFinite(level) || level < 0 || level > 1) {
      problems.push(`threshold ${level} outside [0, 1] in ${label}`);
    }
  }
  if (triple.direction !== 'rising' && triple.direction !== 'falling') {
    problems.push(`unknown direction in ${label}`);
  }
  if (problems.length > 0) return problems;

  if (triple.direction === 'rising' && triple.toThreshold < triple.fromThreshold) {
    problems.push(`rising triple ${label} needs toThreshold >= fromThreshold`);
  }
  if (triple.direction === 'falling' && triple.toThreshold > triple.fromThreshold) {
    problems.push(`falling triple ${label} needs toThreshold <= fromThreshold`);
  }
  return problems;
}

export function validateTriples(triples: readonly ThresholdTriple[]): void {
  const problems = triples.flatMap(validateTriple);
  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
}

/**
 * Aggregate every triple over every sequence. An event reaches a level when
 * any of its sequences does; counts at sequence level are kept alongside.
 */
export function analyzeProgressions(
  sequences: readonly OddsSequence[],
  triples: readonly ThresholdTriple[],
  options: { includeCrossingCounts?: boolean } = {}
): ThresholdProgressionStat[] {
  return triples.map(triple => {
    const eventsFrom = new Set<string>();
    const eventsTo = new Set<string>();
    let sequencesFrom = 0;
    let sequencesTo = 0;
    let crossings = 0;

    for (const sequence of sequences) {
      const progression = evaluateSequence(sequence.observations, triple);
      crossings += progression.fromCrossings;
      if (!progression.reachedFrom) continue;

      sequencesFrom++;
      eventsFrom.add(sequence.eventId);
      if (progression.reachedTo) {
        sequencesTo++;
        eventsTo.add(sequence.eventId);
      }
    }

    const stat: ThresholdProgressionStat = {
      fromThreshold: triple.fromThreshold,
      toThreshold: triple.toThreshold,
      direction: triple.direction,
      eventsReachingFrom: eventsFrom.size,
      eventsAlsoReachingTo: eventsTo.size,
      rate: eventsFrom.size > 0 ? eventsTo.size / eventsFrom.size : 0,
      rateDefined: eventsFrom.size > 0,
      eventIdsReachingFrom: [...eventsFrom].sort(),
      eventIdsReachingTo: [...eventsTo].sort(),
      sequencesReachingFrom: sequencesFrom,
      sequencesAlsoReachingTo: sequencesTo,
      sequenceRate: sequencesFrom > 0 ? sequencesTo / sequencesFrom : 0,
    };
    if (options.includeCrossingCounts) {
      stat.fromCrossings = crossings;
    }
    return stat;
  });
}
