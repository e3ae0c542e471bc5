/**
 * Odds Sequence Types
 */

import { ObservationIssue, OddsObservation } from '../types';

export type ProgressionDirection = 'rising' | 'falling';

/**
 * A maximal run of one event's observations with no gap above maxGap
 */
export interface OddsSequence {
  eventId: string;
  index: number;
  observations: OddsObservation[];
}

export interface ThresholdTriple {
  fromThreshold: number;
  toThreshold: number;
  direction: ProgressionDirection;
}

export interface SequenceProgression {
  reachedFrom: boolean;
  reachedTo: boolean;
  // Entries into the "from" region across the sequence
  fromCrossings: number;
}

export interface ThresholdProgressionStat {
  fromThreshold: number;
  toThreshold: number;
  direction: ProgressionDirection;
  eventsReachingFrom: number;
  eventsAlsoReachingTo: number;
  // 0 with rateDefined = false when no event reached fromThreshold
  rate: number;
  rateDefined: boolean;
  eventIdsReachingFrom: string[];
  eventIdsReachingTo: string[];
  sequencesReachingFrom: number;
  sequencesAlsoReachingTo: number;
  sequenceRate: number;
  fromCrossings?: number;
}

export interface OddsAnalysisOptions {
  maxGapMs: number;
  thresholds: ThresholdTriple[];
  includeCrossingCounts: boolean;
}

export const DEFAULT_MAX_GAP_MS = 60 * 60 * 1000;

export interface OddsAnalysisReport {
  eventsProcessed: number;
  sequenceCount: number;
  maxGapMs: number;
  flaggedObservations: ObservationIssue[];
  stats: ThresholdProgressionStat[];
}

/**
 * Event id -> that event's observations
 */
export type OddsHistory = Record<string, readonly OddsObservation[]>;
