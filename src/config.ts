import * as dotenv from 'dotenv';
import { VenueId } from './types';
import { ConfigValidationError } from './errors';
import { DEFAULT_MATCHING_OPTIONS, MatchingOptions } from './matching/types';
import { ArbitrageOptions, DEFAULT_ARBITRAGE_OPTIONS } from './arbitrage/types';
import { OddsAnalysisOptions, ProgressionDirection, ThresholdTriple } from './odds/types';
import { validateTriple } from './odds/thresholdProgression';

dotenv.config();

type Env = Record<string, string | undefined>;

/**
 * Scanner / Odds Report Configuration
 */
export interface ScanConfig {
  matching: MatchingOptions;
  arbitrage: ArbitrageOptions;
  odds: OddsAnalysisOptions;

  sources: {
    gammaApiUrl: string;
    gammaMarketLimit: number;
    snapshotDir: string;
    contractsFile: string;
    oddsDataDir: string;
    oddsOutputJson?: string;
    scanIntervalMs: number;
  };

  telegram: {
    enabled: boolean;
    botToken: string;
    chatId: string;
  };

  databaseUrl?: string;
}

const DIRECTION_ALIASES: Record<string, ProgressionDirection> = {
  rising: 'rising',
  up: 'rising',
  falling: 'falling',
  down: 'falling',
};

/**
 * Values above 1 are percentages
 */
function thresholdValue(raw: string): number {
  const value = parseFloat(raw);
  return value > 1 ? value / 100 : value;
}

/**
 * Read "from:to:direction" triples separated by commas, e.g.
 * "80:95:rising,0.3:0.1:falling". Direction defaults to rising.
 */
export function parseThresholdTriples(raw: string): ThresholdTriple[] {
  const triples: ThresholdTriple[] = [];
  const problems: string[] = [];

  for (const entry of raw.split(',').map(part => part.trim()).filter(Boolean)) {
    const [from, to, direction = 'rising', ...rest] = entry.split(':').map(part => part.trim());
    const resolved = DIRECTION_ALIASES[direction.toLowerCase()];

    if (!from || !to || rest.length > 0) {
      problems.push(`threshold entry "${entry}" must look like from:to[:direction]`);
    } else if (!resolved) {
      problems.push(`threshold entry "${entry}" has unknown direction "${direction}"`);
    } else {
      triples.push({ fromThreshold: thresholdValue(from), toThreshold: thresholdValue(to), direction: resolved });
    }
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return triples;
}

/**
 * Read "venue:fee" pairs separated by commas
 */
export function parseVenueFees(raw: string): Record<VenueId, number> {
  const fees: Record<VenueId, number> = {};
  const problems: string[] = [];

  for (const entry of raw.split(',').map(part => part.trim()).filter(Boolean)) {
    const [venue, fee] = entry.split(':').map(part => part.trim());
    const value = parseFloat(fee ?? '');
    if (!venue || Number.isNaN(value)) {
      problems.push(`venue fee entry "${entry}" must look like venue:fee`);
      continue;
    }
    fees[venue.toLowerCase()] = value;
  }

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return fees;
}

export function loadScanConfig(env: Env = process.env): ScanConfig {
  const problems: string[] = [];

  const collect = <T>(parse: () => T, fallback: T): T => {
    try {
      return parse();
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        problems.push(...error.problems);
        return fallback;
      }
      throw error;
    }
  };

  const venueFees = env.ARB_VENUE_FEES
    ? collect(() => parseVenueFees(env.ARB_VENUE_FEES ?? ''), {})
    : DEFAULT_ARBITRAGE_OPTIONS.venueFees;
  const thresholds = collect(() => parseThresholdTriples(env.ODDS_THRESHOLDS || ''), []);

  const config: ScanConfig = {
    matching: {
      ...DEFAULT_MATCHING_OPTIONS,
      minConfidenceThreshold: parseFloat(env.MATCH_MIN_CONFIDENCE || '0.60'),
      priorWeight: parseFloat(env.MATCH_PRIOR_WEIGHT || '0.5'),
      similarityWeight: parseFloat(env.MATCH_SIMILARITY_WEIGHT || '0.5'),
      priceSumTolerance: parseFloat(env.MATCH_PRICE_SUM_TOLERANCE || '0.01'),
      bridgeSimilarityCutoff: parseFloat(env.MATCH_BRIDGE_CUTOFF || '0.30'),
    },

    arbitrage: {
      highConfidenceCutoff: parseFloat(env.ARB_HIGH_CONFIDENCE_CUTOFF || '0.90'),
      minEdgeThreshold: parseFloat(env.ARB_MIN_EDGE || '0.02'),
      resolutionToleranceMs: parseFloat(env.ARB_RESOLUTION_TOLERANCE_HOURS || '168') * 60 * 60 * 1000,
      venueFees,
      defaultVenueFee: parseFloat(env.ARB_DEFAULT_FEE || '0.02'),
      bankrollCap: parseFloat(env.ARB_BANKROLL_CAP || '10000'),
      depthFraction: parseFloat(env.ARB_DEPTH_FRACTION || '0.1'),
    },

    odds: {
      maxGapMs: parseFloat(env.ODDS_MAX_GAP_MINUTES || '60') * 60 * 1000,
      thresholds,
      includeCrossingCounts: env.ODDS_CROSSING_COUNTS === 'true',
    },

    sources: {
      gammaApiUrl: env.GAMMA_API_URL || 'https://gamma-api.polymarket.com',
      gammaMarketLimit: parseInt(env.GAMMA_MARKET_LIMIT || '200'),
      snapshotDir: env.SNAPSHOT_DIR || 'data/snapshots',
      contractsFile: env.CONTRACTS_FILE || 'data/contracts.json',
      oddsDataDir: env.ODDS_DATA_DIR || 'data/historical',
      oddsOutputJson: env.ODDS_OUTPUT_JSON || undefined,
      scanIntervalMs: parseInt(env.SCAN_INTERVAL_MS || '300000'),
    },

    telegram: {
      enabled: env.TELEGRAM_ENABLED === 'true',
      botToken: env.TELEGRAM_BOT_TOKEN || '',
      chatId: env.TELEGRAM_CHAT_ID || '',
    },

    databaseUrl: env.DATABASE_URL || undefined,
  };

  problems.push(...validateScanConfig(config));
  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return config;
}

/**
 * Every problem with a loaded configuration; empty when it is usable
 */
export function validateScanConfig(config: ScanConfig): string[] {
  const problems: string[] = [];
  const fraction = (name: string, value: number) => {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`${name} must be within [0, 1], got ${value}`);
    }
  };
  const positive = (name: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`${name} must be a positive number, got ${value}`);
    }
  };
  const nonNegative = (name: string, value: number) => {
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`${name} must be zero or more, got ${value}`);
    }
  };

  const { matching, arbitrage, odds, sources, telegram } = config;

  fraction('MATCH_MIN_CONFIDENCE', matching.minConfidenceThreshold);
  nonNegative('MATCH_PRIOR_WEIGHT', matching.priorWeight);
  nonNegative('MATCH_SIMILARITY_WEIGHT', matching.similarityWeight);
  nonNegative('MATCH_PRICE_SUM_TOLERANCE', matching.priceSumTolerance);
  fraction('MATCH_BRIDGE_CUTOFF', matching.bridgeSimilarityCutoff);

  fraction('ARB_HIGH_CONFIDENCE_CUTOFF', arbitrage.highConfidenceCutoff);
  if (!Number.isFinite(arbitrage.minEdgeThreshold)) {
    problems.push(`ARB_MIN_EDGE must be a number, got ${arbitrage.minEdgeThreshold}`);
  }
  nonNegative('ARB_RESOLUTION_TOLERANCE_HOURS', arbitrage.resolutionToleranceMs);
  for (const [venue, fee] of Object.entries(arbitrage.venueFees)) {
    fraction(`ARB_VENUE_FEES (${venue})`, fee);
  }
  fraction('ARB_DEFAULT_FEE', arbitrage.defaultVenueFee);
  nonNegative('ARB_BANKROLL_CAP', arbitrage.bankrollCap);
  fraction('ARB_DEPTH_FRACTION', arbitrage.depthFraction);

  positive('ODDS_MAX_GAP_MINUTES', odds.maxGapMs);
  problems.push(...odds.thresholds.flatMap(validateTriple));

  positive('GAMMA_MARKET_LIMIT', sources.gammaMarketLimit);
  positive('SCAN_INTERVAL_MS', sources.scanIntervalMs);

  if (telegram.enabled && (!telegram.botToken || !telegram.chatId)) {
    problems.push('TELEGRAM_ENABLED requires TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID');
  }

  return problems;
}
