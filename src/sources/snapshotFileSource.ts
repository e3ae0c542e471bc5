import * as fs from 'fs';
import * as path from 'path';
import { ContractSide, MarketQuestion, OutcomeSide, VenueId } from '../types';
import { MissingInputError } from '../errors';
import { ContractSource, MarketSource } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOr(value: unknown, fallback: number): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return fallback;
}

/**
 * Market from one snapshot entry; null when id or question is not a string.
 * Prices are copied as given so validation can flag bad ones.
 */
export function toSnapshotMarket(value: unknown, venue: VenueId): MarketQuestion | null {
  if (!isRecord(value)) return null;
  const { id, question, outcomePrices, closingTime } = value;
  if ((typeof id !== 'string' && typeof id !== 'number') || typeof question !== 'string') {
    return null;
  }

  const prices: Record<string, number> = {};
  if (isRecord(outcomePrices)) {
    for (const [label, price] of Object.entries(outcomePrices)) {
      prices[label] = numberOr(price, NaN);
    }
  }

  let closing: number | null = null;
  if (typeof closingTime === 'number') {
    closing = closingTime;
  } else if (typeof closingTime === 'string') {
    const parsed = new Date(closingTime).getTime();
    closing = Number.isNaN(parsed) ? null : parsed;
  }

  return {
    id: String(id),
    venue,
    question,
    outcomePrices: prices,
    closingTime: closing,
    volume: numberOr(value.volume, 0),
    liquidity: numberOr(value.liquidity, 0),
  };
}

export function toContractSide(value: unknown): ContractSide | null {
  if (!isRecord(value)) return null;
  const { name, side, venue, marketTitle } = value;
  if (typeof name !== 'string' || name.trim() === '' || typeof venue !== 'string') return null;

  const normalizedSide = typeof side === 'string' ? side.trim().toUpperCase() : '';
  let outcome: OutcomeSide;
  if (normalizedSide === 'YES' || normalizedSide === 'NO') {
    outcome = normalizedSide;
  } else {
    return null;
  }

  return {
    name,
    side: outcome,
    venue: venue.toLowerCase(),
    ...(typeof marketTitle === 'string' && marketTitle.trim() !== '' ? { marketTitle } : {}),
  };
}

function readJson(file: string): unknown {
  if (!fs.existsSync(file)) {
    throw new MissingInputError(`File not found: ${file}`);
  }
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

/**
 * Venue snapshot stored as <snapshotDir>/<venue>.json, either an array of
 * markets or { "markets": [...] }
 */
export class SnapshotFileSource implements MarketSource {
  constructor(readonly venue: VenueId, private readonly snapshotDir: string) {}

  get file(): string {
    return path.join(this.snapshotDir, `${this.venue}.json`);
  }

  async fetchMarkets(): Promise<MarketQuestion[]> {
    const data = readJson(this.file);
    const entries = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.markets) ? data.markets : [];

    const markets: MarketQuestion[] = [];
    for (const entry of entries) {
      const market = toSnapshotMarket(entry, this.venue);
      if (market) {
        markets.push(market);
      } else {
        console.warn(`⚠️  Skipping unreadable market in ${this.file}`);
      }
    }
    return markets;
  }
}

/**
 * Venues with a snapshot file in the directory
 */
export function listSnapshotVenues(snapshotDir: string): VenueId[] {
  if (!fs.existsSync(snapshotDir)) return [];
  return fs.readdirSync(snapshotDir)
    .filter(file => file.toLowerCase().endsWith('.json'))
    .map(file => file.slice(0, -'.json'.length))
    .sort();
}

export class ContractFileSource implements ContractSource {
  constructor(private readonly file: string) {}

  async loadContracts(): Promise<ContractSide[]> {
    const data = readJson(this.file);
    if (!Array.isArray(data)) {
      throw new MissingInputError(`Contract file ${this.file} must hold a JSON array`);
    }

    const contracts: ContractSide[] = [];
    for (const entry of data) {
      const contract = toContractSide(entry);
      if (contract) {
        contracts.push(contract);
      } else {
        console.warn(`⚠️  Skipping unreadable contract in ${this.file}`);
      }
    }
    return contracts;
  }
}
