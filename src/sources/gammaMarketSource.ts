import axios, { AxiosInstance } from 'axios';
import { MarketQuestion } from '../types';
import { MarketSource } from './types';

/**
 * Market as returned by the Gamma /markets endpoint. Outcome lists arrive as
 * JSON-encoded strings; numbers often arrive as strings.
 */
export interface GammaMarketRaw {
  id?: string | number;
  question?: string;
  outcomes?: string | string[];
  outcomePrices?: string | Array<string | number>;
  endDate?: string;
  end_date_iso?: string;
  liquidity?: string | number;
  volume?: string | number;
}

function parseList(value: string | Array<string | number> | undefined): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value.map(String);

  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.map(String) : [];
  } catch {
    return [];
  }
}

function parseNumber(value: string | number | undefined): number {
  const parsed = typeof value === 'number' ? value : parseFloat(value || '0');
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Canonical market from a raw Gamma record; null when it has no id
 */
export function toMarketQuestion(raw: GammaMarketRaw, venue = 'polymarket'): MarketQuestion | null {
  if (raw.id === undefined || raw.id === '') return null;

  const outcomes = parseList(raw.outcomes);
  const prices = parseList(raw.outcomePrices);
  const outcomePrices: Record<string, number> = {};
  for (let i = 0; i < Math.min(outcomes.length, prices.length); i++) {
    outcomePrices[outcomes[i]] = parseFloat(prices[i]);
  }

  const end = raw.endDate || raw.end_date_iso;
  const closingTime = end ? new Date(end).getTime() : NaN;

  return {
    id: String(raw.id),
    venue,
    question: raw.question || '',
    outcomePrices,
    closingTime: Number.isNaN(closingTime) ? null : closingTime,
    volume: parseNumber(raw.volume),
    liquidity: parseNumber(raw.liquidity),
  };
}

export class GammaMarketSource implements MarketSource {
  readonly venue = 'polymarket';
  private gammaClient: AxiosInstance;

  constructor(gammaApiUrl: string, private readonly limit: number = 200) {
    this.gammaClient = axios.create({
      baseURL: gammaApiUrl,
      timeout: 10000,
    });
  }

  async fetchMarkets(): Promise<MarketQuestion[]> {
    try {
      const response = await this.gammaClient.get<GammaMarketRaw[]>('/markets', {
        params: {
          limit: this.limit,
          active: true,
          closed: false,
        },
      });

      const markets: MarketQuestion[] = [];
      for (const raw of response.data) {
        const market = toMarketQuestion(raw, this.venue);
        if (market) markets.push(market);
      }
      return markets;
    } catch (error) {
      console.error('❌ Error fetching Gamma markets:', error instanceof Error ? error.message : error);
      return [];
    }
  }
}
