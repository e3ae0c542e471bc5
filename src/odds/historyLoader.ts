/**
 * Odds History Loader
 * Reads per-event CSV files (timestamp, price columns) from a directory tree.
 * Event id is the file's path relative to the root, without extension.
 */

import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { OddsObservation } from '../types';
import { OddsHistory } from './types';

export interface HistoryLoadOptions {
  extensions?: string[];
  limit?: number;
}

type CsvRow = Record<string, string | undefined>;

/**
 * Epoch seconds, epoch milliseconds or a date string Date.parse understands
 */
export function parseTimestamp(raw: string): number {
  const value = raw.trim();
  if (value === '') return NaN;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const numeric = parseFloat(value);
    // Below 1e11 reads as seconds (before year 5138)
    return Math.abs(numeric) < 1e11 ? numeric * 1000 : numeric;
  }
  return Date.parse(value);
}

/**
 * Parse one CSV body. Every row becomes an observation; an unreadable
 * timestamp or price is kept as NaN for the segmenter to flag. Rows with an
 * unreadable timestamp sort last.
 */
export function parseOddsCsv(eventId: string, text: string): OddsObservation[] {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.trim().toLowerCase(),
  });

  const fields = parsed.meta.fields ?? [];
  if (!fields.includes('timestamp') || !fields.includes('price')) {
    return [];
  }

  const observations: OddsObservation[] = [];
  for (const row of parsed.data) {
    const timestamp = parseTimestamp(row.timestamp ?? '');
    const priceText = (row.price ?? '').trim();
    const probability = priceText === '' ? NaN : Number(priceText);
    observations.push({ eventId, timestamp, probability });
  }

  return observations.sort(byTime);
}

function byTime(a: OddsObservation, b: OddsObservation): number {
  const aMissing = Number.isNaN(a.timestamp);
  const bMissing = Number.isNaN(b.timestamp);
  if (aMissing || bMissing) return Number(aMissing) - Number(bMissing);
  return a.timestamp - b.timestamp;
}

function listFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

export function loadOddsHistory(dataDir: string, options: HistoryLoadOptions = {}): OddsHistory {
  const extensions = (options.extensions ?? ['.csv']).map(ext =>
    (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()
  );
  const history: OddsHistory = {};
  let count = 0;

  for (const file of listFiles(dataDir)) {
    const ext = path.extname(file).toLowerCase();
    if (!extensions.includes(ext)) continue;

    const relative = path.relative(dataDir, file).split(path.sep).join('/');
    const eventId = relative.slice(0, relative.length - ext.length);
    const observations = parseOddsCsv(eventId, fs.readFileSync(file, 'utf8'));
    if (observations.length === 0) continue;

    history[eventId] = observations;
    count++;
    if (options.limit !== undefined && count >= options.limit) break;
  }

  return history;
}
