import fetch from 'node-fetch';
import { z } from 'zod';
import { DEFAULT_API_URL } from './config.js';
import type { OHLCV } from './types.js';

// fields stay optional so one incomplete row is dropped, not the whole payload
const DailyBarSchema = z.object({
  '1. open': z.string().optional(),
  '2. high': z.string().optional(),
  '3. low': z.string().optional(),
  '4. close': z.string().optional(),
  '5. volume': z.string().optional(),
});

const DailyResponseSchema = z.object({
  'Time Series (Daily)': z.record(z.string(), DailyBarSchema).optional(),
  Note: z.string().optional(),
  Information: z.string().optional(),
  'Error Message': z.string().optional(),
});

export type DailyResponse = z.infer<typeof DailyResponseSchema>;

export type HistoryFetcher = (symbol: string, lookbackDays: number) => Promise<OHLCV[]>;

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function parseDate(s: string): number | null {
  if (!DATE_RE.test(s)) return null;
  const t = Date.parse(`${s}T00:00:00Z`);
  return Number.isFinite(t) ? t : null;
}

function parsePrice(s: string | undefined): number | null {
  if (s === undefined) return null;
  const n = parseFloat(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Converts a TIME_SERIES_DAILY payload into candles sorted oldest first.
 * Rows with an unparsable date or number are dropped. Throws when the payload carries
 * no series (rate limit note, API error, or anything else).
 */
export function parseDailySeries(json: unknown): OHLCV[] {
  const parsed = DailyResponseSchema.safeParse(json);
  if (!parsed.success) throw new Error('invalid API response');
  const body = parsed.data;

  const series = body['Time Series (Daily)'];
  if (!series || Object.keys(series).length === 0) {
    const note = body.Note ?? body.Information;
    if (note) throw new Error(`API rate limit: ${note}`);
    if (body['Error Message']) throw new Error(`API error: ${body['Error Message']}`);
    throw new Error('invalid API response');
  }

  const candles: OHLCV[] = [];
  for (const [date, bar] of Object.entries(series)) {
    const time = parseDate(date);
    const open = parsePrice(bar['1. open']);
    const high = parsePrice(bar['2. high']);
    const low = parsePrice(bar['3. low']);
    const close = parsePrice(bar['4. close']);
    const volume = parsePrice(bar['5. volume']);
    if (time === null || open === null || high === null || low === null || close === null || volume === null) continue;
    candles.push({ time, open, high, low, close, volume });
  }

  candles.sort((a, b) => a.time - b.time);
  return candles;
}

export function buildDailyUrl(apiUrl: string, apiKey: string, symbol: string, lookbackDays: number): string {
  const url = new URL(apiUrl || DEFAULT_API_URL);
  url.searchParams.set('function', 'TIME_SERIES_DAILY');
  url.searchParams.set('symbol', symbol);
  // compact = latest 100 bars
  url.searchParams.set('outputsize', lookbackDays <= 100 ? 'compact' : 'full');
  url.searchParams.set('apikey', apiKey);
  return url.toString();
}

export async function fetchDailyCandles(
  symbol: string,
  lookbackDays: number,
  opts: { apiKey: string; apiUrl?: string }
): Promise<OHLCV[]> {
  const url = buildDailyUrl(opts.apiUrl ?? DEFAULT_API_URL, opts.apiKey, symbol, lookbackDays);
  const res = await fetch(url);
  if (!res.ok) throw new Error(`HTTP ${res.status} for ${symbol}`);
  const json: unknown = await res.json();
  const candles = parseDailySeries(json);
  return candles.slice(-lookbackDays);
}

export function createAlphaVantageFetcher(opts: { apiKey: string; apiUrl?: string }): HistoryFetcher {
  return (symbol, lookbackDays) => fetchDailyCandles(symbol, lookbackDays, opts);
}
