import type { ScanSummary, WatchlistEntry } from './types.js';

// 2024-05-01 14:03:09 (UTC)
export function formatTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatSummary(s: ScanSummary): string[] {
  return [
    '📊 Processing Summary:',
    `   Total processed: ${s.successful + s.errors}`,
    `   Successful: ${s.successful}`,
    `   Errors: ${s.errors}`,
    `   Valid SAPAN setups: ${s.valid}`,
    `   Long setups: ${s.long}`,
    `   Short setups: ${s.short}`,
    '   Note: Each stock can only be either Long OR Short (mutually exclusive)',
  ];
}

function listing(title: string, emptyText: string, entries: WatchlistEntry[]): string[] {
  if (entries.length === 0) return [title, `  ${emptyText}`];
  return [title, ...entries.map(e => `  ${formatTimestamp(e.timestamp)}: ${e.symbol}`)];
}

export function formatWatchlist(w: { long: WatchlistEntry[]; short: WatchlistEntry[] }): string[] {
  return [
    ...listing('Current Long Watch List:', 'No valid SAPAN long setups found', w.long),
    '',
    ...listing('Current Short Watch List:', 'No valid SAPAN short setups found', w.short),
  ];
}

/** JSON-friendly watchlist for the HTTP surface. */
export function serializeWatchlist(w: { long: WatchlistEntry[]; short: WatchlistEntry[] }) {
  const row = (e: WatchlistEntry) => ({ timestamp: e.timestamp.toISOString(), symbol: e.symbol });
  return { long: w.long.map(row), short: w.short.map(row) };
}
