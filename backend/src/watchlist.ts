import { ReadWriteLock } from './concurrency.js';
import { logger } from './logger.js';
import type { Scenario, WatchlistEntry } from './types.js';

type StoredEntry = WatchlistEntry & { seq: number };

/**
 * Run-scoped record of matched symbols, one append-only collection per scenario.
 *
 * Lock discipline: writes take the exclusive lock, reads take the shared lock and get a
 * copy ordered by timestamp. Entries stamped in the same millisecond keep insertion order.
 * Nothing here prevents a symbol from landing in both collections; the scanner only
 * evaluates SHORT after LONG fails.
 */
export class WatchlistStore {
  private readonly lock = new ReadWriteLock();
  private readonly entries: Record<Scenario, StoredEntry[]> = { LONG: [], SHORT: [] };
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  add(scenario: Scenario, symbol: string): Promise<WatchlistEntry> {
    return this.lock.write(() => {
      const entry: StoredEntry = { timestamp: this.now(), symbol, scenario, seq: this.seq++ };
      this.entries[scenario].push(entry);
      logger.info('watchlist', `SAPAN ${scenario === 'LONG' ? 'Long' : 'Short'} setup detected for ${symbol}`);
      return toPublic(entry);
    });
  }

  addLong(symbol: string): Promise<WatchlistEntry> {
    return this.add('LONG', symbol);
  }

  addShort(symbol: string): Promise<WatchlistEntry> {
    return this.add('SHORT', symbol);
  }

  get(scenario: Scenario): Promise<WatchlistEntry[]> {
    return this.lock.read(() => ordered(this.entries[scenario]));
  }

  getLong(): Promise<WatchlistEntry[]> {
    return this.get('LONG');
  }

  getShort(): Promise<WatchlistEntry[]> {
    return this.get('SHORT');
  }

  countLong(): Promise<number> {
    return this.lock.read(() => this.entries.LONG.length);
  }

  countShort(): Promise<number> {
    return this.lock.read(() => this.entries.SHORT.length);
  }

  count(): Promise<number> {
    return this.lock.read(() => this.entries.LONG.length + this.entries.SHORT.length);
  }

  snapshot(): Promise<{ long: WatchlistEntry[]; short: WatchlistEntry[] }> {
    return this.lock.read(() => ({
      long: ordered(this.entries.LONG),
      short: ordered(this.entries.SHORT),
    }));
  }
}

function toPublic(e: StoredEntry): WatchlistEntry {
  return { timestamp: new Date(e.timestamp.getTime()), symbol: e.symbol, scenario: e.scenario };
}

function ordered(list: StoredEntry[]): WatchlistEntry[] {
  return [...list]
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.seq - b.seq)
    .map(toPublic);
}
