import type { HistoryFetcher } from './alphaVantage.js';
import { logger } from './logger.js';
import { evaluate, type ScanOptions } from './scanner.js';
import type { ScanReport } from './types.js';
import { WatchlistStore } from './watchlist.js';

export type RunOutcome =
  | { ok: true; report: ScanReport }
  | { ok: false; reason: 'SCAN_IN_PROGRESS' };

/**
 * One scan at a time, each with a fresh run-scoped watchlist. Only the latest report is
 * kept, in memory.
 */
export class ScanService {
  private running = false;
  private last: ScanReport | null = null;

  constructor(
    private readonly loadSymbols: () => Promise<string[]>,
    private readonly fetchHistory: HistoryFetcher,
    private readonly options: ScanOptions = {}
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get lastReport(): ScanReport | null {
    return this.last;
  }

  async run(): Promise<RunOutcome> {
    if (this.running) return { ok: false, reason: 'SCAN_IN_PROGRESS' };
    this.running = true;
    try {
      const symbols = await this.loadSymbols();
      const report = await evaluate(
        symbols,
        { fetchHistory: this.fetchHistory, watchlist: new WatchlistStore() },
        this.options
      );
      this.last = report;
      return { ok: true, report };
    } catch (err) {
      logger.error('scan-service', 'scan failed', { error: String(err) });
      throw err;
    } finally {
      this.running = false;
    }
  }
}
