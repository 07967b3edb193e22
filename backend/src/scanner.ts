// backend/src/scanner.ts
import type { HistoryFetcher } from './alphaVantage.js';
import { Channel, sleep } from './concurrency.js';
import { clampWorkerCount } from './config.js';
import { logger } from './logger.js';
import { evaluateSymbol } from './logic.js';
import { ProgressTracker, startProgressReporter } from './progress.js';
import type { OHLCV, ScanReport, ScanResult, ScanSummary } from './types.js';
import type { WatchlistStore } from './watchlist.js';

export interface ScanDeps {
  fetchHistory: HistoryFetcher;
  watchlist: WatchlistStore;
}

export interface ScanOptions {
  /** clamped to [1, 10] */
  workerCount?: number;
  /** pause after each symbol, per worker */
  requestDelayMs?: number;
  lookbackDays?: number;
  progressIntervalMs?: number;
  /** progress line sink; defaults to stdout */
  write?: (chunk: string) => void;
  now?: () => number;
}

export const DEFAULT_LOOKBACK_DAYS = 200;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function processSymbol(symbol: string, deps: ScanDeps, lookbackDays: number): Promise<ScanResult> {
  const result: ScanResult = {
    symbol,
    success: false,
    error: null,
    isValid: false,
    isLongValid: false,
    isShortValid: false,
    patternType: 'NONE',
    message: '',
  };

  let candles: OHLCV[];
  try {
    candles = await deps.fetchHistory(symbol, lookbackDays);
  } catch (err) {
    result.error = errorMessage(err);
    result.message = `Failed to fetch data: ${result.error}`;
    return result;
  }

  const evaluation = evaluateSymbol(symbol, candles);
  result.success = true;
  result.message = evaluation.message;
  if (evaluation.scenario === 'LONG') {
    result.isLongValid = true;
    result.patternType = evaluation.long.patternType;
    await deps.watchlist.addLong(symbol);
  } else if (evaluation.scenario === 'SHORT' && evaluation.short) {
    result.isShortValid = true;
    result.patternType = evaluation.short.patternType;
    await deps.watchlist.addShort(symbol);
  }
  result.isValid = result.isLongValid || result.isShortValid;
  return result;
}

async function worker(
  id: number,
  tasks: Channel<string>,
  results: Channel<ScanResult>,
  deps: ScanDeps,
  progress: ProgressTracker,
  opts: { lookbackDays: number; requestDelayMs: number }
): Promise<void> {
  for await (const symbol of tasks) {
    const result = await processSymbol(symbol, deps, opts.lookbackDays);
    await results.send(result);
    progress.update(result.success, result.isValid);
    logger.debug('scanner', `worker ${id} done with ${symbol}`);
    if (opts.requestDelayMs > 0) await sleep(opts.requestDelayMs);
  }
}

function logResult(r: ScanResult): void {
  if (!r.success) {
    logger.warn('scanner', `⚠️  ${r.symbol}: Error - ${r.error ?? 'unknown'}`);
  } else if (r.isValid) {
    logger.info('scanner', `✅ ${r.symbol}: ${r.message}`);
  } else {
    logger.debug('scanner', `❌ ${r.symbol}: ${r.message}`);
  }
}

/**
 * Screens every symbol once with a fixed pool of workers.
 *
 * Symbols go through a task channel; each worker fetches history, validates LONG then
 * (only if LONG fails) SHORT, records matches in the watchlist and sleeps
 * `requestDelayMs` before taking the next symbol, so at most `workerCount` fetches are
 * in flight. Results are drained in completion order, not input order.
 */
export async function evaluate(symbols: string[], deps: ScanDeps, opts: ScanOptions = {}): Promise<ScanReport> {
  const now = opts.now ?? Date.now;
  const workerCount = clampWorkerCount(opts.workerCount ?? 5);
  const requestDelayMs = Math.max(0, opts.requestDelayMs ?? 0);
  const lookbackDays = opts.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
  const startedAt = now();
  const runId = `run_${startedAt}_${Math.random().toString(36).slice(2, 8)}`;

  const capacity = Math.max(1, symbols.length);
  const tasks = new Channel<string>(capacity);
  const results = new Channel<ScanResult>(capacity);
  const progress = new ProgressTracker(symbols.length, now);
  const reporter = startProgressReporter(progress, { intervalMs: opts.progressIntervalMs, write: opts.write });

  logger.info('scanner', `starting scan ${runId}`, { symbols: symbols.length, workers: workerCount, requestDelayMs });

  // capacity equals the symbol count, so enqueueing never waits
  for (const s of symbols) await tasks.send(s);
  tasks.close();

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker(i, tasks, results, deps, progress, { lookbackDays, requestDelayMs }));
  }
  // barrier: the result channel closes once every worker has returned or crashed
  const completion = Promise.allSettled(workers).then((settled): unknown[] => {
    results.close();
    return settled.flatMap(s => (s.status === 'rejected' ? [s.reason] : []));
  });

  const collected: ScanResult[] = [];
  const summary: ScanSummary = {
    total: symbols.length,
    processed: 0,
    successful: 0,
    errors: 0,
    valid: 0,
    long: 0,
    short: 0,
    durationMs: 0,
  };

  try {
    for await (const r of results) {
      collected.push(r);
      summary.processed++;
      if (r.success) {
        summary.successful++;
        if (r.isValid) summary.valid++;
        if (r.isLongValid) summary.long++;
        if (r.isShortValid) summary.short++;
      } else {
        summary.errors++;
      }
      logResult(r);
    }
    const crashes = await completion;
    if (crashes.length > 0) {
      for (const c of crashes) logger.error('scanner', 'worker crashed', { error: errorMessage(c) });
      throw crashes[0];
    }
  } finally {
    reporter.stop();
  }

  const finishedAt = now();
  summary.durationMs = finishedAt - startedAt;
  logger.info('scanner', `scan ${runId} finished`, { ...summary });

  return {
    runId,
    startedAt,
    finishedAt,
    summary,
    results: collected,
    progress: progress.snapshot(),
    watchlist: await deps.watchlist.snapshot(),
  };
}
