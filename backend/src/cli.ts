#!/usr/bin/env node
import 'dotenv/config';
import { createAlphaVantageFetcher } from './alphaVantage.js';
import { configSnapshot, effectiveWorkerCount, loadConfig } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { formatSummary, formatWatchlist } from './report.js';
import { evaluate } from './scanner.js';
import { loadSymbolsFromFile } from './symbols.js';
import { WatchlistStore } from './watchlist.js';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info('cli', 'configuration loaded', configSnapshot(config));

  logger.info('cli', '📈 Loading stock list...', { file: config.stocksFile });
  const stocks = await loadSymbolsFromFile(config.stocksFile);
  logger.info('cli', `📊 Loaded ${stocks.length} stocks for analysis`);

  const workers = effectiveWorkerCount(config);
  logger.info('cli', `🚀 Starting concurrent processing with ${workers} workers...`);

  const watchlist = new WatchlistStore();
  const report = await evaluate(
    stocks.map(s => s.symbol),
    {
      fetchHistory: createAlphaVantageFetcher({ apiKey: config.apiKey, apiUrl: config.apiUrl }),
      watchlist,
    },
    {
      workerCount: workers,
      requestDelayMs: config.requestDelayMs,
      lookbackDays: config.outputSize,
      progressIntervalMs: config.progressIntervalMs,
    }
  );

  for (const line of formatSummary(report.summary)) console.log(line);
  console.log(`⏱️  Total processing time: ${(report.summary.durationMs / 1000).toFixed(1)}s`);
  console.log('\n🎯 Final Results:');
  for (const line of formatWatchlist(report.watchlist)) console.log(line);
  console.log('\n✅ SAPAN Strategy analysis completed!');
}

main().catch((err) => {
  logger.error('cli', 'screening failed', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
