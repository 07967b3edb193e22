import 'dotenv/config';
import { createApp } from './app.js';
import { createAlphaVantageFetcher } from './alphaVantage.js';
import { configSnapshot, effectiveWorkerCount, loadConfig } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { ScanService } from './scanService.js';
import { loadSymbolsFromFile } from './symbols.js';

const config = loadConfig();
setLogLevel(config.logLevel);
logger.info('server', 'configuration loaded', configSnapshot(config));

const service = new ScanService(
  async () => (await loadSymbolsFromFile(config.stocksFile)).map(s => s.symbol),
  createAlphaVantageFetcher({ apiKey: config.apiKey, apiUrl: config.apiUrl }),
  {
    workerCount: effectiveWorkerCount(config),
    requestDelayMs: config.requestDelayMs,
    lookbackDays: config.outputSize,
    progressIntervalMs: config.progressIntervalMs,
  }
);

const app = createApp(service);
app.listen(config.port, () => logger.info('server', `Server on http://localhost:${config.port}`));
