import express from 'express';
import cors from 'cors';
import { getRecentLogs } from './logger.js';
import { serializeWatchlist } from './report.js';
import type { ScanService } from './scanService.js';
import type { ScanReport } from './types.js';

function reportJson(r: ScanReport) {
  return {
    runId: r.runId,
    startedAt: r.startedAt,
    finishedAt: r.finishedAt,
    summary: r.summary,
    results: r.results,
    watchlist: serializeWatchlist(r.watchlist),
  };
}

export function createApp(service: ScanService) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (req, res) => res.json({ ok: true, scanning: service.isRunning }));

  app.post('/api/scan', async (req, res) => {
    try {
      const out = await service.run();
      if (!out.ok) return res.status(409).json({ ok: false, error: out.reason });
      res.json({ ok: true, ...reportJson(out.report) });
    } catch (e) {
      res.status(500).json({ ok: false, error: String(e) });
    }
  });

  app.get('/api/scan/last', (req, res) => {
    const last = service.lastReport;
    if (!last) return res.status(404).json({ ok: false, error: 'NO_SCAN_YET' });
    res.json({ ok: true, ...reportJson(last) });
  });

  app.get('/api/watchlist', (req, res) => {
    const last = service.lastReport;
    res.json(last ? { runId: last.runId, ...serializeWatchlist(last.watchlist) } : { runId: null, long: [], short: [] });
  });

  app.get('/api/logs', (req, res) => {
    const limit = Math.min(1000, Math.max(1, Number(req.query.limit) || 200));
    res.json({ lines: getRecentLogs(limit) });
  });

  return app;
}
