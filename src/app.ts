import express, { type NextFunction, type Request, type Response } from 'express';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { CameraError, ConfigError, errorMessage } from './errors.js';
import { createLogger, recentLogs } from './logger.js';
import type { Scheduler } from './scheduler.js';
import { openEventStream } from './sse.js';
import { renderPage } from './views.js';

const log = createLogger('http');

const PUBLIC_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'public');

export interface AppOptions {
  // Source of the raw configuration for POST /action/reload
  readConfig: () => unknown;
  title?: string;
}

export function createApp(scheduler: Scheduler, options: AppOptions): express.Express {
  const app = express();
  app.use(express.static(PUBLIC_DIR));

  // ── Dashboard ───────────────────────────────────────────────────────────────
  app.get('/', async (_req, res, next) => {
    try {
      res.send(renderPage(await scheduler.status(), options.title));
    } catch (err) {
      next(err);
    }
  });

  app.get('/status', async (_req, res, next) => {
    try {
      res.json(await scheduler.status());
    } catch (err) {
      next(err);
    }
  });

  // ── Live events (one subscriber per connected client) ───────────────────────
  app.get('/events', (_req, res) => {
    const sub = openEventStream(scheduler.bus, res);
    log.debug(`Event stream ${sub.id} opened`);
  });

  // ── Latest image, always a complete file thanks to rename-on-write ─────────
  app.get('/latest.jpg', (_req, res) => {
    const file = scheduler.latestPath;
    if (!fs.existsSync(file)) return res.status(404).end();
    res.setHeader('Content-Type', scheduler.latestContentType);
    res.setHeader('Cache-Control', 'no-cache');
    res.sendFile(path.resolve(file), (err) => {
      if (err && !res.headersSent) res.status(404).end();
    });
  });

  app.get('/api/logs', (req, res) => {
    const n = parseInt(String(req.query.n ?? '100'), 10);
    res.json({ lines: recentLogs(Number.isNaN(n) ? 100 : n) });
  });

  // ── Control actions ─────────────────────────────────────────────────────────
  app.post('/action/pause', (_req, res) => {
    res.json({ ok: true, state: scheduler.pause() });
  });

  app.post('/action/resume', (_req, res) => {
    res.json({ ok: true, state: scheduler.resume() });
  });

  app.post('/action/snapshot', async (_req, res, next) => {
    try {
      const stored = await scheduler.forceSnapshot();
      res.json({ ok: true, filename: stored.filename });
    } catch (err) {
      if (err instanceof CameraError) {
        res.status(502).json({ ok: false, error: { code: err.code, message: err.message } });
        return;
      }
      next(err);
    }
  });

  app.post('/action/reload', async (_req, res, next) => {
    try {
      const generation = await scheduler.reloadConfig(options.readConfig());
      res.json({ ok: true, generation });
    } catch (err) {
      if (err instanceof ConfigError) {
        log.warn(`Reload rejected: ${err.message}`);
        res.status(400).json({
          ok: false,
          error: { code: err.code, message: err.message, issues: err.issues },
          generation: scheduler.generation,
        });
        return;
      }
      next(err);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error(`Request failed: ${errorMessage(err)}`);
    if (res.headersSent) return res.end();
    res.status(500).json({ ok: false, error: { code: 'internal', message: errorMessage(err) } });
  });

  return app;
}
