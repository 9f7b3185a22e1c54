/**
 * Hono application for the liveness endpoints.
 */

import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { getLogger, type Logger } from '@flowpulse/core';
import { createHealthRouter } from './routes/health.js';
import type { StatusProvider } from './worker/cycle-worker.js';

export function createApp(provider: StatusProvider, logger: Logger = getLogger()): Hono {
  const app = new Hono();

  // ─── Global Middleware ──────────────────────────────────────────

  app.use('*', requestLogger((message) => logger.debug('http', message)));

  // ─── Routes ─────────────────────────────────────────────────────

  app.route('/', createHealthRouter(provider));

  // ─── 404 Handler ────────────────────────────────────────────────

  app.notFound((c) =>
    c.json(
      {
        error: 'Not Found',
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
      404
    )
  );

  // ─── Error Handler ──────────────────────────────────────────────

  app.onError((err, c) => {
    logger.error('http', `${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ error: 'Internal Server Error', message: err.message }, 500);
  });

  return app;
}
