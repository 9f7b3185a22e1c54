/**
 * Liveness routes. Read-only: every handler reads the worker's last
 * published status and nothing else.
 */

import { Hono } from 'hono';
import type { StatusProvider } from '../worker/cycle-worker.js';

export const ROOT_MESSAGE = 'FlowPulse worker is running in the background. All OK!';

/**
 * Create the health router.
 *
 * @param provider - Source of the worker status
 */
export function createHealthRouter(provider: StatusProvider): Hono {
  const router = new Hono();

  // ─── GET / - Static liveness text ──────────────────────────────
  router.get('/', (c) => c.text(ROOT_MESSAGE));

  // ─── GET /health - Team sizes ──────────────────────────────────
  router.get('/health', (c) => {
    const { team } = provider.status();
    return c.json({
      status: 'ok',
      developers: team.developers,
      qa_team: team.qa,
      pm_team: team.pm,
    });
  });

  // ─── GET /status - Last cycle report ───────────────────────────
  router.get('/status', (c) => c.json(provider.status()));

  return router;
}
