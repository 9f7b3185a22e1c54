/**
 * @flowpulse/server - Cycle worker and liveness server.
 *
 * Architecture:
 * - One sequential worker loop (metrics, alerts, publish, sleep)
 * - Hono for the liveness endpoints, served by @hono/node-server
 * - The last cycle report is swapped in atomically for readers
 */

export {
  CycleWorker,
  type CycleWorkerOptions,
  type CycleReport,
  type CycleOutcome,
  type RunOptions,
  type StatusProvider,
  type WorkerStatus,
} from './worker/cycle-worker.js';
export { createApp } from './app.js';
export { createHealthRouter, ROOT_MESSAGE } from './routes/health.js';
export { bootstrap, createWorker, type BootstrapOptions, type RunningService } from './bootstrap.js';
