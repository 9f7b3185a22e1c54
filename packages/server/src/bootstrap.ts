/**
 * Process bootstrap: configuration, tracker connection, team directory,
 * worker loop and liveness server.
 *
 * Configuration and initial-connection failures are thrown (ConfigError,
 * ConnectionError) before anything starts; the caller turns them into
 * exit code 1.
 */

import { serve, type ServerType } from '@hono/node-server';
import {
  errorMessage,
  initLogger,
  loadConfig,
  type FlowPulseConfig,
  type Logger,
} from '@flowpulse/core';
import {
  LogAlertSink,
  WebhookAlertSink,
  buildTeamDirectory,
  createJiraClient,
  createMetricsSink,
} from '@flowpulse/integrations';
import { createApp } from './app.js';
import { CycleWorker } from './worker/cycle-worker.js';

export interface BootstrapOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Install SIGTERM/SIGINT handlers (default: true) */
  handleSignals?: boolean;
}

export interface RunningService {
  config: FlowPulseConfig;
  worker: CycleWorker;
  server: ServerType;
  logger: Logger;
  shutdown(): Promise<void>;
}

/** Build a worker from configuration, connecting to the tracker first */
export async function createWorker(
  config: FlowPulseConfig,
  logger: Logger
): Promise<CycleWorker> {
  const tracker = createJiraClient({
    server: config.jira.server,
    user: config.jira.user,
    apiToken: config.jira.apiToken,
    logger,
  });

  const me = await tracker.checkConnection();
  logger.info('jira', `Connected to ${config.jira.server} as ${me.displayName}`, {
    project: config.jira.projectKey,
  });

  const team = await buildTeamDirectory(tracker, config.team, logger);

  const alertSink = config.alerts.webhookUrl
    ? new WebhookAlertSink({
        url: config.alerts.webhookUrl,
        timeoutMs: config.alerts.webhookTimeoutMs,
        logger,
      })
    : new LogAlertSink(logger);
  if (!config.alerts.webhookUrl) {
    logger.warn('alerts', 'CHAT_WEBHOOK_URL not set; alerts will only be logged');
  }

  const metricsSink = createMetricsSink(config.metrics, logger);
  if (!metricsSink) {
    logger.warn('metrics', 'METRICS_PUSH_URL not set; metrics will not be published');
  }

  return new CycleWorker({ config, tracker, team, alertSink, metricsSink, logger });
}

/** Start the worker loop and the liveness server */
export async function bootstrap(options: BootstrapOptions = {}): Promise<RunningService> {
  const config = loadConfig(options.env, options.cwd);
  const logger = initLogger({ level: config.logging.level, logDir: config.logging.dir });

  const worker = await createWorker(config, logger);
  const app = createApp(worker, logger);

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('server', `Liveness server listening on http://localhost:${info.port}`);
  });

  worker.start();

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    closing ??= (async () => {
      await worker.stop();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger.info('server', 'Liveness server closed');
      logger.close();
    })();
    return closing;
  };

  if (options.handleSignals ?? true) {
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info('server', `Received ${signal}, shutting down`);
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('server', `Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    };
    process.once('SIGTERM', onSignal);
    process.once('SIGINT', onSignal);
  }

  return { config, worker, server, logger, shutdown };
}
