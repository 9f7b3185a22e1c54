/**
 * Cycle worker.
 *
 * Owns the long-lived state (team directory, alert dedup state, sinks)
 * and drives one sequential loop: run a cycle, sleep, repeat. Cycles never
 * overlap. Every error inside a cycle is caught and logged; the loop only
 * ends on stop().
 *
 * The report of the last finished cycle is replaced as a whole, frozen
 * object so readers never see a cycle in progress.
 */

import {
  errorMessage,
  generateId,
  getLogger,
  sleep,
  type AlertSink,
  type Clock,
  type FlowPulseConfig,
  type Logger,
  type TeamDirectory,
  type TrackerClient,
} from '@flowpulse/core';
import type { MetricsSink, MetricsSnapshot } from '@flowpulse/integrations';
import { runMetricCycle } from '@flowpulse/metrics';
import { AlertDedupState, runAlertCycle } from '@flowpulse/alerts';

// ─── Types ────────────────────────────────────────────────────────

export interface CycleWorkerOptions {
  config: FlowPulseConfig;
  tracker: TrackerClient;
  team: TeamDirectory;
  /** Alerts are skipped when null */
  alertSink: AlertSink | null;
  /** Snapshots are built but not published when null */
  metricsSink: MetricsSink | null;
  clock?: Clock;
  logger?: Logger;
}

export interface RunOptions {
  /** Publish the snapshot to the metrics sink (default: true) */
  publish?: boolean;
  /** Evaluate alerts (default: true) */
  alerts?: boolean;
}

/** Summary of one finished cycle */
export interface CycleReport {
  readonly cycle: number;
  readonly cycleId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  /** False when the cycle aborted before finishing */
  readonly ok: boolean;
  readonly failedCategories: readonly string[];
  readonly series: number;
  readonly published: boolean;
  readonly alertsSent: number;
  readonly alertsSuppressed: number;
  readonly alertDeliveryFailures: number;
  readonly error?: string;
}

export interface CycleOutcome {
  report: CycleReport;
  /** The cycle's metric snapshot; null when the cycle aborted before building it */
  snapshot: MetricsSnapshot | null;
}

export interface WorkerStatus {
  running: boolean;
  cyclesCompleted: number;
  team: { developers: number; qa: number; pm: number };
  dedupEntries: number;
  lastCycle: CycleReport | null;
}

/** Read-only view used by the HTTP front */
export interface StatusProvider {
  status(): WorkerStatus;
}

// ─── Worker ───────────────────────────────────────────────────────

export class CycleWorker implements StatusProvider {
  private readonly config: FlowPulseConfig;
  private readonly tracker: TrackerClient;
  private readonly team: TeamDirectory;
  private readonly alertSink: AlertSink | null;
  private readonly metricsSink: MetricsSink | null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly dedup = new AlertDedupState();

  private cycleCount = 0;
  private lastReport: CycleReport | null = null;
  private running = false;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: CycleWorkerOptions) {
    this.config = options.config;
    this.tracker = options.tracker;
    this.team = options.team;
    this.alertSink = options.alertSink;
    this.metricsSink = options.metricsSink;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Run a single cycle: metrics, then alerts, then publish. Never throws.
   */
  async runOnce(options: RunOptions = {}): Promise<CycleOutcome> {
    const publish = options.publish ?? true;
    const evaluateAlerts = options.alerts ?? true;
    const cycle = ++this.cycleCount;
    const cycleId = generateId();
    const startedAt = this.clock();
    const { config, logger } = this;

    logger.cycleStarted({ cycleId, cycle });

    const failedCategories: string[] = [];
    let snapshot: MetricsSnapshot | null = null;
    let published = false;
    let alerts = { sent: 0, suppressed: 0, deliveryFailures: 0 };
    let error: string | undefined;

    try {
      const metrics = await runMetricCycle({
        tracker: this.tracker,
        team: this.team,
        workflow: config.workflow,
        projectKey: config.jira.projectKey,
        clock: this.clock,
        logger,
      });
      snapshot = metrics.snapshot;
      failedCategories.push(...metrics.failedCategories);

      if (evaluateAlerts && this.alertSink) {
        const result = await runAlertCycle({
          tracker: this.tracker,
          sink: this.alertSink,
          team: this.team,
          dedup: this.dedup,
          workflow: config.workflow,
          projectKey: config.jira.projectKey,
          server: config.jira.server,
          cycle,
          dedupMaxIdleCycles: config.alerts.dedupMaxIdleCycles,
          logger,
        });
        alerts = result;
        failedCategories.push(...result.failedCategories);
      }

      if (publish && this.metricsSink) {
        try {
          await this.metricsSink.publish(snapshot);
          published = true;
        } catch (publishError) {
          logger.error('metrics', `Publish failed: ${errorMessage(publishError)}`, {
            sink: this.metricsSink.name,
          });
        }
      }
    } catch (cycleError) {
      error = errorMessage(cycleError);
      logger.error('cycle', `Cycle ${cycle} aborted: ${error}`, { cycleId });
    }

    const finishedAt = this.clock();
    const durationMs = finishedAt.getTime() - startedAt.getTime();

    const report: CycleReport = Object.freeze({
      cycle,
      cycleId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs,
      ok: error === undefined,
      failedCategories: Object.freeze([...failedCategories]),
      series: snapshot?.samples.length ?? 0,
      published,
      alertsSent: alerts.sent,
      alertsSuppressed: alerts.suppressed,
      alertDeliveryFailures: alerts.deliveryFailures,
      ...(error !== undefined ? { error } : {}),
    });
    this.lastReport = report;

    logger.cycleFinished({
      cycleId,
      cycle,
      durationMs,
      failedCategories,
      alertsSent: alerts.sent,
      published,
    });

    return { report, snapshot };
  }

  /** Start the loop. Resolves immediately; the loop runs until stop(). */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    const signal = this.abort.signal;
    const intervalMs = this.config.pollIntervalSeconds * 1000;

    this.logger.info('worker', 'Worker started', {
      intervalSeconds: this.config.pollIntervalSeconds,
      alerts: this.alertSink?.name ?? 'disabled',
      metrics: this.metricsSink?.name ?? 'disabled',
    });

    this.loop = (async () => {
      while (this.running) {
        await this.runOnce();
        if (!this.running) break;
        this.logger.debug('worker', `Sleeping ${this.config.pollIntervalSeconds}s`);
        await sleep(intervalMs, signal);
      }
    })().catch((loopError: unknown) => {
      this.running = false;
      this.logger.error('worker', `Worker loop stopped: ${errorMessage(loopError)}`);
    });
  }

  /** Stop the loop, waiting for a cycle in progress to finish */
  async stop(): Promise<void> {
    if (!this.running && !this.loop) return;
    this.running = false;
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    this.abort = null;
    this.logger.info('worker', 'Worker stopped', { cycles: this.cycleCount });
  }

  status(): WorkerStatus {
    return {
      running: this.running,
      cyclesCompleted: this.lastReport?.cycle ?? 0,
      team: {
        developers: this.team.developers.size,
        qa: this.team.qa.size,
        pm: this.team.pm.size,
      },
      dedupEntries: this.dedup.size,
      lastCycle: this.lastReport,
    };
  }
}
