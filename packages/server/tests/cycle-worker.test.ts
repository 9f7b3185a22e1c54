import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, TransportError } from '@flowpulse/core';
import type { MetricsSink, MetricsSnapshot } from '@flowpulse/integrations';
import {
  MockTracker,
  RecordingAlertSink,
  createComment,
  createConfig,
  createIssue,
  createTeamDirectory,
  statusChange,
} from '@flowpulse/test-utils';
import { CycleWorker } from '../src/worker/cycle-worker.js';

class RecordingMetricsSink implements MetricsSink {
  readonly name = 'recording';
  publish = vi.fn<(snapshot: MetricsSnapshot) => Promise<void>>(async () => {});
}

const NOW = new Date(Date.UTC(2024, 0, 18, 12));

describe('CycleWorker', () => {
  let tracker: MockTracker;
  let alertSink: RecordingAlertSink;
  let metricsSink: RecordingMetricsSink;
  let logger: Logger;
  let worker: CycleWorker;

  beforeEach(() => {
    tracker = new MockTracker();
    alertSink = new RecordingAlertSink();
    metricsSink = new RecordingMetricsSink();
    logger = new Logger({ console: false });
    worker = new CycleWorker({
      config: createConfig(),
      tracker,
      team: createTeamDirectory({ developers: { 'acc-ana': 'Ana' }, qa: { 'acc-quinn': 'Quinn' } }),
      alertSink,
      metricsSink,
      clock: () => NOW,
      logger,
    });
  });

  afterEach(async () => {
    await worker.stop();
  });

  it('runs metrics, alerts and publish in one cycle', async () => {
    tracker
      .onSearch('status changed to "Listo para Prod"', [
        createIssue({
          changelog: [
            statusChange('New', 'EN CURSO', '2024-01-15T09:00:00.000+0000'),
            statusChange('EN CURSO', 'Listo para Prod', '2024-01-17T09:00:00.000+0000'),
          ],
        }),
      ])
      .onSearch('created >= "-5m"', [createIssue({ key: 'GRV-9', priority: 'Highest' })]);

    const { report, snapshot } = await worker.runOnce();

    expect(report).toMatchObject({
      cycle: 1,
      ok: true,
      published: true,
      alertsSent: 1,
      failedCategories: [],
      durationMs: 0,
    });
    expect(metricsSink.publish).toHaveBeenCalledWith(snapshot);
    expect(alertSink.messages[0]).toContain('GRV-9');
    expect(Object.isFrozen(report)).toBe(true);
  });

  it('keeps dedup state across cycles', async () => {
    tracker
      .onSearch('updated >= "-5m"', [createIssue({ key: 'GRV-3' })])
      .setLatestComment('GRV-3', createComment({ issueKey: 'GRV-3', id: 'C1' }));

    await worker.runOnce();
    const second = await worker.runOnce();

    expect(alertSink.send).toHaveBeenCalledTimes(1);
    expect(second.report.alertsSuppressed).toBe(1);
    expect(worker.status().dedupEntries).toBe(1);
  });

  it('honours the publish and alerts switches', async () => {
    tracker.onSearch('created >= "-5m"', [createIssue()]);

    const { report, snapshot } = await worker.runOnce({ publish: false, alerts: false });

    expect(metricsSink.publish).not.toHaveBeenCalled();
    expect(alertSink.send).not.toHaveBeenCalled();
    expect(report.published).toBe(false);
    expect(snapshot).not.toBeNull();
  });

  it('logs a failed publish without failing the cycle', async () => {
    metricsSink.publish.mockRejectedValueOnce(new TransportError('Remote write returned 401', 'remote_write', 401));

    const { report } = await worker.runOnce();

    expect(report.ok).toBe(true);
    expect(report.published).toBe(false);
    const entry = logger.allEntries.find((e) => e.category === 'metrics' && e.level === 'error');
    expect(entry?.message).toBe('Publish failed: Remote write returned 401');
  });

  it('reports partial data from failing categories', async () => {
    tracker.failOn('created >= "-5m"', new Error('boom'));

    const { report } = await worker.runOnce();

    expect(report.ok).toBe(true);
    expect(report.failedCategories).toEqual(['critical_tickets']);
  });

  it('publishes the last report through status()', async () => {
    expect(worker.status().lastCycle).toBeNull();

    const { report } = await worker.runOnce();

    expect(worker.status()).toEqual({
      running: false,
      cyclesCompleted: 1,
      team: { developers: 1, qa: 1, pm: 0 },
      dedupEntries: 0,
      lastCycle: report,
    });
  });

  it('loops until stopped', async () => {
    const first = new Promise<void>((resolve) => {
      metricsSink.publish.mockImplementationOnce(async () => resolve());
    });

    worker.start();
    expect(worker.status().running).toBe(true);
    await first;
    await worker.stop();

    expect(worker.status().running).toBe(false);
    expect(worker.status().cyclesCompleted).toBe(1);
  });
});
