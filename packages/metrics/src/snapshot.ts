/**
 * The per-cycle metric set: a fresh prom-client registry and the metric
 * objects the collectors write into. Nothing here outlives a cycle.
 */

import { Counter, Gauge, Histogram, Registry, Summary } from 'prom-client';

export interface MetricSet {
  registry: Registry;
  devInProgress: Gauge<'developer'>;
  devCycleTime: Summary<'developer'>;
  devRework: Counter<'developer'>;
  qaTestingTime: Histogram<string>;
  agingTickets: Gauge<'category'>;
  failedCategories: Gauge<string>;
}

/** QA testing-time histogram buckets, in business days (+Inf is implicit) */
export const QA_TESTING_BUCKETS = [1, 3];

export function createMetricSet(): MetricSet {
  const registry = new Registry();

  return {
    registry,
    devInProgress: new Gauge({
      name: 'dev_tickets_in_progress_count',
      help: 'Open tickets in an in-progress status, per developer',
      labelNames: ['developer'] as const,
      registers: [registry],
    }),
    devCycleTime: new Summary({
      name: 'dev_cycle_time_hours',
      help: 'Business hours from first in-progress to first done, per developer',
      labelNames: ['developer'] as const,
      percentiles: [0.5, 0.9],
      registers: [registry],
    }),
    devRework: new Counter({
      name: 'dev_rework_total',
      help: 'Transitions from review or test back to in progress, per developer',
      labelNames: ['developer'] as const,
      registers: [registry],
    }),
    qaTestingTime: new Histogram({
      name: 'qa_testing_time_days',
      help: 'Business days a ticket spent in Test before leaving it',
      buckets: QA_TESTING_BUCKETS,
      registers: [registry],
    }),
    agingTickets: new Gauge({
      name: 'aging_tickets_count',
      help: 'Open tickets idle longer than the category threshold',
      labelNames: ['category'] as const,
      registers: [registry],
    }),
    failedCategories: new Gauge({
      name: 'flowpulse_cycle_failed_categories',
      help: 'Metric categories that failed during the cycle',
      registers: [registry],
    }),
  };
}
