/**
 * Metric cycle engine.
 * Runs every collector against a fresh metric set. A collector that
 * throws is logged and recorded as a failed category; the others still
 * run and the partial snapshot is returned.
 */

import { toSamples } from '@flowpulse/integrations';
import { createMetricSet, type MetricSet } from './snapshot.js';
import type { MetricContext, MetricCycleResult } from './types.js';
import { collectDeveloperCycle, collectDeveloperLoad } from './collectors/developer.js';
import { collectQaTesting } from './collectors/qa.js';
import { collectAgingCategory } from './collectors/aging.js';

type Collector = (ctx: MetricContext, metrics: MetricSet) => Promise<void>;

/** Fixed categories, in collection order */
const COLLECTORS: ReadonlyArray<[string, Collector]> = [
  ['developer_load', collectDeveloperLoad],
  ['developer_cycle', collectDeveloperCycle],
  ['qa_testing', collectQaTesting],
];

export async function runMetricCycle(ctx: MetricContext): Promise<MetricCycleResult> {
  const metrics = createMetricSet();
  const failedCategories: string[] = [];

  const run = async (category: string, collect: () => Promise<void>): Promise<void> => {
    try {
      await collect();
    } catch (error) {
      failedCategories.push(category);
      ctx.logger.categoryFailed({ category, error });
    }
  };

  for (const [category, collector] of COLLECTORS) {
    await run(category, () => collector(ctx, metrics));
  }
  for (const aging of ctx.workflow.aging) {
    await run(`aging:${aging.name}`, () => collectAgingCategory(ctx, metrics, aging));
  }

  metrics.failedCategories.set(failedCategories.length);

  const samples = await toSamples(metrics.registry);
  const snapshot = Object.freeze({
    registry: metrics.registry,
    samples: Object.freeze(samples),
    timestampMs: ctx.clock().getTime(),
  });

  ctx.logger.info('collect', 'Metric snapshot built', {
    series: samples.length,
    ...(failedCategories.length > 0 ? { failedCategories } : {}),
  });

  return { snapshot, failedCategories };
}
