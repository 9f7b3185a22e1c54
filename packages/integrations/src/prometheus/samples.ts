/**
 * Flattening of a prom-client registry into plain samples, one per
 * exposed series (histogram buckets, summary quantiles, `_sum` and
 * `_count` included).
 */

import type { Registry } from 'prom-client';

export interface MetricSample {
  /** Series name, e.g. `qa_testing_time_days_bucket` */
  name: string;
  labels: Record<string, string>;
  value: number;
}

/** The payload a sink publishes: every sample plus one shared timestamp */
export interface MetricsSnapshot {
  readonly registry: Registry;
  readonly samples: readonly MetricSample[];
  readonly timestampMs: number;
}

/**
 * Collect every sample in the registry. Non-finite values (summary
 * quantiles with no observations) are dropped.
 */
export async function toSamples(registry: Registry): Promise<MetricSample[]> {
  const metrics = await registry.getMetricsAsJSON();
  const samples: MetricSample[] = [];

  for (const metric of metrics) {
    for (const value of metric.values) {
      if (!Number.isFinite(value.value)) continue;

      const name =
        'metricName' in value && typeof value.metricName === 'string'
          ? value.metricName
          : metric.name;

      const labels: Record<string, string> = {};
      for (const [label, labelValue] of Object.entries(value.labels)) {
        if (labelValue !== undefined) labels[label] = String(labelValue);
      }

      samples.push({ name, labels, value: value.value });
    }
  }

  return samples;
}
