import type { MetricsSnapshot } from './samples.js';

/**
 * Destination for a cycle's metrics. Throws TransportError on failure.
 */
export interface MetricsSink {
  readonly name: string;
  publish(snapshot: MetricsSnapshot): Promise<void>;
}
