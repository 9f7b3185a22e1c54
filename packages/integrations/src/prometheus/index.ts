import { ConfigError, type FlowPulseConfig, type Logger } from '@flowpulse/core';
import { PushgatewaySink } from './pushgateway.js';
import { RemoteWriteSink } from './remote-write.js';
import type { MetricsSink } from './sink.js';

export { toSamples, type MetricSample, type MetricsSnapshot } from './samples.js';
export type { MetricsSink } from './sink.js';
export { RemoteWriteSink, encodeWriteRequest, type RemoteWriteOptions } from './remote-write.js';
export { PushgatewaySink, type PushgatewayOptions } from './pushgateway.js';

/**
 * Create the configured metrics sink, or null when no push URL is set
 * (metrics are then only computed and logged).
 */
export function createMetricsSink(
  config: FlowPulseConfig['metrics'],
  logger?: Logger
): MetricsSink | null {
  if (!config.pushUrl) return null;

  switch (config.pushMode) {
    case 'remote_write':
      return new RemoteWriteSink({
        url: config.pushUrl,
        username: config.pushUser,
        password: config.pushPassword,
        logger,
      });
    case 'pushgateway':
      return new PushgatewaySink({
        url: config.pushUrl,
        jobName: config.jobName,
        username: config.pushUser,
        password: config.pushPassword,
        logger,
      });
    default: {
      const mode: never = config.pushMode;
      throw new ConfigError(`Unknown metrics push mode: ${String(mode)}`);
    }
  }
}
