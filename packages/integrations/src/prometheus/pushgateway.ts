/**
 * Pushgateway sink, using prom-client's built-in client.
 */

import { Pushgateway } from 'prom-client';
import { TransportError, errorMessage, getLogger, type Logger } from '@flowpulse/core';
import type { MetricsSnapshot } from './samples.js';
import type { MetricsSink } from './sink.js';

export interface PushgatewayOptions {
  url: string;
  jobName: string;
  username?: string;
  password?: string;
  logger?: Logger;
}

export class PushgatewaySink implements MetricsSink {
  readonly name = 'pushgateway';
  private readonly options: PushgatewayOptions;
  private readonly logger: Logger;

  constructor(options: PushgatewayOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger();
  }

  async publish(snapshot: MetricsSnapshot): Promise<void> {
    const { url, jobName, username, password } = this.options;
    const headers: Record<string, string> = {};
    if (username !== undefined || password !== undefined) {
      headers.Authorization =
        'Basic ' + Buffer.from(`${username ?? ''}:${password ?? ''}`).toString('base64');
    }

    const gateway = new Pushgateway(url, { headers }, snapshot.registry);
    try {
      await gateway.pushAdd({ jobName });
    } catch (error) {
      throw new TransportError(`Pushgateway push failed: ${errorMessage(error)}`, this.name);
    }

    this.logger.info('metrics', 'Metrics pushed to Pushgateway', {
      job: jobName,
      series: snapshot.samples.length,
    });
  }
}
