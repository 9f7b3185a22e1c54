/**
 * Prometheus remote-write sink.
 * Encodes a snapshot as a `prompb.WriteRequest`, compresses it with
 * snappy and POSTs it with Basic authentication (Grafana Cloud style
 * instance id + API key).
 */

import { fileURLToPath } from 'node:url';
import protobuf, { type Type } from 'protobufjs';
import { compress } from 'snappy';
import { TransportError, errorMessage, getLogger, type Logger } from '@flowpulse/core';
import type { MetricsSnapshot } from './samples.js';
import type { MetricsSink } from './sink.js';

export interface RemoteWriteOptions {
  url: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const PROTO_PATH = fileURLToPath(new URL('./remote.proto', import.meta.url));

const DEFAULT_TIMEOUT_MS = 15_000;

let writeRequestType: Type | null = null;

/** Lazily load the WriteRequest message type */
function getWriteRequestType(): Type {
  if (!writeRequestType) {
    writeRequestType = protobuf.loadSync(PROTO_PATH).lookupType('prompb.WriteRequest');
  }
  return writeRequestType;
}

/**
 * Serialize a snapshot: one time series per sample, `__name__` label
 * first, remaining labels sorted by name.
 */
export function encodeWriteRequest(snapshot: MetricsSnapshot): Uint8Array {
  const type = getWriteRequestType();
  const timeseries = snapshot.samples.map((sample) => ({
    labels: [
      { name: '__name__', value: sample.name },
      ...Object.entries(sample.labels)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([name, value]) => ({ name, value })),
    ],
    samples: [{ value: sample.value, timestamp: snapshot.timestampMs }],
  }));

  const payload = { timeseries };
  const problem = type.verify(payload);
  if (problem) {
    throw new TransportError(`Invalid write request: ${problem}`, 'remote_write');
  }
  return type.encode(type.fromObject(payload)).finish();
}

export class RemoteWriteSink implements MetricsSink {
  readonly name = 'remote_write';
  private readonly url: string;
  private readonly authHeader?: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: RemoteWriteOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? getLogger();
    if (options.username !== undefined || options.password !== undefined) {
      const credentials = `${options.username ?? ''}:${options.password ?? ''}`;
      this.authHeader = 'Basic ' + Buffer.from(credentials).toString('base64');
    }
  }

  async publish(snapshot: MetricsSnapshot): Promise<void> {
    const body = await compress(Buffer.from(encodeWriteRequest(snapshot)));

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-protobuf',
          'Content-Encoding': 'snappy',
          'X-Prometheus-Remote-Write-Version': '0.1.0',
          ...(this.authHeader ? { Authorization: this.authHeader } : {}),
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Remote write failed: ${errorMessage(error)}`, this.name);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new TransportError(
        `Remote write returned ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
        this.name,
        response.status
      );
    }

    this.logger.info('metrics', 'Metrics pushed via remote write', {
      series: snapshot.samples.length,
    });
  }
}
