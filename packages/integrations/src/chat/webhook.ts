/**
 * Incoming-webhook alert sink.
 * Posts `{"text": message}` to a chat webhook URL (Slack-compatible).
 */

import { TransportError, errorMessage, getLogger, type AlertSink, type Logger } from '@flowpulse/core';

export interface WebhookSinkOptions {
  url: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class WebhookAlertSink implements AlertSink {
  readonly name = 'webhook';
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: WebhookSinkOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? getLogger();
  }

  async send(message: string): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Webhook request failed: ${errorMessage(error)}`, this.name);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new TransportError(
        `Webhook returned ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
        this.name,
        response.status
      );
    }

    this.logger.debug('alerts', 'Webhook message delivered', { status: response.status });
  }
}

/**
 * Sink used when no webhook is configured: logs the message instead of
 * sending it.
 */
export class LogAlertSink implements AlertSink {
  readonly name = 'log';

  constructor(private readonly logger: Logger = getLogger()) {}

  async send(message: string): Promise<void> {
    this.logger.info('alerts', 'Alert (no webhook configured)', { message });
  }
}
