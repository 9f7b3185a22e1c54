/**
 * @flowpulse/integrations - External service adapters.
 * Jira Cloud tracker client, team directory resolution, chat webhook
 * alert sink and Prometheus metric sinks.
 */

// ─── Jira ─────────────────────────────────────────────────────────

export {
  JiraClient,
  TrackerApiError,
  createJiraClient,
  type JiraClientOptions,
} from './jira/api.js';

export { quoteJql, jqlList, jqlAnd, jqlOr } from './jira/jql.js';

export {
  buildAccountMap,
  buildTeamDirectory,
  normalizeName,
  type TeamNames,
} from './jira/users.js';

// ─── Chat ─────────────────────────────────────────────────────────

export { WebhookAlertSink, LogAlertSink, type WebhookSinkOptions } from './chat/webhook.js';

// ─── Prometheus ───────────────────────────────────────────────────

export {
  createMetricsSink,
  toSamples,
  encodeWriteRequest,
  RemoteWriteSink,
  PushgatewaySink,
  type MetricsSink,
  type MetricSample,
  type MetricsSnapshot,
  type RemoteWriteOptions,
  type PushgatewayOptions,
} from './prometheus/index.js';
