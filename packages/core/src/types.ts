/**
 * Shared type definitions for the FlowPulse worker.
 * All interfaces and types used across packages are defined here.
 */

// ─── Time ──────────────────────────────────────────────────────────

/** Injectable source of "now" */
export type Clock = () => Date;

/**
 * A timezone-aware instant as reported by the tracker.
 * The offset is kept so calendar dates can be taken in the
 * timezone the timestamp was written in.
 */
export interface TrackerTimestamp {
  epochMs: number;
  /** Offset from UTC in minutes (e.g. -180 for -03:00) */
  offsetMinutes: number;
}

// ─── Tracker Types ─────────────────────────────────────────────────

/** A single field change from an issue's changelog */
export interface ChangeEvent {
  /** Changed field; only "status" events are interpreted */
  field: string;
  from: string | null;
  to: string | null;
  /** Raw tracker timestamp, parsed on demand */
  timestamp: string;
  /** Account that performed the change */
  authorId?: string;
}

/** An issue as seen by the metric and alert engines */
export interface Issue {
  key: string;
  summary: string;
  status: string;
  assigneeId?: string;
  assigneeName?: string;
  reporterName: string;
  priority: string;
  createdAt: string;
  updatedAt: string;
  components: string[];
  /** Status history; may be empty when the changelog was not expanded */
  changelog: ChangeEvent[];
}

/** A comment on an issue */
export interface IssueComment {
  issueKey: string;
  id: string;
  authorId: string;
  authorName: string;
  createdAt: string;
}

/** Tracker account as returned by a user search */
export interface TrackerUser {
  accountId: string;
  displayName: string;
}

// ─── Team Types ────────────────────────────────────────────────────

/** Role groups whose members are resolved at startup */
export type TeamGroup = 'developers' | 'qa' | 'pm';

/** Account id → display name for one role group */
export type AccountMap = ReadonlyMap<string, string>;

/** Resolved team membership, built once per process */
export interface TeamDirectory {
  developers: AccountMap;
  qa: AccountMap;
  pm: AccountMap;
  /** Account ids treated as internal when classifying comment authors */
  internalIds: ReadonlySet<string>;
  /** Display names treated as internal when classifying comment authors */
  internalNames: ReadonlySet<string>;
}

// ─── Configuration Types ───────────────────────────────────────────

/** Logical workflow states mapped to the tracker's status names */
export interface StatusMapping {
  inProgress: string[];
  done: string[];
  test: string[];
  review: string[];
  reworkFrom: string[];
}

/** An aging category: open tickets idle longer than the threshold */
export interface AgingCategory {
  name: string;
  statuses: string[];
  thresholdDays: number;
}

/** Workflow tables, loaded from the optional YAML file */
export interface WorkflowConfig {
  statuses: StatusMapping;
  aging: AgingCategory[];
  criticalPriorities: string[];
  alertWindowMinutes: number;
  closedWindowDays: number;
  maxResults: number;
}

export type MetricsPushMode = 'remote_write' | 'pushgateway';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Complete runtime configuration */
export interface FlowPulseConfig {
  jira: {
    server: string;
    user: string;
    apiToken: string;
    projectKey: string;
  };
  alerts: {
    webhookUrl?: string;
    webhookTimeoutMs: number;
    dedupMaxIdleCycles: number;
  };
  metrics: {
    pushMode: MetricsPushMode;
    pushUrl?: string;
    pushUser?: string;
    pushPassword?: string;
    jobName: string;
  };
  team: {
    developerNames: string[];
    qaNames: string[];
    pmNames: string[];
    internalUsers: string[];
  };
  pollIntervalSeconds: number;
  port: number;
  logging: {
    level: LogLevel;
    dir?: string;
  };
  workflow: WorkflowConfig;
}
