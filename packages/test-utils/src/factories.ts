/**
 * Factory functions for creating test fixtures.
 *
 * Every factory produces a valid instance of the core types with sensible
 * defaults. Override any field by passing a partial object.
 */
import {
  getDefaultWorkflowConfig,
  type ChangeEvent,
  type FlowPulseConfig,
  type Issue,
  type IssueComment,
  type TeamDirectory,
} from '@flowpulse/core';

let _idCounter = 0;

/** Reset the auto-incrementing ID counter. Call in beforeEach if needed. */
export function resetIdCounter(): void {
  _idCounter = 0;
}

function nextId(): number {
  return ++_idCounter;
}

/**
 * Create a test Issue.
 *
 * @example
 * ```ts
 * const issue = createIssue({ status: 'Test', priority: 'Highest' });
 * ```
 */
export function createIssue(overrides: Partial<Issue> = {}): Issue {
  const key = overrides.key ?? `GRV-${nextId()}`;
  return {
    key,
    summary: `Summary of ${key}`,
    status: 'EN CURSO',
    reporterName: 'Reporter',
    priority: 'Medium',
    createdAt: '2024-01-15T09:00:00.000+0000',
    updatedAt: '2024-01-15T09:00:00.000+0000',
    components: [],
    changelog: [],
    ...overrides,
  };
}

/** A status transition changelog entry */
export function statusChange(
  from: string | null,
  to: string | null,
  timestamp: string,
  authorId?: string
): ChangeEvent {
  return { field: 'status', from, to, timestamp, ...(authorId ? { authorId } : {}) };
}

/** Create a test IssueComment */
export function createComment(overrides: Partial<IssueComment> = {}): IssueComment {
  return {
    issueKey: 'GRV-1',
    id: String(10_000 + nextId()),
    authorId: 'acc-external',
    authorName: 'External User',
    createdAt: '2024-01-15T09:00:00.000+0000',
    ...overrides,
  };
}

/**
 * Create a team directory from plain id → name records. Internal sets
 * are derived from every group, like the real directory builder does.
 */
export function createTeamDirectory(
  groups: {
    developers?: Record<string, string>;
    qa?: Record<string, string>;
    pm?: Record<string, string>;
  } = {}
): TeamDirectory {
  const developers = new Map(Object.entries(groups.developers ?? {}));
  const qa = new Map(Object.entries(groups.qa ?? {}));
  const pm = new Map(Object.entries(groups.pm ?? {}));
  const all = [...developers, ...qa, ...pm];
  return {
    developers,
    qa,
    pm,
    internalIds: new Set(all.map(([id]) => id)),
    internalNames: new Set(all.map(([, name]) => name.toLowerCase())),
  };
}

/** Create a complete runtime configuration with test placeholders */
export function createConfig(overrides: Partial<FlowPulseConfig> = {}): FlowPulseConfig {
  return {
    jira: {
      server: 'https://tracker.test',
      user: 'bot@example.com',
      apiToken: 'test-token',
      projectKey: 'GRV',
    },
    alerts: {
      webhookUrl: 'https://chat.test/hook',
      webhookTimeoutMs: 1000,
      dedupMaxIdleCycles: 0,
    },
    metrics: {
      pushMode: 'remote_write',
      pushUrl: 'https://metrics.test/api/prom/push',
      pushUser: 'test-instance',
      pushPassword: 'test-secret',
      jobName: 'flowpulse',
    },
    team: {
      developerNames: [],
      qaNames: [],
      pmNames: [],
      internalUsers: [],
    },
    pollIntervalSeconds: 300,
    port: 10_000,
    logging: { level: 'error' },
    workflow: getDefaultWorkflowConfig(),
    ...overrides,
  };
}
