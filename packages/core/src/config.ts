/**
 * Configuration loader.
 * Connection settings and team lists come from environment variables;
 * the workflow tables (status names, aging thresholds, alert window) come
 * from an optional `.flowpulse.yml` file. Both are validated with zod.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { FlowPulseConfig, WorkflowConfig } from './types.js';

const CONFIG_FILENAME = '.flowpulse.yml';

// ─── Workflow File Schema ──────────────────────────────────────────

const statusListSchema = z.array(z.string().min(1)).min(1);

const agingCategorySchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'use snake_case category names'),
  statuses: statusListSchema,
  thresholdDays: z.number().int().min(0),
});

const workflowSchema = z
  .object({
    statuses: z
      .object({
        inProgress: statusListSchema.default(['EN CURSO']),
        done: statusListSchema.default(['Listo para Prod']),
        test: statusListSchema.default(['Test']),
        review: statusListSchema.default(['In Progress C']),
        reworkFrom: statusListSchema.optional(),
      })
      .default({}),
    aging: z.array(agingCategorySchema).optional(),
    criticalPriorities: z.array(z.string().min(1)).min(1).default(['Highest', 'High']),
    alertWindowMinutes: z.number().int().positive().default(5),
    closedWindowDays: z.number().int().positive().default(7),
    maxResults: z.number().int().positive().max(5000).default(100),
  })
  // Rework sources and the review aging category follow the mapped statuses
  .transform(({ statuses, aging, ...rest }): WorkflowConfig => ({
    ...rest,
    statuses: {
      ...statuses,
      reworkFrom: statuses.reworkFrom ?? [...statuses.test, ...statuses.review],
    },
    aging: aging ?? [
      { name: 'paused', statuses: ['Pausado'], thresholdDays: 5 },
      { name: 'pending_architecture_review', statuses: statuses.review, thresholdDays: 1 },
    ],
  }));

// ─── Environment Schema ────────────────────────────────────────────

const optionalUrl = z.string().url().optional();

const envSchema = z.object({
  JIRA_SERVER: z.string().url(),
  JIRA_USER: z.string().min(1),
  JIRA_API_TOKEN: z.string().min(1),
  JIRA_PROJECT_KEY: z.string().regex(/^[A-Z][A-Z0-9_]*$/).default('GRV'),
  CHAT_WEBHOOK_URL: optionalUrl,
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ALERT_DEDUP_MAX_IDLE_CYCLES: z.coerce.number().int().min(0).default(0),
  METRICS_PUSH_MODE: z.enum(['remote_write', 'pushgateway']).default('remote_write'),
  METRICS_PUSH_URL: optionalUrl,
  METRICS_PUSH_USER: z.string().optional(),
  METRICS_PUSH_PASSWORD: z.string().optional(),
  METRICS_JOB_NAME: z.string().min(1).default('flowpulse'),
  DEVELOPER_LIST: z.string().optional(),
  QA_LIST: z.string().optional(),
  PM_LIST: z.string().optional(),
  INTERNAL_USER_LIST: z.string().optional(),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  PORT: z.coerce.number().int().min(1).max(65535).default(10_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_DIR: z.string().optional(),
  FLOWPULSE_CONFIG: z.string().optional(),
});

// ─── Public API ────────────────────────────────────────────────────

/** Default workflow tables when no YAML file is present */
export function getDefaultWorkflowConfig(): WorkflowConfig {
  return workflowSchema.parse({});
}

/**
 * Load and validate the workflow YAML file.
 * Falls back to defaults if the file doesn't exist, unless the path was
 * given explicitly.
 */
export function loadWorkflowConfig(configPath: string, explicit = false): WorkflowConfig {
  if (!fs.existsSync(configPath)) {
    if (explicit) {
      throw new ConfigError(`Workflow config not found: ${configPath}`);
    }
    return getDefaultWorkflowConfig();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`);
  }

  // Convert snake_case YAML keys to camelCase for TS
  const result = workflowSchema.safeParse(normalizeKeys(parsed ?? {}));
  if (!result.success) {
    throw new ConfigError(`Invalid workflow config in ${configPath}`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Build the full runtime configuration from environment variables and the
 * optional workflow file. Throws ConfigError listing every invalid or
 * missing variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): FlowPulseConfig {
  const result = envSchema.safeParse(dropBlank(env));
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Missing or invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = result.data;

  const workflowPath = e.FLOWPULSE_CONFIG
    ? path.resolve(cwd, e.FLOWPULSE_CONFIG)
    : path.join(cwd, CONFIG_FILENAME);
  const workflow = loadWorkflowConfig(workflowPath, e.FLOWPULSE_CONFIG !== undefined);

  return {
    jira: {
      server: e.JIRA_SERVER.replace(/\/+$/, ''),
      user: e.JIRA_USER,
      apiToken: e.JIRA_API_TOKEN,
      projectKey: e.JIRA_PROJECT_KEY,
    },
    alerts: {
      webhookUrl: e.CHAT_WEBHOOK_URL,
      webhookTimeoutMs: e.WEBHOOK_TIMEOUT_MS,
      dedupMaxIdleCycles: e.ALERT_DEDUP_MAX_IDLE_CYCLES,
    },
    metrics: {
      pushMode: e.METRICS_PUSH_MODE,
      pushUrl: e.METRICS_PUSH_URL,
      pushUser: e.METRICS_PUSH_USER,
      pushPassword: e.METRICS_PUSH_PASSWORD,
      jobName: e.METRICS_JOB_NAME,
    },
    team: {
      developerNames: splitList(e.DEVELOPER_LIST),
      qaNames: splitList(e.QA_LIST),
      pmNames: splitList(e.PM_LIST),
      internalUsers: splitList(e.INTERNAL_USER_LIST),
    },
    pollIntervalSeconds: e.POLL_INTERVAL_SECONDS,
    port: e.PORT,
    logging: {
      level: e.LOG_LEVEL,
      dir: e.LOG_DIR,
    },
    workflow,
  };
}

/** Split a comma-separated list, trimming entries and dropping blanks */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// ─── Helpers ───────────────────────────────────────────────────────

/** Treat empty variables (`FOO=`) as unset */
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

/** Recursively convert snake_case keys to camelCase */
function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}
