/**
 * Alert engine.
 *
 * Two independent alert classes, evaluated over a trailing window each
 * cycle:
 * - critical tickets created in the window, one message per ticket (the
 *   window itself is the de-duplication)
 * - the latest comment on critical tickets updated in the window, when
 *   the author is external and the comment id was not alerted before
 *
 * A query failure in one class does not affect the other. A comment that
 * cannot be fetched skips only its ticket. A failed send
 * is logged; the comment is still recorded, so it is not retried.
 */

import {
  ConnectionError,
  ParseError,
  errorMessage,
  type AlertSink,
  type Issue,
  type IssueComment,
  type Logger,
  type TeamDirectory,
  type TrackerClient,
  type WorkflowConfig,
} from '@flowpulse/core';
import { jqlAnd, jqlList, quoteJql } from '@flowpulse/integrations';
import { classifyAuthor } from './classify.js';
import type { AlertDedupState } from './dedup.js';
import { formatCriticalTicketAlert, formatExternalCommentAlert } from './format.js';

// ─── Types ─────────────────────────────────────────────────────────

export interface AlertContext {
  tracker: TrackerClient;
  sink: AlertSink;
  team: TeamDirectory;
  dedup: AlertDedupState;
  workflow: WorkflowConfig;
  projectKey: string;
  /** Tracker base URL used for browse links */
  server: string;
  /** Cycle counter, for dedup bookkeeping */
  cycle: number;
  /** Evict dedup entries idle for more cycles than this; 0 keeps them forever */
  dedupMaxIdleCycles: number;
  logger: Logger;
}

export interface AlertCycleResult {
  /** Messages delivered */
  sent: number;
  /** Candidates skipped: internal author or comment already alerted */
  suppressed: number;
  /** Messages the sink rejected */
  deliveryFailures: number;
  failedCategories: string[];
}

// ─── Queries ───────────────────────────────────────────────────────

export function criticalCreatedJql(projectKey: string, workflow: WorkflowConfig): string {
  return jqlAnd(
    `project = ${quoteJql(projectKey)}`,
    `priority in ${jqlList(workflow.criticalPriorities)}`,
    `created >= "-${workflow.alertWindowMinutes}m"`
  );
}

export function criticalUpdatedJql(projectKey: string, workflow: WorkflowConfig): string {
  return jqlAnd(
    `project = ${quoteJql(projectKey)}`,
    `priority in ${jqlList(workflow.criticalPriorities)}`,
    `updated >= "-${workflow.alertWindowMinutes}m"`
  );
}

// ─── Engine ────────────────────────────────────────────────────────

export async function runAlertCycle(ctx: AlertContext): Promise<AlertCycleResult> {
  const result: AlertCycleResult = { sent: 0, suppressed: 0, deliveryFailures: 0, failedCategories: [] };

  try {
    await alertCriticalTickets(ctx, result);
  } catch (error) {
    result.failedCategories.push('critical_tickets');
    ctx.logger.categoryFailed({ category: 'critical_tickets', error });
  }

  try {
    await alertExternalComments(ctx, result);
  } catch (error) {
    result.failedCategories.push('external_comments');
    ctx.logger.categoryFailed({ category: 'external_comments', error });
  }

  const evicted = ctx.dedup.sweep(ctx.cycle, ctx.dedupMaxIdleCycles);
  if (evicted > 0) {
    ctx.logger.debug('alerts', `Evicted ${evicted} idle dedup entries`, { remaining: ctx.dedup.size });
  }

  return result;
}

async function alertCriticalTickets(ctx: AlertContext, result: AlertCycleResult): Promise<void> {
  const issues = await ctx.tracker.searchIssues(criticalCreatedJql(ctx.projectKey, ctx.workflow), {
    maxResults: ctx.workflow.maxResults,
  });

  for (const issue of issues) {
    await deliver(ctx, result, issue, formatCriticalTicketAlert(issue, ctx.server));
  }
}

async function alertExternalComments(ctx: AlertContext, result: AlertCycleResult): Promise<void> {
  const issues = await ctx.tracker.searchIssues(criticalUpdatedJql(ctx.projectKey, ctx.workflow), {
    maxResults: ctx.workflow.maxResults,
  });

  for (const issue of issues) {
    ctx.dedup.touch(issue.key, ctx.cycle);

    let comment: IssueComment | null;
    try {
      comment = await ctx.tracker.getLatestComment(issue.key);
    } catch (error) {
      if (!(error instanceof ParseError || error instanceof ConnectionError)) throw error;
      ctx.logger.warn('alerts', `Skipping comments of ${issue.key}: ${errorMessage(error)}`);
      continue;
    }
    if (!comment) continue;

    if (classifyAuthor(comment, ctx.team) === 'internal') {
      result.suppressed++;
      continue;
    }
    if (!ctx.dedup.shouldAlert(issue.key, comment.id)) {
      result.suppressed++;
      continue;
    }

    await deliver(ctx, result, issue, formatExternalCommentAlert(issue, comment, ctx.server));
    ctx.dedup.record(issue.key, comment.id, ctx.cycle);
  }
}

async function deliver(
  ctx: AlertContext,
  result: AlertCycleResult,
  issue: Issue,
  message: string
): Promise<void> {
  try {
    await ctx.sink.send(message);
    result.sent++;
    ctx.logger.info('alerts', `Alert sent for ${issue.key}`, { sink: ctx.sink.name });
  } catch (error) {
    result.deliveryFailures++;
    ctx.logger.error('alerts', `Alert for ${issue.key} not delivered: ${errorMessage(error)}`, {
      sink: ctx.sink.name,
    });
  }
}
