/**
 * Per-developer collectors: in-progress load, cycle time and rework.
 */

import { ParseError, errorMessage } from '@flowpulse/core';
import type { MetricSet } from '../snapshot.js';
import type { MetricContext, ReduceResult } from '../types.js';
import { inProgressJql, recentlyClosedJql } from '../queries.js';
import { cycleHours, reduceChangelog } from './changelog.js';

/**
 * Set `dev_tickets_in_progress_count` for every resolved developer.
 */
export async function collectDeveloperLoad(ctx: MetricContext, metrics: MetricSet): Promise<void> {
  const { statuses } = ctx.workflow;

  for (const [accountId, name] of ctx.team.developers) {
    const jql = inProgressJql(ctx.projectKey, statuses, accountId);
    ctx.logger.debug('collect', 'Counting in-progress tickets', { developer: name, jql });
    const count = await ctx.tracker.countIssues(jql);
    metrics.devInProgress.labels({ developer: name }).set(count);
  }
}

/**
 * Observe cycle time and count rework over each developer's recently
 * closed issues. Issues with unparsable history are skipped.
 */
export async function collectDeveloperCycle(ctx: MetricContext, metrics: MetricSet): Promise<void> {
  const { statuses, closedWindowDays, maxResults } = ctx.workflow;

  for (const [accountId, name] of ctx.team.developers) {
    const jql = recentlyClosedJql(ctx.projectKey, statuses, accountId, closedWindowDays);
    const issues = await ctx.tracker.searchIssues(jql, { expandChangelog: true, maxResults });
    ctx.logger.debug('collect', `Fetched ${issues.length} closed issues`, { developer: name });

    for (const issue of issues) {
      let result: ReduceResult;
      try {
        result = reduceChangelog(issue.changelog, {
          startStates: statuses.inProgress,
          endStates: statuses.done,
          reworkFromStates: statuses.reworkFrom,
          reworkToState: statuses.inProgress,
        });
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        ctx.logger.warn('collect', `Skipping ${issue.key}: ${errorMessage(error)}`, { developer: name });
        continue;
      }

      const hours = cycleHours(result);
      if (hours !== undefined) {
        metrics.devCycleTime.labels({ developer: name }).observe(hours);
      }
      if (result.reworkCount > 0) {
        metrics.devRework.labels({ developer: name }).inc(result.reworkCount);
      }
    }
  }
}
