/**
 * QA testing time: business days between entering a test status and the
 * next status change, for issues a QA account moved out of test.
 */

import { ParseError, businessDuration, errorMessage, hoursToBusinessDays } from '@flowpulse/core';
import type { MetricSet } from '../snapshot.js';
import { ANY_STATE, type MetricContext } from '../types.js';
import { qaHandoffJql } from '../queries.js';
import { reduceChangelog } from './changelog.js';

export async function collectQaTesting(ctx: MetricContext, metrics: MetricSet): Promise<void> {
  const qaIds = [...ctx.team.qa.keys()];
  if (qaIds.length === 0) {
    ctx.logger.debug('collect', 'No QA accounts resolved; skipping QA testing time');
    return;
  }

  const { statuses, closedWindowDays, maxResults } = ctx.workflow;
  const jql = qaHandoffJql(ctx.projectKey, statuses, qaIds, closedWindowDays);
  const issues = await ctx.tracker.searchIssues(jql, { expandChangelog: true, maxResults });
  ctx.logger.debug('collect', `Fetched ${issues.length} QA hand-off issues`);

  for (const issue of issues) {
    try {
      const { startTime, endTime } = reduceChangelog(issue.changelog, {
        startStates: statuses.test,
        endStates: ANY_STATE,
      });
      if (startTime && endTime) {
        metrics.qaTestingTime.observe(hoursToBusinessDays(businessDuration(startTime, endTime)));
      }
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      ctx.logger.warn('collect', `Skipping ${issue.key}: ${errorMessage(error)}`);
    }
  }
}
