/**
 * Aging tickets: open issues in a category's statuses whose last update
 * is more business days ago than the category threshold.
 */

import {
  ParseError,
  businessDaysSince,
  errorMessage,
  parseTrackerTimestamp,
  type AgingCategory,
} from '@flowpulse/core';
import type { MetricSet } from '../snapshot.js';
import type { MetricContext } from '../types.js';
import { statusJql } from '../queries.js';

export async function collectAgingCategory(
  ctx: MetricContext,
  metrics: MetricSet,
  category: AgingCategory
): Promise<void> {
  const jql = statusJql(ctx.projectKey, category.statuses);
  const issues = await ctx.tracker.searchIssues(jql, { maxResults: ctx.workflow.maxResults });
  const now = ctx.clock();
  if (issues.length >= ctx.workflow.maxResults) {
    ctx.logger.warn('collect', `Aging count for ${category.name} capped at ${ctx.workflow.maxResults} issues`, {
      category: category.name,
    });
  }

  const aging: string[] = [];
  for (const issue of issues) {
    try {
      const idleDays = businessDaysSince(parseTrackerTimestamp(issue.updatedAt), now);
      if (idleDays > category.thresholdDays) aging.push(issue.key);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      ctx.logger.warn('collect', `Skipping ${issue.key}: ${errorMessage(error)}`, {
        category: category.name,
      });
    }
  }

  metrics.agingTickets.labels({ category: category.name }).set(aging.length);
  if (aging.length > 0) {
    ctx.logger.debug('collect', `${aging.length} aging tickets in ${category.name}`, { tickets: aging });
  }
}
