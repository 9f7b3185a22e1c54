/**
 * JQL for each metric category. Status names always come from the
 * workflow configuration.
 */

import type { StatusMapping } from '@flowpulse/core';
import { jqlAnd, jqlList, jqlOr, quoteJql } from '@flowpulse/integrations';

function project(projectKey: string): string {
  return `project = ${quoteJql(projectKey)}`;
}

/** Open issues assigned to a developer in an in-progress status */
export function inProgressJql(projectKey: string, statuses: StatusMapping, accountId: string): string {
  return jqlAnd(
    project(projectKey),
    `status in ${jqlList(statuses.inProgress)}`,
    `assignee = ${quoteJql(accountId)}`
  );
}

/** Issues of a developer that reached a done status in the trailing window */
export function recentlyClosedJql(
  projectKey: string,
  statuses: StatusMapping,
  accountId: string,
  windowDays: number
): string {
  return jqlAnd(
    project(projectKey),
    jqlOr(statuses.done.map((s) => `status changed to ${quoteJql(s)}`)),
    `assignee = ${quoteJql(accountId)}`,
    `updated >= -${windowDays}d`
  );
}

/** Issues a QA account moved out of a test status in the trailing window */
export function qaHandoffJql(
  projectKey: string,
  statuses: StatusMapping,
  qaAccountIds: readonly string[],
  windowDays: number
): string {
  const by = jqlList(qaAccountIds);
  return jqlAnd(
    project(projectKey),
    jqlOr(statuses.test.map((s) => `status changed from ${quoteJql(s)} by ${by} after -${windowDays}d`))
  );
}

/** Issues currently in any of the given statuses */
export function statusJql(projectKey: string, statuses: readonly string[]): string {
  return jqlAnd(project(projectKey), `status in ${jqlList(statuses)}`);
}

