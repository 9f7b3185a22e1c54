/**
 * Alert message formatting (Slack-style mrkdwn links and bold).
 */

import type { Issue, IssueComment } from '@flowpulse/core';

function issueLink(server: string, issue: Issue): string {
  return `<${server}/browse/${issue.key}|${issue.key}> - *${issue.summary}*`;
}

export function formatCriticalTicketAlert(issue: Issue, server: string): string {
  const component = issue.components[0] ?? 'N/A';
  return [
    '🚨 *New Critical Ticket*',
    '',
    issueLink(server, issue),
    `*Reporter:* ${issue.reporterName}`,
    `*Component:* ${component}`,
  ].join('\n');
}

export function formatExternalCommentAlert(issue: Issue, comment: IssueComment, server: string): string {
  return [
    '⚠️ *New Comment on Critical Ticket*',
    '',
    issueLink(server, issue),
    `*Comment author:* ${comment.authorName}`,
  ].join('\n');
}
