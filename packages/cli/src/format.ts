/**
 * Terminal formatting for `once` and `users`.
 */

import chalk from 'chalk';
import type { AccountMap, TeamDirectory } from '@flowpulse/core';
import type { MetricSample } from '@flowpulse/integrations';
import type { CycleReport } from '@flowpulse/server';

/** Render a sample in Prometheus exposition style: `name{k="v"} value` */
export function formatSample(sample: MetricSample): string {
  const labels = Object.entries(sample.labels)
    .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
    .join(',');
  return `${sample.name}${labels ? `{${labels}}` : ''} ${sample.value}`;
}

export function formatSamples(samples: readonly MetricSample[]): string {
  if (samples.length === 0) return chalk.gray('  (no samples)');
  return [...samples]
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((s) => `  ${formatSample(s)}`)
    .join('\n');
}

/** One-paragraph summary of a cycle */
export function formatReport(report: CycleReport): string {
  const lines = [
    chalk.bold(`\n  Cycle ${report.cycle}`) + chalk.gray(` (${report.cycleId}, ${report.durationMs} ms)`),
    `  Series:     ${chalk.cyan(String(report.series))}`,
    `  Published:  ${report.published ? chalk.green('yes') : chalk.gray('no')}`,
    `  Alerts:     ${report.alertsSent} sent, ${report.alertsSuppressed} suppressed` +
      (report.alertDeliveryFailures > 0 ? chalk.red(`, ${report.alertDeliveryFailures} failed`) : ''),
  ];
  if (report.failedCategories.length > 0) {
    lines.push(`  Failed:     ${chalk.yellow(report.failedCategories.join(', '))}`);
  }
  if (report.error) {
    lines.push(`  Error:      ${chalk.red(report.error)}`);
  }
  return lines.join('\n');
}

function formatGroup(title: string, accounts: AccountMap): string[] {
  const lines = [chalk.bold(`  ${title} (${accounts.size})`)];
  if (accounts.size === 0) {
    lines.push(chalk.gray('    none resolved'));
  }
  for (const [accountId, name] of accounts) {
    lines.push(`    ${name} ${chalk.gray(accountId)}`);
  }
  return lines;
}

export function formatTeam(team: TeamDirectory): string {
  return [
    '',
    ...formatGroup('Developers', team.developers),
    '',
    ...formatGroup('QA', team.qa),
    '',
    ...formatGroup('PM', team.pm),
    '',
  ].join('\n');
}

/** Plain-object form of the directory for --json output */
export function teamToJson(team: TeamDirectory): Record<string, unknown> {
  return {
    developers: Object.fromEntries(team.developers),
    qa: Object.fromEntries(team.qa),
    pm: Object.fromEntries(team.pm),
    internalIds: [...team.internalIds].sort(),
  };
}
