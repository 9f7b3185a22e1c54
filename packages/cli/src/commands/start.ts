/**
 * `flowpulse start` command.
 * Runs the worker loop and the liveness server until terminated.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { bootstrap } from '@flowpulse/server';

export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('Start the polling worker and the liveness server')
    .option('--path <dir>', 'Working directory holding .flowpulse.yml', '.')
    .action(async (options: { path: string }) => {
      const cwd = path.resolve(options.path);
      const service = await bootstrap({ cwd });
      const { config } = service;

      console.log(chalk.bold('\n  FlowPulse worker\n'));
      console.log(chalk.gray(`  Tracker:  ${config.jira.server} (project ${config.jira.projectKey})`));
      console.log(chalk.gray(`  Interval: ${config.pollIntervalSeconds}s`));
      console.log(chalk.gray(`  Metrics:  ${config.metrics.pushUrl ? config.metrics.pushMode : 'not published'}`));
      console.log(chalk.gray(`  Alerts:   ${config.alerts.webhookUrl ? 'webhook' : 'log only'}`));
      console.log(chalk.gray(`  Health:   http://localhost:${config.port}/health`));
      console.log('');
    });
}
