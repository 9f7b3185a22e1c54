/**
 * `flowpulse once` command.
 * Runs a single cycle and prints the resulting metric samples.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'node:path';
import { PartialDataError, initLogger, loadConfig } from '@flowpulse/core';
import { createWorker } from '@flowpulse/server';
import { formatReport, formatSamples } from '../format.js';

/** Exit code when some categories failed but a snapshot was produced */
export const EXIT_PARTIAL = 2;

export function registerOnceCommand(program: Command): void {
  program
    .command('once')
    .description('Run a single polling cycle and print the metric snapshot')
    .option('--json', 'Output as JSON')
    .option('--no-publish', 'Do not push metrics to the backend')
    .option('--no-alerts', 'Do not evaluate or send alerts')
    .option('--path <dir>', 'Working directory holding .flowpulse.yml', '.')
    .action(
      async (options: { json?: boolean; publish: boolean; alerts: boolean; path: string }) => {
        const config = loadConfig(process.env, path.resolve(options.path));
        const logger = initLogger({
          level: options.json ? 'error' : config.logging.level,
          logDir: config.logging.dir,
        });

        const spinner = options.json ? null : ora('Connecting to Jira...').start();

        try {
          const worker = await createWorker(config, logger);
          if (spinner) spinner.text = 'Running cycle...';

          const { report, snapshot } = await worker.runOnce({
            publish: options.publish,
            alerts: options.alerts,
          });

          if (options.json) {
            console.log(JSON.stringify({ report, samples: snapshot?.samples ?? [] }, null, 2));
          } else {
            if (report.ok) {
              spinner?.succeed('Cycle complete');
            } else {
              spinner?.fail('Cycle aborted');
            }
            console.log(formatReport(report));
            console.log('');
            console.log(formatSamples(snapshot?.samples ?? []));
            console.log('');
          }

          if (!report.ok) {
            process.exitCode = 1;
          } else if (report.failedCategories.length > 0) {
            const partial = new PartialDataError([...report.failedCategories]);
            console.error(chalk.yellow(`  ${partial.message}`));
            process.exitCode = EXIT_PARTIAL;
          }
        } catch (error) {
          spinner?.fail('Cycle failed');
          throw error;
        } finally {
          logger.close();
        }
      }
    );
}
