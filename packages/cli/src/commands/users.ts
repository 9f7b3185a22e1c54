/**
 * `flowpulse users` command.
 * Resolves DEVELOPER_LIST, QA_LIST and PM_LIST to account ids.
 */

import { Command } from 'commander';
import ora from 'ora';
import * as path from 'node:path';
import { initLogger, loadConfig } from '@flowpulse/core';
import { buildTeamDirectory, createJiraClient } from '@flowpulse/integrations';
import { formatTeam, teamToJson } from '../format.js';

export function registerUsersCommand(program: Command): void {
  program
    .command('users')
    .description('Resolve the configured team name lists to tracker accounts')
    .option('--json', 'Output as JSON')
    .option('--path <dir>', 'Working directory holding .flowpulse.yml', '.')
    .action(async (options: { json?: boolean; path: string }) => {
      const config = loadConfig(process.env, path.resolve(options.path));
      const logger = initLogger({ level: options.json ? 'error' : 'warn' });
      const tracker = createJiraClient({
        server: config.jira.server,
        user: config.jira.user,
        apiToken: config.jira.apiToken,
        logger,
      });

      const spinner = options.json ? null : ora('Resolving users...').start();
      try {
        await tracker.checkConnection();
        const team = await buildTeamDirectory(tracker, config.team, logger);
        spinner?.succeed('Users resolved');

        if (options.json) {
          console.log(JSON.stringify(teamToJson(team), null, 2));
        } else {
          console.log(formatTeam(team));
        }
      } catch (error) {
        spinner?.fail('Could not resolve users');
        throw error;
      }
    });
}
