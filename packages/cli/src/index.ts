#!/usr/bin/env tsx

/**
 * @flowpulse/cli - Main CLI entry point for FlowPulse.
 * Runs the Jira workflow-metrics worker, single cycles, and team lookups.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { ConfigError, ConnectionError } from '@flowpulse/core';
import { loadDotenv } from './env.js';
import { registerStartCommand } from './commands/start.js';
import { registerOnceCommand } from './commands/once.js';
import { registerUsersCommand } from './commands/users.js';

loadDotenv(process.cwd());

const program = new Command();

program
  .name('flowpulse')
  .version('0.1.0')
  .description('Jira workflow metrics and critical-ticket alerts');

// Register all subcommands
registerStartCommand(program);
registerOnceCommand(program);
registerUsersCommand(program);

// Global error handler
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      process.exit(error.exitCode);
    }
    if (error instanceof ConfigError) {
      if (error.issues.length === 0) {
        console.error(chalk.red(`\nCRITICAL: ${error.message}`));
      } else {
        console.error(chalk.red('\nCRITICAL: missing or invalid configuration'));
        for (const issue of error.issues) {
          console.error(chalk.red(`  - ${issue}`));
        }
      }
      process.exit(1);
    }
    if (error instanceof ConnectionError) {
      console.error(chalk.red(`\nCRITICAL: could not connect to Jira: ${error.message}`));
      process.exit(1);
    }
    if (error instanceof Error) {
      console.error(chalk.red(`\nError: ${error.message}`));
      if (process.env.FLOWPULSE_DEBUG) {
        console.error(chalk.gray(error.stack ?? ''));
      }
      process.exit(1);
    }
    console.error(chalk.red(`\nError: ${String(error)}`));
    process.exit(1);
  }
}

void main();
