#!/usr/bin/env node
/**
 * bedlog CLI
 *
 * Records bed-probe points, bed-mesh snapshots and Z-offset corrections
 * from a Moonraker printer daemon.
 *
 * Commands:
 *   run     - Start the sync daemon (alias: start)
 *   sync    - Connect, refresh every store once, exit
 *   status  - Show what the stores hold
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from './commands/run.js';
import { syncCommand } from './commands/sync.js';
import { statusCommand } from './commands/status.js';

const VERSION = '0.1.0';

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n  ✗ unhandled error'));
  console.error(chalk.gray(`  ${reason}`));
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error(chalk.red('\n  ✗ unexpected error'));
  console.error(chalk.gray(`  ${error.message}`));
  process.exit(1);
});

const program = new Command();

program
  .name('bedlog')
  .description('record bed probes, meshes and z-offsets from moonraker')
  .version(VERSION);

program
  .command('run')
  .alias('start')
  .description('start the sync daemon')
  .option('-H, --host <host>', 'moonraker host (overrides MOONRAKER_HOST)')
  .option('-p, --port <port>', 'moonraker port (overrides MOONRAKER_PORT)')
  .option('-i, --interval <hours>', 'hours between periodic syncs (overrides SYNC_INTERVAL_HOURS)')
  .action(runCommand);

program
  .command('sync')
  .description('refresh every store once and exit')
  .option('-H, --host <host>', 'moonraker host (overrides MOONRAKER_HOST)')
  .option('-p, --port <port>', 'moonraker port (overrides MOONRAKER_PORT)')
  .option('-v, --verbose', 'log every sync event')
  .action(syncCommand);

program
  .command('status')
  .description('show record counts and latest entries of each store')
  .action(statusCommand);

program
  .command('version')
  .description('show version and runtime info')
  .action(() => {
    console.log(chalk.cyan('\n  bedlog') + chalk.gray(` v${VERSION}`));
    console.log(chalk.gray(`  runtime: node ${process.version}\n`));
  });

program.parse();
