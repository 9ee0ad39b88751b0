/**
 * Sync Command - One-shot Refresh
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, type BedlogConfig } from '../../config.js';
import { EventBus } from '../../events/bus.js';
import { isRpcError, isTransportError } from '../../infra/errors.js';
import { attachConsoleLogger } from '../../logging/console-logger.js';
import { createStores } from '../../store/stores.js';
import { syncOnce } from '../../sync/once.js';
import { WebSocketTransport } from '../../transport/websocket-transport.js';
import type { SyncOutcome } from '../../types/index.js';
import { exitOnConfigError } from './shared.js';

interface SyncOptions {
  host?: string;
  port?: string;
  verbose?: boolean;
}

export async function syncCommand(options: SyncOptions): Promise<void> {
  let config: BedlogConfig;
  try {
    config = loadConfig(process.env, { host: options.host, port: options.port });
  } catch (error) {
    exitOnConfigError(error);
  }

  const events = new EventBus();
  attachConsoleLogger(events, { level: options.verbose ? 'debug' : 'warn' });

  const { url, connectTimeoutMs } = config.moonraker;
  const spinner = ora(`syncing from ${url}`).start();

  try {
    const result = await syncOnce({
      createTransport: () => new WebSocketTransport(url, { connectTimeoutMs }),
      stores: createStores(config.files, { events }),
      events,
    });
    spinner.succeed(`sync complete in ${result.durationMs}ms`);

    console.log('\n');
    for (const outcome of result.outcomes) {
      console.log(`    ${outcome.kind.padEnd(8)} ${describeOutcome(outcome)}`);
    }
    console.log('\n');
  } catch (error) {
    spinner.fail('sync failed');
    console.error(chalk.red('\n  error:'), error instanceof Error ? error.message : String(error));
    const hint = hintFor(error);
    if (hint) console.error(chalk.gray(`  ${hint}`));
    console.log('\n');
    process.exitCode = 1;
  }
}

function hintFor(error: unknown): string | undefined {
  if (isTransportError(error)) return 'check MOONRAKER_HOST / MOONRAKER_PORT and that Moonraker is running';
  if (isRpcError(error)) return 'Moonraker rejected the request; is Klippy connected?';
  return undefined;
}

function describeOutcome(outcome: SyncOutcome): string {
  switch (outcome.status) {
    case 'updated':
      return chalk.green(`+${outcome.added} new`) + chalk.gray(` (${outcome.fetched} upstream)`);
    case 'no_new_data':
      return chalk.gray('up to date');
    case 'no_data':
      return chalk.yellow('nothing upstream');
  }
}
