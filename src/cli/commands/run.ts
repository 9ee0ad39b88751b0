/**
 * Run Command - Start the Sync Daemon
 *
 * Connects to Moonraker, syncs once, then keeps listening for the mesh
 * trigger and syncing on a timer, reconnecting whenever the link drops.
 */

import chalk from 'chalk';
import { describeConfig, loadConfig, type BedlogConfig } from '../../config.js';
import { EventBus } from '../../events/bus.js';
import { attachConsoleLogger } from '../../logging/console-logger.js';
import { createStores } from '../../store/stores.js';
import { TriggerSupervisor } from '../../supervisor/supervisor.js';
import { WebSocketTransport } from '../../transport/websocket-transport.js';
import { exitOnConfigError } from './shared.js';

interface RunOptions {
  host?: string;
  port?: string;
  interval?: string;
}

export async function runCommand(options: RunOptions): Promise<void> {
  console.log('\n');
  console.log(chalk.cyan('  bedlog sync daemon'));
  console.log(chalk.gray('  ──────────────────'));
  console.log('\n');

  let config: BedlogConfig;
  try {
    config = loadConfig(process.env, {
      host: options.host,
      port: options.port,
      intervalHours: options.interval,
    });
  } catch (error) {
    exitOnConfigError(error);
  }

  console.log(chalk.gray('  settings:'));
  for (const line of describeConfig(config)) {
    console.log(`    ${line}`);
  }
  console.log('\n');

  const events = new EventBus();
  attachConsoleLogger(events, { level: config.logLevel });

  const { url, connectTimeoutMs } = config.moonraker;
  const supervisor = new TriggerSupervisor(
    {
      createTransport: () => new WebSocketTransport(url, { connectTimeoutMs }),
      stores: createStores(config.files, { events }),
      events,
    },
    config.supervisor
  );

  const shutdown = () => {
    console.log(chalk.gray('\n  🛑 user interrupted, shutting down...\n'));
    supervisor.stop().catch((error) => {
      console.error(chalk.red('  error during shutdown:'), error);
      process.exit(1);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  console.log(chalk.gray('  press ctrl+c to stop\n'));
  await supervisor.run();
}
