/**
 * Status Command - What the stores hold
 *
 * Reads the store files only; never connects.
 */

import chalk from 'chalk';
import { loadStorePaths } from '../../config.js';
import type { StorePaths } from '../../store/stores.js';
import { createStores } from '../../store/stores.js';
import { latest } from '../../store/merge.js';
import { EventBus } from '../../events/bus.js';
import { attachConsoleLogger } from '../../logging/console-logger.js';
import { exitOnConfigError, formatEpochSeconds } from './shared.js';

export async function statusCommand(): Promise<void> {
  let paths: StorePaths;
  try {
    paths = loadStorePaths();
  } catch (error) {
    exitOnConfigError(error);
  }

  const events = new EventBus();
  attachConsoleLogger(events, { level: 'warn' });
  const stores = createStores(paths, { events });

  const [probes, meshes, offsets] = await Promise.all([
    stores.probes.load(),
    stores.meshes.load(),
    stores.offsets.load(),
  ]);

  console.log('\n');
  console.log(chalk.cyan('  bedlog status'));
  console.log(chalk.gray('  ─────────────'));
  console.log('\n');

  const lastProbe = latest(probes);
  console.log(`  ${chalk.bold('probes')}   ${probes.length} records  ${chalk.gray(paths.probes)}`);
  if (lastProbe) {
    console.log(chalk.gray(`           latest ${formatEpochSeconds(lastProbe.timestamp)}: (${lastProbe.x}, ${lastProbe.y}) z=${lastProbe.z}`));
  }

  const lastMesh = latest(meshes);
  console.log(`  ${chalk.bold('meshes')}   ${meshes.length} records  ${chalk.gray(paths.meshes)}`);
  if (lastMesh) {
    const rows = lastMesh.probed_matrix.length;
    const cols = lastMesh.probed_matrix[0]?.length ?? 0;
    console.log(chalk.gray(`           latest ${formatEpochSeconds(lastMesh.timestamp)}: '${lastMesh.profile_name ?? 'unnamed'}' ${rows}x${cols}`));
  }

  const lastOffset = latest(offsets);
  console.log(`  ${chalk.bold('offsets')}  ${offsets.length} records  ${chalk.gray(paths.offsets)}`);
  if (lastOffset) {
    console.log(chalk.gray(`           latest ${formatEpochSeconds(lastOffset.timestamp)}: z_offset=${lastOffset.z_offset}`));
  }

  console.log('\n');
}
