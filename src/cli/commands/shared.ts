/**
 * Helpers shared by the CLI commands
 */

import chalk from 'chalk';
import { ConfigError } from '../../infra/errors.js';

/**
 * Print a configuration error and exit
 */
export function exitOnConfigError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.log(chalk.red('\n  ❌ one or more environment variables are not set or invalid:'));
    for (const issue of error.issues) {
      console.log(chalk.gray(`     ${issue}`));
    }
    console.log(chalk.gray('\n  check your .env file (see .env.example)\n'));
  } else {
    console.error(chalk.red('\n  error:'), error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

/**
 * Epoch seconds as local date and time
 */
export function formatEpochSeconds(seconds: number): string {
  return new Date(seconds * 1000).toLocaleString();
}
