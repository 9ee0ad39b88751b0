/**
 * bedlog Configuration
 * Read from the environment (.env is loaded by the CLI entry point).
 */

import { z } from 'zod';
import { ConfigError } from './infra/errors.js';
import type { LogLevel } from './logging/console-logger.js';
import type { StorePaths } from './store/stores.js';
import type { SupervisorConfig } from './supervisor/supervisor.js';
import { moonrakerUrl } from './transport/websocket-transport.js';

export interface MoonrakerConfig {
  host: string;
  port: number;
  url: string;
  connectTimeoutMs: number;
}

export interface BedlogConfig {
  moonraker: MoonrakerConfig;
  files: StorePaths;
  supervisor: SupervisorConfig;
  logLevel: LogLevel;
}

/**
 * Values given on the command line win over the environment
 */
export interface ConfigOverrides {
  host?: string;
  port?: string;
  intervalHours?: string;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredString = () =>
  z.preprocess(blankToUndefined, z.string({ required_error: 'not set' }).trim());

const numberWithDefault = (fallback: number, schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).default(fallback));

const envSchema = z.object({
  MOONRAKER_HOST: requiredString(),
  MOONRAKER_PORT: numberWithDefault(7125, z.number().int().min(1).max(65535)),
  PROBE_DATA_FILE: requiredString(),
  MESH_DATA_FILE: requiredString(),
  Z_OFFSET_DATA_FILE: requiredString(),
  SYNC_INTERVAL_HOURS: numberWithDefault(6, z.number().positive()),
  RETRY_DELAY_SECONDS: numberWithDefault(30, z.number().nonnegative()),
  SETTLE_DELAY_SECONDS: numberWithDefault(30, z.number().nonnegative()),
  CONNECT_TIMEOUT_SECONDS: numberWithDefault(10, z.number().positive()),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
});

/**
 * Build the configuration from environment variables
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): BedlogConfig {
  const merged: Record<string, string | undefined> = {
    ...env,
    ...(overrides.host !== undefined && { MOONRAKER_HOST: overrides.host }),
    ...(overrides.port !== undefined && { MOONRAKER_PORT: overrides.port }),
    ...(overrides.intervalHours !== undefined && { SYNC_INTERVAL_HOURS: overrides.intervalHours }),
  };

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    moonraker: {
      host: vars.MOONRAKER_HOST,
      port: vars.MOONRAKER_PORT,
      url: moonrakerUrl(vars.MOONRAKER_HOST, vars.MOONRAKER_PORT),
      connectTimeoutMs: vars.CONNECT_TIMEOUT_SECONDS * 1000,
    },
    files: {
      probes: vars.PROBE_DATA_FILE,
      meshes: vars.MESH_DATA_FILE,
      offsets: vars.Z_OFFSET_DATA_FILE,
    },
    supervisor: {
      intervalMs: vars.SYNC_INTERVAL_HOURS * 60 * 60 * 1000,
      retryDelayMs: vars.RETRY_DELAY_SECONDS * 1000,
      settleDelayMs: vars.SETTLE_DELAY_SECONDS * 1000,
    },
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Store paths only, for commands that never connect
 */
export function loadStorePaths(env: Record<string, string | undefined> = process.env): StorePaths {
  const schema = envSchema.pick({ PROBE_DATA_FILE: true, MESH_DATA_FILE: true, Z_OFFSET_DATA_FILE: true });
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return {
    probes: parsed.data.PROBE_DATA_FILE,
    meshes: parsed.data.MESH_DATA_FILE,
    offsets: parsed.data.Z_OFFSET_DATA_FILE,
  };
}

/**
 * Summary lines for the startup banner
 */
export function describeConfig(config: BedlogConfig): string[] {
  const hours = config.supervisor.intervalMs / 3_600_000;
  return [
    `moonraker:  ${config.moonraker.url}`,
    `probes:     ${config.files.probes}`,
    `meshes:     ${config.files.meshes}`,
    `offsets:    ${config.files.offsets}`,
    `interval:   ${hours} hours`,
    `retry:      ${config.supervisor.retryDelayMs / 1000} seconds`,
    `settle:     ${config.supervisor.settleDelayMs / 1000} seconds`,
  ];
}
