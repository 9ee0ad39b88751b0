/**
 * Console Logger
 *
 * Turns sync events into timestamped, colored console lines:
 *   2024-05-01 12:00:00 INFO  [Sync] ✨ Found 3 new probe points to add
 */

import chalk from 'chalk';
import type { EventBus } from '../events/bus.js';
import type { EmittedEvent } from '../events/types.js';
import type { RecordKind, RefreshReason, SyncOutcome } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogLine {
  level: LogLevel;
  component: string;
  message: string;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Defaults to the global console */
  output?: Pick<Console, 'log' | 'warn' | 'error'>;
}

const KIND_LABELS: Record<RecordKind, string> = {
  probes: 'probe points',
  offsets: 'Z-offset entries',
  meshes: 'bed mesh',
};

const REASON_LABELS: Record<RefreshReason, string> = {
  initial: 'Initial',
  trigger: 'Triggered',
  periodic: 'Scheduled',
  manual: 'Manual',
};

/**
 * Log line for an event, or null for events that are not logged
 */
export function formatEvent(event: EmittedEvent): LogLine | null {
  switch (event.type) {
    case 'supervisor:state':
      if (event.to === 'stopped') {
        return line('info', 'Supervisor', '🛑 Stopped');
      }
      return line('debug', 'Supervisor', `${event.from} → ${event.to}`);
    case 'supervisor:error':
      return line('warn', 'Supervisor', `Connection to Moonraker lost or failed while ${event.state}: ${event.error.message}`);
    case 'supervisor:retry':
      return line('info', 'Supervisor', `Retrying connection in ${event.delayMs / 1000} seconds (attempt ${event.attempt})...`);
    case 'connection:open':
      return line('info', 'Connection', `🔗 Connected to ${event.endpoint}`);
    case 'connection:closed':
      return line('info', 'Connection', `🔌 Connection to ${event.endpoint} closed`);
    case 'listener:listening':
      return line('info', 'Listener', "📡 Listening for 'Mesh Bed Leveling Complete' trigger...");
    case 'trigger:detected':
      return line(
        'info',
        'Listener',
        `🔴 TRIGGER DETECTED: ${event.line} (waiting ${event.settleDelayMs / 1000} seconds for mesh data to stabilize)`
      );
    case 'timer:sleeping':
      return line('info', 'Timer', `⏳ Periodic sync sleeping for ${formatHours(event.intervalMs)} hours...`);
    case 'timer:woke':
      return line('info', 'Timer', `⏰ Waking up for scheduled ${formatHours(event.intervalMs)}-hour sync`);
    case 'task:failed':
      return line('error', 'Supervisor', `❌ ${event.task} task failed: ${event.error.message}`);
    case 'refresh:start':
      return line('info', 'Sync', `--- Starting ${REASON_LABELS[event.reason].toLowerCase()} data refresh ---`);
    case 'refresh:complete':
      return line(
        'info',
        'Sync',
        `--- ${REASON_LABELS[event.result.reason]} refresh complete in ${event.result.durationMs}ms ---`
      );
    case 'refresh:failed':
      return line('error', 'Sync', `❌ ${REASON_LABELS[event.reason]} refresh failed: ${event.error.message}`);
    case 'sync:fetch':
      return line('debug', 'Sync', `Requesting ${event.method} for ${KIND_LABELS[event.kind]}...`);
    case 'sync:outcome':
      return formatOutcome(event.outcome);
    case 'rpc:malformed-frame':
      return line('warn', 'RPC', `Skipped ${event.error.message.toLowerCase()}: ${event.error.excerpt}`);
    case 'rpc:orphan-reply':
      return line('debug', 'RPC', `Dropped reply #${event.id}, nobody was waiting for it`);
    case 'store:saved':
      return line('info', 'Store', `💾 Data saved to ${event.filePath} (${event.count} records)`);
    case 'store:recovered':
      return line('warn', 'Store', `${event.error.message}, treating it as empty`);
    case 'store:dropped-records':
      return line('warn', 'Store', `Ignored ${event.dropped} invalid record(s) in ${event.filePath}, left in the file as they are`);
  }
}

function formatOutcome(outcome: SyncOutcome): LogLine {
  const label = KIND_LABELS[outcome.kind];

  if (outcome.kind === 'meshes') {
    switch (outcome.status) {
      case 'updated':
        return line('info', 'Sync', '✨ Bed mesh is new. Added it to the file');
      case 'no_new_data':
        return line('info', 'Sync', '👍 Bed mesh is identical to the last saved version');
      case 'no_data':
        return line('info', 'Sync', '🕸️ No bed mesh reported by the printer');
    }
  }

  switch (outcome.status) {
    case 'updated':
      return line('info', 'Sync', `✨ Found ${outcome.added} new ${label} to add (${outcome.fetched} upstream)`);
    case 'no_new_data':
      return line('info', 'Sync', `👍 ${capitalize(label)} file is already up-to-date`);
    case 'no_data':
      return line('debug', 'Sync', `No ${label} found in gcode_store`);
  }
}

/**
 * Print every event at or above `level`. Returns a detach function.
 */
export function attachConsoleLogger(bus: EventBus, options: ConsoleLoggerOptions = {}): () => void {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const output = options.output ?? console;

  return bus.on((event) => {
    const entry = formatEvent(event);
    if (!entry || LEVEL_ORDER[entry.level] < threshold) return;

    const text = renderLine(entry, event.timestamp);
    if (entry.level === 'error') {
      output.error(text);
    } else if (entry.level === 'warn') {
      output.warn(text);
    } else {
      output.log(text);
    }
  });
}

export function renderLine(entry: LogLine, timestamp: Date): string {
  const level = entry.level.toUpperCase().padEnd(5);
  const colored =
    entry.level === 'error' ? chalk.red(level) :
    entry.level === 'warn' ? chalk.yellow(level) :
    entry.level === 'debug' ? chalk.gray(level) :
    chalk.cyan(level);

  return `${chalk.gray(formatTimestamp(timestamp))} ${colored} ${chalk.bold(`[${entry.component}]`)} ${entry.message}`;
}

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function formatHours(ms: number): string {
  return String(Number((ms / 3_600_000).toFixed(2)));
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function line(level: LogLevel, component: string, message: string): LogLine {
  return { level, component, message };
}
