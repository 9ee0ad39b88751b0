/**
 * Sync Event Types
 *
 * Everything the sync core reports goes through these events.
 * Loggers and tests subscribe to them instead of reading console output.
 */

import type {
  RecordKind,
  RefreshReason,
  RefreshResult,
  SyncOutcome,
} from '../types/index.js';
import type { MalformedFrameError, MalformedStoreError } from '../infra/errors.js';

/**
 * Supervisor connection lifecycle
 */
export type SupervisorState =
  | 'idle'
  | 'connecting'
  | 'syncing'
  | 'running'
  | 'disconnected'
  | 'stopped';

export type SupervisorTask = 'listener' | 'timer';

export type SyncEvent =
  // Supervisor
  | { type: 'supervisor:state'; from: SupervisorState; to: SupervisorState }
  | { type: 'supervisor:error'; state: SupervisorState; error: Error }
  | { type: 'supervisor:retry'; delayMs: number; attempt: number }
  | { type: 'connection:open'; endpoint: string }
  | { type: 'connection:closed'; endpoint: string }
  // Triggers
  | { type: 'listener:listening' }
  | { type: 'trigger:detected'; line: string; settleDelayMs: number }
  | { type: 'timer:sleeping'; intervalMs: number }
  | { type: 'timer:woke'; intervalMs: number }
  | { type: 'task:failed'; task: SupervisorTask; error: Error }
  // Refresh
  | { type: 'refresh:start'; reason: RefreshReason }
  | { type: 'refresh:complete'; result: RefreshResult }
  | { type: 'refresh:failed'; reason: RefreshReason; error: Error }
  | { type: 'sync:fetch'; kind: RecordKind; method: string }
  | { type: 'sync:outcome'; outcome: SyncOutcome }
  // RPC
  | { type: 'rpc:malformed-frame'; error: MalformedFrameError }
  | { type: 'rpc:orphan-reply'; id: number }
  // Store
  | { type: 'store:saved'; filePath: string; count: number }
  | { type: 'store:recovered'; filePath: string; error: MalformedStoreError }
  | { type: 'store:dropped-records'; filePath: string; dropped: number };

export type SyncEventType = SyncEvent['type'];

export type SyncEventOf<T extends SyncEventType> = Extract<SyncEvent, { type: T }>;

/**
 * Event as delivered to listeners
 */
export type EmittedEvent = SyncEvent & { timestamp: Date };

export type EventListener = (event: EmittedEvent) => void;
