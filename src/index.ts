/**
 * bedlog - Moonraker measurement recorder
 *
 * Keeps append-only JSON stores of bed-probe points, bed-mesh snapshots and
 * Z-offset corrections in sync with a printer daemon.
 *
 * Architecture:
 * TRANSPORT → RPC CHANNEL → RESPONSE ROUTER → SYNC ENGINE → [EXTRACTORS | STORES]
 *                                  ↑
 *                     TRIGGER SUPERVISOR (listener + timer)
 */

export type {
  RecordKind,
  ProbeRecord,
  OffsetRecord,
  MeshSnapshot,
  RecordByKind,
  TimestampedRecord,
  GcodeStoreEntry,
  BedMeshStatus,
  ObjectsQueryResult,
  SyncStatus,
  SyncOutcome,
  RefreshReason,
  RefreshResult,
} from './types/index.js';

export * from './infra/index.js';
export * from './events/index.js';
export * from './rpc/index.js';
export * from './extractors/index.js';
export * from './store/index.js';
export * from './sync/index.js';
export * from './supervisor/index.js';
export * from './logging/index.js';

export type { Transport, TransportFactory } from './transport/types.js';
export { WebSocketTransport, moonrakerUrl, type WebSocketTransportOptions } from './transport/websocket-transport.js';

export {
  loadConfig,
  loadStorePaths,
  describeConfig,
  type BedlogConfig,
  type MoonrakerConfig,
  type ConfigOverrides,
} from './config.js';
