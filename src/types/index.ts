/**
 * bedlog Shared Types
 * Records persisted to the stores and the raw payloads they are extracted from.
 */

// =============================================================================
// RECORDS
// =============================================================================

/**
 * Kinds of record, one store file each
 */
export type RecordKind = 'probes' | 'offsets' | 'meshes';

/**
 * Single bed-probe measurement, keyed by server log time
 */
export interface ProbeRecord {
  x: number;
  y: number;
  z: number;
  timestamp: number;   // Moonraker log time (seconds)
}

/**
 * Nozzle Z-offset correction, keyed by server log time
 */
export interface OffsetRecord {
  z_offset: number;
  timestamp: number;
}

/**
 * Snapshot of the active bed mesh.
 * Identity is the probed matrix, not the timestamp.
 */
export interface MeshSnapshot {
  timestamp: number;                 // Client wall-clock time (seconds), upstream gives none
  profile_name: string | null;
  mesh_min: [number, number] | null;
  mesh_max: [number, number] | null;
  probed_matrix: number[][];
}

export interface RecordByKind {
  probes: ProbeRecord;
  offsets: OffsetRecord;
  meshes: MeshSnapshot;
}

/**
 * Anything a store can hold
 */
export interface TimestampedRecord {
  timestamp: number;
}

// =============================================================================
// UPSTREAM PAYLOADS
// =============================================================================

/**
 * One item of the `server.gcode_store` result
 */
export interface GcodeStoreEntry {
  message: string;
  time: number;
  type?: string;   // 'command' | 'response'
}

/**
 * Raw `bed_mesh` printer object as returned by `printer.objects.query`
 */
export interface BedMeshStatus {
  profile_name?: string | null;
  mesh_min?: [number, number] | null;
  mesh_max?: [number, number] | null;
  probed_matrix?: number[][];
  [key: string]: unknown;
}

/**
 * Result of `printer.objects.query`
 */
export interface ObjectsQueryResult {
  eventtime?: number;
  status?: {
    bed_mesh?: BedMeshStatus | null;
    [object: string]: unknown;
  };
}

// =============================================================================
// SYNC OUTCOMES
// =============================================================================

/**
 * - updated:     new records were saved
 * - no_new_data: upstream data already stored, nothing written
 * - no_data:     upstream returned nothing to merge
 */
export type SyncStatus = 'updated' | 'no_new_data' | 'no_data';

export interface SyncOutcome {
  kind: RecordKind;
  status: SyncStatus;
  fetched: number;
  added: number;
}

export type RefreshReason = 'initial' | 'trigger' | 'periodic' | 'manual';

export interface RefreshResult {
  reason: RefreshReason;
  outcomes: SyncOutcome[];
  durationMs: number;
}
