/**
 * The three stores, one file per record kind
 */

import type { EventBus } from '../events/bus.js';
import type { KeyedMutex } from '../infra/keyed-mutex.js';
import type { MeshSnapshot, OffsetRecord, ProbeRecord, RecordKind } from '../types/index.js';
import { JsonRecordStore } from './record-store.js';
import { recordSchemas } from './schemas.js';

export interface RecordStores {
  probes: JsonRecordStore<ProbeRecord>;
  offsets: JsonRecordStore<OffsetRecord>;
  meshes: JsonRecordStore<MeshSnapshot>;
}

export type StorePaths = Record<RecordKind, string>;

export function createStores(
  paths: StorePaths,
  options: { events?: EventBus; mutex?: KeyedMutex } = {}
): RecordStores {
  return {
    probes: new JsonRecordStore<ProbeRecord>(paths.probes, { schema: recordSchemas.probes, ...options }),
    offsets: new JsonRecordStore<OffsetRecord>(paths.offsets, { schema: recordSchemas.offsets, ...options }),
    meshes: new JsonRecordStore<MeshSnapshot>(paths.meshes, { schema: recordSchemas.meshes, ...options }),
  };
}
