/**
 * Sync Engine
 *
 * fetch → extract → merge → save, once per record kind.
 * Each operation is idempotent: with nothing new upstream no file is
 * touched. A refresh runs the three in order and stops at the first
 * failure; stores saved before it stay as written.
 */

import type { EventBus } from '../events/bus.js';
import { extractMesh, extractOffsets, extractProbes, parseGcodeStore } from '../extractors/index.js';
import { toError } from '../infra/errors.js';
import type { RpcParams } from '../rpc/types.js';
import type { JsonRecordStore } from '../store/record-store.js';
import { mergeByTimestamp, mergeMeshByContent } from '../store/merge.js';
import type { RecordStores } from '../store/stores.js';
import type {
  GcodeStoreEntry,
  RecordKind,
  RefreshReason,
  RefreshResult,
  SyncOutcome,
  TimestampedRecord,
} from '../types/index.js';

export const GCODE_STORE_METHOD = 'server.gcode_store';
export const OBJECTS_QUERY_METHOD = 'printer.objects.query';
export const BED_MESH_QUERY = { objects: { bed_mesh: null } };

/**
 * Anything that can send a request and await its reply (the response router)
 */
export interface RpcRequester {
  request(method: string, params?: RpcParams): Promise<unknown>;
}

export interface SyncEngineOptions {
  events?: EventBus;
  /** Clock in seconds used to stamp mesh snapshots */
  now?: () => number;
}

export class SyncEngine {
  private rpc: RpcRequester;
  private stores: RecordStores;
  private events?: EventBus;
  private now: () => number;

  constructor(rpc: RpcRequester, stores: RecordStores, options: SyncEngineOptions = {}) {
    this.rpc = rpc;
    this.stores = stores;
    this.events = options.events;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  async syncProbes(): Promise<SyncOutcome> {
    const entries = await this.fetchGcodeStore('probes');
    return this.appendByTimestamp('probes', this.stores.probes, extractProbes(entries));
  }

  async syncOffsets(): Promise<SyncOutcome> {
    const entries = await this.fetchGcodeStore('offsets');
    return this.appendByTimestamp('offsets', this.stores.offsets, extractOffsets(entries));
  }

  async syncMesh(): Promise<SyncOutcome> {
    this.events?.emit({ type: 'sync:fetch', kind: 'meshes', method: OBJECTS_QUERY_METHOD });
    const result = await this.rpc.request(OBJECTS_QUERY_METHOD, BED_MESH_QUERY);

    const mesh = extractMesh(result, this.now);
    if (!mesh) {
      return this.report({ kind: 'meshes', status: 'no_data', fetched: 0, added: 0 });
    }

    const added = await this.stores.meshes.append(existing =>
      mergeMeshByContent(existing, mesh) ? [mesh] : []
    );

    return this.report({
      kind: 'meshes',
      status: added.length > 0 ? 'updated' : 'no_new_data',
      fetched: 1,
      added: added.length,
    });
  }

  /**
   * Probes, then mesh, then offsets
   */
  async refresh(reason: RefreshReason): Promise<RefreshResult> {
    const startedAt = Date.now();
    this.events?.emit({ type: 'refresh:start', reason });

    const outcomes: SyncOutcome[] = [];
    try {
      outcomes.push(await this.syncProbes());
      outcomes.push(await this.syncMesh());
      outcomes.push(await this.syncOffsets());
    } catch (error) {
      const failure = toError(error);
      this.events?.emit({ type: 'refresh:failed', reason, error: failure });
      throw failure;
    }

    const result: RefreshResult = { reason, outcomes, durationMs: Date.now() - startedAt };
    this.events?.emit({ type: 'refresh:complete', result });
    return result;
  }

  private async fetchGcodeStore(kind: RecordKind): Promise<GcodeStoreEntry[]> {
    this.events?.emit({ type: 'sync:fetch', kind, method: GCODE_STORE_METHOD });
    const result = await this.rpc.request(GCODE_STORE_METHOD);
    return parseGcodeStore(result);
  }

  private async appendByTimestamp<T extends TimestampedRecord>(
    kind: RecordKind,
    store: JsonRecordStore<T>,
    incoming: T[]
  ): Promise<SyncOutcome> {
    if (incoming.length === 0) {
      return this.report({ kind, status: 'no_data', fetched: 0, added: 0 });
    }

    const added = await store.append(existing => mergeByTimestamp(existing, incoming));

    return this.report({
      kind,
      status: added.length > 0 ? 'updated' : 'no_new_data',
      fetched: incoming.length,
      added: added.length,
    });
  }

  private report(outcome: SyncOutcome): SyncOutcome {
    this.events?.emit({ type: 'sync:outcome', outcome });
    return outcome;
  }
}
