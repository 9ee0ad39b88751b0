/**
 * Sync Engine Tests
 *
 * fetch → extract → merge → save against an in-process fake daemon.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { EventBus } from '../events/bus.js';
import type { EmittedEvent } from '../events/types.js';
import { TransportError } from '../infra/errors.js';
import { RpcChannel } from '../rpc/channel.js';
import { ResponseRouter } from '../rpc/router.js';
import { createStores, type RecordStores, type StorePaths } from '../store/stores.js';
import { SyncEngine } from '../sync/engine.js';
import { syncOnce } from '../sync/once.js';
import { FakeMoonraker } from './fixtures/fake-moonraker.js';
import { bedMesh, flatMatrix, gcodeStore, warpedMatrix } from './fixtures/moonraker.fixtures.js';

describe('Sync Engine', () => {
  let dir: string;
  let paths: StorePaths;
  let stores: RecordStores;
  let daemon: FakeMoonraker;
  let events: EventBus;
  let seen: EmittedEvent[];
  let clock: number;

  const sync = () =>
    syncOnce({ createTransport: daemon.connect, stores, events, now: () => clock++ });

  const readJson = async (file: string): Promise<unknown> => JSON.parse(await fs.readFile(file, 'utf-8'));

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bedlog-sync-'));
    paths = {
      probes: path.join(dir, 'probes.json'),
      meshes: path.join(dir, 'meshes.json'),
      offsets: path.join(dir, 'offsets.json'),
    };
    events = new EventBus();
    seen = [];
    events.on(event => seen.push(event));
    stores = createStores(paths, { events });
    daemon = new FakeMoonraker({ gcodeStore, bedMesh: bedMesh(warpedMatrix) });
    clock = 1_700_000_000;
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should fill empty stores from the daemon', async () => {
    const result = await sync();

    expect(result.reason).toBe('manual');
    expect(result.outcomes).toEqual([
      { kind: 'probes', status: 'updated', fetched: 3, added: 3 },
      { kind: 'meshes', status: 'updated', fetched: 1, added: 1 },
      { kind: 'offsets', status: 'updated', fetched: 2, added: 2 },
    ]);
    expect(daemon.calls).toEqual(['server.gcode_store', 'printer.objects.query', 'server.gcode_store']);

    expect(await readJson(paths.probes)).toEqual([
      { x: 10, y: 20, z: -0.05, timestamp: 1000.5 },
      { x: 110, y: 20, z: 0.025, timestamp: 1001.5 },
      { x: 210, y: 20, z: 0.1, timestamp: 1002.5 },
    ]);
    expect(await readJson(paths.meshes)).toEqual([
      {
        timestamp: 1_700_000_000,
        profile_name: 'default',
        mesh_min: [10, 10],
        mesh_max: [210, 210],
        probed_matrix: warpedMatrix,
      },
    ]);
    expect(await readJson(paths.offsets)).toEqual([
      { z_offset: -0.123, timestamp: 2000.25 },
      { z_offset: -0.15, timestamp: 2100.75 },
    ]);
  });

  it('should change nothing when run again with the same upstream data', async () => {
    await sync();
    const before = await Promise.all(Object.values(paths).map(file => fs.readFile(file, 'utf-8')));

    const result = await sync();
    const after = await Promise.all(Object.values(paths).map(file => fs.readFile(file, 'utf-8')));

    expect(result.outcomes).toEqual([
      { kind: 'probes', status: 'no_new_data', fetched: 3, added: 0 },
      { kind: 'meshes', status: 'no_new_data', fetched: 1, added: 0 },
      { kind: 'offsets', status: 'no_new_data', fetched: 2, added: 0 },
    ]);
    expect(after).toEqual(before);
  });

  it('should append only the new log entries', async () => {
    await sync();
    daemon.gcodeStore = [...gcodeStore, { message: 'probe at 10.0,120.0 is z=0.010', time: 3000, type: 'response' }];

    const result = await sync();

    expect(result.outcomes[0]).toEqual({ kind: 'probes', status: 'updated', fetched: 4, added: 1 });
    expect(await readJson(paths.probes)).toHaveLength(4);
  });

  it('should report no data and write nothing for an idle printer', async () => {
    daemon.gcodeStore = [];
    daemon.bedMesh = null;

    const result = await sync();

    expect(result.outcomes).toEqual([
      { kind: 'probes', status: 'no_data', fetched: 0, added: 0 },
      { kind: 'meshes', status: 'no_data', fetched: 0, added: 0 },
      { kind: 'offsets', status: 'no_data', fetched: 0, added: 0 },
    ]);
    expect(existsSync(paths.probes)).toBe(false);
    expect(existsSync(paths.meshes)).toBe(false);
    expect(existsSync(paths.offsets)).toBe(false);
  });

  it('should record a mesh again when it returns after a different one', async () => {
    await sync();
    daemon.bedMesh = bedMesh(flatMatrix);
    await sync();
    daemon.bedMesh = bedMesh(warpedMatrix);
    await sync();
    const last = await sync();

    expect(last.outcomes[1]).toEqual({ kind: 'meshes', status: 'no_new_data', fetched: 1, added: 0 });
    const meshes = await stores.meshes.load();
    expect(meshes.map(mesh => mesh.probed_matrix)).toEqual([warpedMatrix, flatMatrix, warpedMatrix]);
    expect(meshes.map(mesh => mesh.timestamp)).toEqual([1_700_000_000, 1_700_000_001, 1_700_000_002]);
  });

  it('should keep stores saved before a mid-refresh failure', async () => {
    daemon.dropOn = { method: 'printer.objects.query', nth: 1 };

    const error = await sync().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof Error && error.message).toBe('Connection reset by daemon');
    expect(await readJson(paths.probes)).toHaveLength(3);
    expect(existsSync(paths.meshes)).toBe(false);
    expect(existsSync(paths.offsets)).toBe(false);
    expect(seen.filter(event => event.type === 'refresh:failed')).toHaveLength(1);
    expect(seen[seen.length - 1]).toMatchObject({ type: 'connection:closed', endpoint: 'memory://moonraker' });

    daemon.dropOn = null;
    const retry = await sync();

    expect(retry.outcomes.map(outcome => outcome.status)).toEqual(['no_new_data', 'updated', 'updated']);
  });

  it('should do not report a closed connection that never opened', async () => {
    daemon.refuseConnections = 1;

    await expect(sync()).rejects.toThrow('ECONNREFUSED');
    expect(seen).toEqual([]);
  });

  it('should produce no duplicates when two refreshes overlap', async () => {
    const channel = new RpcChannel(daemon.connect());
    const router = new ResponseRouter(channel, events);
    await channel.open();
    router.start();
    const engine = new SyncEngine(router, stores, { events, now: () => clock++ });

    try {
      await Promise.all([engine.refresh('trigger'), engine.refresh('periodic')]);
    } finally {
      await router.close();
    }

    expect(await stores.probes.load()).toHaveLength(3);
    expect(await stores.offsets.load()).toHaveLength(2);
    expect(await stores.meshes.load()).toHaveLength(1);
  });

  it('should emit one outcome event per record kind', async () => {
    await sync();

    const outcomes = seen.flatMap(event => (event.type === 'sync:outcome' ? [event.outcome.kind] : []));
    expect(outcomes).toEqual(['probes', 'meshes', 'offsets']);
    expect(seen[0]).toMatchObject({ type: 'connection:open', endpoint: 'memory://moonraker' });
  });
});
