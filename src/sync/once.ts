/**
 * One-shot sync: connect, refresh every store, disconnect.
 */

import type { EventBus } from '../events/bus.js';
import { RpcChannel } from '../rpc/channel.js';
import { ResponseRouter } from '../rpc/router.js';
import type { RecordStores } from '../store/stores.js';
import type { TransportFactory } from '../transport/types.js';
import type { RefreshResult } from '../types/index.js';
import { SyncEngine } from './engine.js';

export interface SyncOnceDeps {
  createTransport: TransportFactory;
  stores: RecordStores;
  events?: EventBus;
  now?: () => number;
}

export async function syncOnce(deps: SyncOnceDeps): Promise<RefreshResult> {
  const { createTransport, stores, events, now } = deps;
  const channel = new RpcChannel(createTransport());
  const router = new ResponseRouter(channel, events);
  let opened = false;

  try {
    await channel.open();
    opened = true;
    events?.emit({ type: 'connection:open', endpoint: channel.endpoint });
    router.start();

    const engine = new SyncEngine(router, stores, { events, now });
    return await engine.refresh('manual');
  } finally {
    await router.close();
    if (opened) {
      events?.emit({ type: 'connection:closed', endpoint: channel.endpoint });
    }
  }
}
