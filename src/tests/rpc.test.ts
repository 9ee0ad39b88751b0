/**
 * RPC Layer Tests
 *
 * Frame parsing, the channel's request bookkeeping, and the response router
 * sharing one stream between callers and notification subscribers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventBus } from '../events/bus.js';
import type { EmittedEvent } from '../events/types.js';
import { MalformedFrameError, NotConnectedError, RpcError, TransportError } from '../infra/errors.js';
import { RpcChannel, parseFrame } from '../rpc/channel.js';
import { ResponseRouter } from '../rpc/router.js';
import { MemoryTransport } from './fixtures/memory-transport.js';

const MESH_DONE = '// Mesh Bed Leveling Complete';

// =============================================================================
// FRAME PARSING
// =============================================================================

describe('parseFrame', () => {
  it('should parse replies', () => {
    expect(parseFrame('{"jsonrpc":"2.0","id":7,"result":{"a":1}}')).toEqual({
      kind: 'reply',
      id: 7,
      ok: true,
      result: { a: 1 },
    });
  });

  it('should parse error replies', () => {
    expect(parseFrame('{"jsonrpc":"2.0","id":2,"error":{"code":-32601,"message":"Method not found"}}')).toEqual({
      kind: 'reply',
      id: 2,
      ok: false,
      error: { code: -32601, message: 'Method not found' },
    });
  });

  it('should normalize notification params to a list', () => {
    expect(parseFrame('{"jsonrpc":"2.0","method":"notify_gcode_response","params":["ok"]}')).toEqual({
      kind: 'notification',
      method: 'notify_gcode_response',
      params: ['ok'],
    });
    expect(parseFrame('{"jsonrpc":"2.0","method":"notify_status_update","params":{"a":1}}')).toEqual({
      kind: 'notification',
      method: 'notify_status_update',
      params: [{ a: 1 }],
    });
    expect(parseFrame('{"jsonrpc":"2.0","method":"notify_klippy_ready"}')).toEqual({
      kind: 'notification',
      method: 'notify_klippy_ready',
      params: [],
    });
  });

  it('should reject messages that are neither', () => {
    expect(() => parseFrame('garbage')).toThrow('Malformed frame: not valid JSON');
    expect(() => parseFrame('[1,2]')).toThrow('Malformed frame: not a JSON object');
    expect(() => parseFrame('{"id":"seven"}')).toThrow(MalformedFrameError);
    expect(() => parseFrame('{"method":5}')).toThrow(MalformedFrameError);
  });
});

// =============================================================================
// CHANNEL
// =============================================================================

describe('RpcChannel', () => {
  it('should refuse to send before open', async () => {
    const channel = new RpcChannel(new MemoryTransport());

    await expect(channel.call('server.info')).rejects.toThrow(NotConnectedError);
    await expect(channel.receiveFrame()).rejects.toThrow('Cannot receive: not connected');
  });

  it('should number requests from 1 and track them until answered', async () => {
    const transport = new MemoryTransport();
    const channel = new RpcChannel(transport);
    await channel.open();

    expect(await channel.call('server.info')).toBe(1);
    expect(await channel.call('server.gcode_store', { count: 10 })).toBe(2);
    expect(transport.sent).toEqual([
      { jsonrpc: '2.0', id: 1, method: 'server.info', params: {} },
      { jsonrpc: '2.0', id: 2, method: 'server.gcode_store', params: { count: 10 } },
    ]);
    expect(channel.pending().map(request => request.id)).toEqual([1, 2]);

    transport.reply(1, 'info');
    const frame = await channel.receiveFrame();

    expect(frame.kind === 'reply' && frame.request?.method).toBe('server.info');
    expect(channel.pending().map(request => request.id)).toEqual([2]);
  });

  it('should start a fresh counter per connection', async () => {
    const first = new RpcChannel(new MemoryTransport());
    await first.open();
    await first.call('a');
    await first.close();

    const second = new RpcChannel(new MemoryTransport());
    await second.open();
    expect(await second.call('b')).toBe(1);
  });

  it('should forget a request whose send failed', async () => {
    const transport = new MemoryTransport();
    const channel = new RpcChannel(transport);
    await channel.open();
    transport.drop();

    await expect(channel.call('server.info')).rejects.toThrow(TransportError);
    expect(channel.pending()).toEqual([]);
  });
});

// =============================================================================
// RESPONSE ROUTER
// =============================================================================

describe('ResponseRouter', () => {
  let events: EventBus;
  let seen: EmittedEvent[];
  let transport: MemoryTransport;
  let router: ResponseRouter;

  async function connect(options: ConstructorParameters<typeof MemoryTransport>[0] = {}): Promise<void> {
    transport = new MemoryTransport(options);
    const channel = new RpcChannel(transport);
    router = new ResponseRouter(channel, events);
    await channel.open();
    router.start();
  }

  beforeEach(() => {
    events = new EventBus();
    seen = [];
    events.on(event => seen.push(event));
  });

  afterEach(async () => {
    await router.close();
  });

  it('should deliver a notification that arrives before the reply to both parties', async () => {
    await connect({
      handler: (request, socket) => {
        socket.notify('notify_gcode_response', [MESH_DONE]);
        socket.reply(request.id, { gcode_store: [] });
      },
    });
    const subscription = router.subscribe();

    const result = await router.request('server.gcode_store');

    expect(result).toEqual({ gcode_store: [] });
    expect(await subscription.next()).toEqual({
      kind: 'notification',
      method: 'notify_gcode_response',
      params: [MESH_DONE],
    });
  });

  it('should pair out-of-order replies with their callers', async () => {
    await connect();

    const first = router.request('printer.info');
    const second = router.request('server.info');
    await vi.waitFor(() => expect(transport.sent).toHaveLength(2));

    transport.reply(2, 'server');
    transport.reply(1, 'printer');

    expect(await first).toBe('printer');
    expect(await second).toBe('server');
    expect(router.pendingCount()).toBe(0);
  });

  it('should fan notifications out to every subscriber in order', async () => {
    await connect();
    const a = router.subscribe();
    const b = router.subscribe();

    transport.notify('notify_gcode_response', ['one']);
    transport.notify('notify_gcode_response', ['two']);

    expect((await a.next()).params).toEqual(['one']);
    expect((await a.next()).params).toEqual(['two']);
    expect((await b.next()).params).toEqual(['one']);
  });

  it('should reject the caller with an RpcError on an error reply', async () => {
    await connect({ handler: (request, socket) => socket.replyError(request.id, -32601, 'Method not found') });

    const error = await router.request('printer.nope').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RpcError);
    expect(error instanceof RpcError && error.message).toBe('printer.nope (#1) failed with -32601: Method not found');
  });

  it('should skip malformed frames and keep routing', async () => {
    await connect({
      handler: (request, socket) => {
        socket.deliverRaw('not json');
        socket.reply(request.id, 'fine');
      },
    });

    expect(await router.request('server.info')).toBe('fine');
    expect(seen.map(event => event.type)).toEqual(['rpc:malformed-frame']);
  });

  it('should report replies nobody asked for', async () => {
    await connect();

    transport.reply(99, {});

    await vi.waitFor(() => expect(seen).toHaveLength(1));
    expect(seen[0]).toMatchObject({ type: 'rpc:orphan-reply', id: 99 });
  });

  it('should fail waiting callers and subscribers when the connection drops', async () => {
    await connect();
    const subscription = router.subscribe();
    const pending = router.request('server.gcode_store');
    await vi.waitFor(() => expect(transport.sent).toHaveLength(1));

    transport.drop('Connection lost');

    await expect(pending).rejects.toThrow('Connection lost');
    await expect(subscription.next()).rejects.toThrow('Connection lost');
    expect((await router.closed).message).toBe('Connection lost');
    await expect(router.request('server.info')).rejects.toThrow('Connection lost');
  });

  it('should fail waiting callers on close', async () => {
    await connect();
    const pending = router.request('server.info');
    await vi.waitFor(() => expect(transport.sent).toHaveLength(1));

    await router.close();

    await expect(pending).rejects.toThrow('Connection closed by client');
    expect(router.isRunning).toBe(false);
  });

  it('should end a subscription on unsubscribe', async () => {
    await connect();
    const subscription = router.subscribe();
    subscription.unsubscribe();

    transport.notify('notify_gcode_response', ['late']);

    await expect(subscription.next()).rejects.toThrow('Subscription closed');
  });
});
