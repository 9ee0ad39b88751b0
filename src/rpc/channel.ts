/**
 * RPC Channel
 *
 * Owns one transport and the per-connection request state: the id counter
 * and the pending-request table. Ids start at 1 for every channel, so a new
 * connection gets a new channel.
 *
 * `call` only writes the request; pairing replies with callers is the
 * router's job.
 */

import { z } from 'zod';
import { MalformedFrameError, NotConnectedError, TransportError } from '../infra/errors.js';
import type { Transport } from '../transport/types.js';
import type { Frame, JsonRpcRequest, PendingRequest, RpcParams } from './types.js';

const rpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

const replySchema = z.object({
  id: z.number().int(),
  result: z.unknown().optional(),
  error: rpcErrorSchema.optional(),
});

const notificationSchema = z.object({
  method: z.string(),
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
});

type ChannelState = 'idle' | 'live' | 'closed';

export class RpcChannel {
  private transport: Transport;
  private state: ChannelState = 'idle';
  private nextId = 1;
  private pendingRequests: Map<number, PendingRequest> = new Map();

  constructor(transport: Transport) {
    this.transport = transport;
  }

  get endpoint(): string {
    return this.transport.endpoint;
  }

  async open(): Promise<void> {
    await this.transport.open();
    if (this.state === 'closed') {
      await this.transport.close();
      throw new TransportError(`Connection to ${this.endpoint} was closed while opening`);
    }
    this.state = 'live';
  }

  /**
   * Send a request and return its id without waiting for the reply
   */
  async call(method: string, params: RpcParams = {}): Promise<number> {
    this.requireLive(`call ${method}`);

    const id = this.nextId++;
    const request: JsonRpcRequest = { jsonrpc: '2.0', method, params, id };
    this.pendingRequests.set(id, { id, method, issuedAt: new Date() });

    try {
      await this.transport.send(JSON.stringify(request));
    } catch (error) {
      this.pendingRequests.delete(id);
      throw error;
    }

    return id;
  }

  /**
   * Wait for the next inbound frame.
   * A reply to one of our requests carries that request and clears it from
   * the pending table.
   *
   * @throws MalformedFrameError for messages of unknown shape (the channel stays usable)
   */
  async receiveFrame(): Promise<Frame> {
    this.requireLive('receive');

    const raw = await this.transport.receive();
    const frame = parseFrame(raw);

    if (frame.kind === 'reply') {
      const request = this.pendingRequests.get(frame.id);
      if (request) {
        this.pendingRequests.delete(frame.id);
        return { ...frame, request };
      }
    }

    return frame;
  }

  /**
   * Outstanding requests, oldest first
   */
  pending(): PendingRequest[] {
    return [...this.pendingRequests.values()];
  }

  async close(): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.pendingRequests.clear();
    await this.transport.close();
  }

  private requireLive(operation: string): void {
    if (this.state !== 'live') {
      throw new NotConnectedError(operation);
    }
  }
}

/**
 * Classify one raw message.
 * Objects with a `method` are notifications, objects with a numeric `id` are replies.
 */
export function parseFrame(raw: string): Frame {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new MalformedFrameError('not valid JSON', raw);
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedFrameError('not a JSON object', raw);
  }

  if ('method' in value) {
    const parsed = notificationSchema.safeParse(value);
    if (!parsed.success) {
      throw new MalformedFrameError(`invalid notification: ${parsed.error.issues[0]?.message}`, raw);
    }
    const { method, params } = parsed.data;
    return {
      kind: 'notification',
      method,
      params: Array.isArray(params) ? params : params === undefined ? [] : [params],
    };
  }

  const parsed = replySchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedFrameError(`invalid reply: ${parsed.error.issues[0]?.message}`, raw);
  }

  const { id, result, error } = parsed.data;
  if (error) {
    return { kind: 'reply', id, ok: false, error };
  }
  return { kind: 'reply', id, ok: true, result };
}
