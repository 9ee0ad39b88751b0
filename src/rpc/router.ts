/**
 * Response Router
 *
 * The one reader of an RPC channel. Replies and notifications share the
 * stream, so every inbound frame goes through here:
 * - a reply settles the caller awaiting that request id
 * - a notification is queued for every subscriber
 *
 * Nothing is dropped while someone waits on a different frame: a caller
 * waiting for reply N does not consume notifications, and the listener
 * does not consume replies.
 */

import { AsyncQueue } from '../infra/async-queue.js';
import { MalformedFrameError, RpcError, TransportError, toError } from '../infra/errors.js';
import type { EventBus } from '../events/bus.js';
import type { RpcChannel } from './channel.js';
import type { NotificationFrame, ReplyFrame, RpcParams } from './types.js';

interface ReplySlot {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
}

/**
 * Ordered stream of notifications for one subscriber
 */
export interface NotificationSubscription extends AsyncIterable<NotificationFrame> {
  next(): Promise<NotificationFrame>;
  unsubscribe(): void;
}

export class ResponseRouter {
  private channel: RpcChannel;
  private events?: EventBus;
  private slots: Map<number, ReplySlot> = new Map();
  // Replies that arrived before their caller registered a slot
  private early: Map<number, ReplyFrame> = new Map();
  private subscribers: Set<AsyncQueue<NotificationFrame>> = new Set();
  private terminal: Error | null = null;
  private loop: Promise<void> | null = null;
  private resolveClosed: (error: Error) => void = () => {};

  /** Settles with the error that ended the read loop */
  readonly closed: Promise<Error>;

  constructor(channel: RpcChannel, events?: EventBus) {
    this.channel = channel;
    this.events = events;
    this.closed = new Promise<Error>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get isRunning(): boolean {
    return this.loop !== null && this.terminal === null;
  }

  /**
   * Start the read loop. Call once, after the channel is open.
   */
  start(): void {
    if (this.loop) return;
    this.loop = this.readLoop();
  }

  /**
   * Send a request and wait for its reply
   *
   * @throws RpcError when the daemon answers with an error
   * @throws TransportError when the connection ends first
   */
  async request(method: string, params: RpcParams = {}): Promise<unknown> {
    if (this.terminal) throw this.terminal;

    const id = await this.channel.call(method, params);

    const early = this.early.get(id);
    if (early) {
      this.early.delete(id);
      return settle(method, early);
    }
    if (this.terminal) throw this.terminal;

    return new Promise<unknown>((resolve, reject) => {
      this.slots.set(id, { method, resolve, reject });
    });
  }

  /**
   * Receive every notification from now on, in arrival order
   */
  subscribe(): NotificationSubscription {
    const queue = new AsyncQueue<NotificationFrame>();
    if (this.terminal) {
      queue.fail(this.terminal);
    } else {
      this.subscribers.add(queue);
    }

    return {
      next: () => queue.shift(),
      unsubscribe: () => {
        this.subscribers.delete(queue);
        queue.fail(new TransportError('Subscription closed'));
      },
      [Symbol.asyncIterator]: () => queue[Symbol.asyncIterator](),
    };
  }

  /**
   * Requests still waiting for a reply
   */
  pendingCount(): number {
    return this.slots.size;
  }

  /**
   * Stop routing and close the channel. Waiting callers and subscribers
   * fail with a TransportError.
   */
  async close(): Promise<void> {
    this.terminate(new TransportError('Connection closed by client'));
    await this.channel.close();
    await this.loop;
  }

  private async readLoop(): Promise<void> {
    while (this.terminal === null) {
      try {
        const frame = await this.channel.receiveFrame();
        if (frame.kind === 'reply') {
          this.routeReply(frame);
        } else {
          this.routeNotification(frame);
        }
      } catch (error) {
        if (error instanceof MalformedFrameError) {
          this.events?.emit({ type: 'rpc:malformed-frame', error });
          continue;
        }
        this.terminate(toError(error));
      }
    }
  }

  private routeReply(frame: ReplyFrame): void {
    const slot = this.slots.get(frame.id);
    if (slot) {
      this.slots.delete(frame.id);
      if (frame.ok) {
        slot.resolve(frame.result);
      } else {
        slot.reject(toRpcError(slot.method, frame));
      }
      return;
    }

    // Ours, but `call` has not returned to `request` yet
    if (frame.request) {
      this.early.set(frame.id, frame);
      return;
    }

    this.events?.emit({ type: 'rpc:orphan-reply', id: frame.id });
  }

  private routeNotification(frame: NotificationFrame): void {
    for (const queue of this.subscribers) {
      queue.push(frame);
    }
  }

  private terminate(error: Error): void {
    if (this.terminal) return;
    this.terminal = error;

    for (const slot of this.slots.values()) {
      slot.reject(error);
    }
    this.slots.clear();
    this.early.clear();

    for (const queue of this.subscribers) {
      queue.fail(error);
    }
    this.subscribers.clear();

    this.resolveClosed(error);
  }
}

function settle(method: string, frame: ReplyFrame): unknown {
  if (frame.ok) return frame.result;
  throw toRpcError(method, frame);
}

function toRpcError(method: string, frame: Extract<ReplyFrame, { ok: false }>): RpcError {
  return new RpcError(method, frame.id, frame.error.code, frame.error.message);
}
