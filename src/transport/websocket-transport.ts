/**
 * WebSocket Transport
 *
 * Transport over the `ws` client. Inbound messages are buffered in an
 * AsyncQueue until the single reader asks for them.
 */

import WebSocket from 'ws';
import { AsyncQueue } from '../infra/async-queue.js';
import { NotConnectedError, TransportError } from '../infra/errors.js';
import type { Transport } from './types.js';

export interface WebSocketTransportOptions {
  /** Opening handshake timeout in milliseconds (default: 10000) */
  connectTimeoutMs?: number;
  /** How long close() waits for the closing handshake before terminating (default: 2000) */
  closeTimeoutMs?: number;
}

type TransportState = 'idle' | 'opening' | 'open' | 'closed';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 2_000;

/**
 * Moonraker serves its JSON-RPC socket at /websocket
 */
export function moonrakerUrl(host: string, port: number): string {
  return `ws://${host}:${port}/websocket`;
}

export class WebSocketTransport implements Transport {
  readonly endpoint: string;
  private socket: WebSocket | null = null;
  private state: TransportState = 'idle';
  private inbox = new AsyncQueue<string>();
  private connectTimeoutMs: number;
  private closeTimeoutMs: number;

  constructor(url: string, options: WebSocketTransportOptions = {}) {
    this.endpoint = url;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
  }

  async open(): Promise<void> {
    if (this.state !== 'idle') {
      throw new TransportError(`Transport to ${this.endpoint} was already opened`);
    }
    this.state = 'opening';

    const socket = new WebSocket(this.endpoint, { handshakeTimeout: this.connectTimeoutMs });
    this.socket = socket;

    socket.on('message', (data) => this.inbox.push(decode(data)));
    socket.on('error', (error) => {
      this.inbox.fail(new TransportError(`Connection error: ${error.message}`, { cause: error }));
    });
    socket.on('close', (code, reason) => {
      const detail = reason.length > 0 ? `${code}: ${reason.toString('utf8')}` : String(code);
      this.inbox.fail(new TransportError(`Connection closed (${detail})`, { closeCode: code }));
      this.state = 'closed';
    });

    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        socket.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        socket.off('open', onOpen);
        reject(new TransportError(`Failed to connect to ${this.endpoint}: ${error.message}`, { cause: error }));
      };
      socket.once('open', onOpen);
      socket.once('error', onError);
    });

    this.state = 'open';
  }

  async send(data: string): Promise<void> {
    const socket = this.requireSocket('send');

    if (socket.readyState !== WebSocket.OPEN) {
      throw new TransportError(`Cannot send on ${this.endpoint}: socket is not open`);
    }

    await new Promise<void>((resolve, reject) => {
      socket.send(data, (error) => {
        if (error) {
          reject(new TransportError(`Send failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<string> {
    if (this.state === 'idle') {
      return Promise.reject(new NotConnectedError('receive'));
    }
    return this.inbox.shift();
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.state = 'closed';
    this.inbox.fail(new TransportError('Connection closed by client'));

    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, this.closeTimeoutMs);

      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.close();
    });
  }

  private requireSocket(operation: string): WebSocket {
    if (!this.socket || this.state === 'idle') {
      throw new NotConnectedError(operation);
    }
    return this.socket;
  }
}

function decode(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}
