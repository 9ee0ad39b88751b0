/**
 * WebSocket Transport Tests
 *
 * Runs against an in-process `ws` server on a loopback port.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { NotConnectedError, TransportError } from '../infra/errors.js';
import { moonrakerUrl, WebSocketTransport } from '../transport/websocket-transport.js';

describe('WebSocketTransport', () => {
  let server: WebSocketServer;
  let url: string;
  let clients: WebSocket[];

  beforeEach(async () => {
    clients = [];
    server = new WebSocketServer({ host: '127.0.0.1', port: 0, path: '/websocket' });
    server.on('connection', (socket) => {
      clients.push(socket);
      socket.on('message', (data) => socket.send(`echo:${data.toString()}`));
    });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no TCP port');
    }
    url = moonrakerUrl('127.0.0.1', address.port);
  });

  afterEach(async () => {
    for (const client of clients) client.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should build the Moonraker socket URL', () => {
    expect(moonrakerUrl('printer.local', 7125)).toBe('ws://printer.local:7125/websocket');
  });

  it('should refuse to send or receive before open', async () => {
    const transport = new WebSocketTransport(url);

    await expect(transport.send('x')).rejects.toThrow(NotConnectedError);
    await expect(transport.receive()).rejects.toThrow('Cannot receive: not connected');
  });

  it('should send text and receive replies in order', async () => {
    const transport = new WebSocketTransport(url);
    await transport.open();

    await transport.send('one');
    await transport.send('two');

    expect(await transport.receive()).toBe('echo:one');
    expect(await transport.receive()).toBe('echo:two');
    await transport.close();
  });

  it('should fail receive when the server closes the socket', async () => {
    const transport = new WebSocketTransport(url);
    await transport.open();

    clients[0]?.close(1001, 'going away');

    const error = await transport.receive().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError && error.closeCode).toBe(1001);
    expect(error instanceof Error && error.message).toBe('Connection closed (1001: going away)');
  });

  it('should report a failed connection as a TransportError', async () => {
    const transport = new WebSocketTransport(moonrakerUrl('127.0.0.1', 1), { connectTimeoutMs: 1000 });

    await expect(transport.open()).rejects.toThrow(TransportError);
  });

  it('should reject receive after a client close', async () => {
    const transport = new WebSocketTransport(url);
    await transport.open();
    await transport.close();

    await expect(transport.receive()).rejects.toThrow('Connection closed by client');
  });
});
