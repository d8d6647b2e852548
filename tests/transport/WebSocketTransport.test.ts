import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'node:net';
import { WebSocketServer, type WebSocket } from 'ws';
import { WebSocketTransport } from '../../src/transport/WebSocketTransport.js';
import { HandshakeTimeoutError, TransportError } from '../../src/errors.js';
import type { ITransportConnection } from '../../src/transport/ITransport.js';

const OPTIONS = { handshakeTimeoutMs: 2000 };

function portOf(address: ReturnType<Server['address']>): number {
  if (!address || typeof address === 'string') throw new Error('Server is not listening on a port');
  return address.port;
}

describe('WebSocketTransport', () => {
  let server: WebSocketServer;
  let url: string;
  let peers: WebSocket[];
  let userAgents: (string | undefined)[];
  let connection: ITransportConnection | null;

  beforeEach(async () => {
    peers = [];
    userAgents = [];
    connection = null;
    server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    server.on('connection', (socket, request) => {
      peers.push(socket);
      userAgents.push(request.headers['user-agent']);
    });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    url = `ws://127.0.0.1:${portOf(server.address())}`;
  });

  afterEach(async () => {
    await connection?.close();
    for (const peer of peers) peer.terminate();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function waitForPeer(): Promise<WebSocket> {
    for (;;) {
      const peer = peers[0];
      if (peer) return peer;
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
  }

  // --- open() ---

  it('should open a connection with the default user agent', async () => {
    connection = await new WebSocketTransport().open(url, OPTIONS);
    await waitForPeer();

    expect(userAgents).toEqual(['live-chat-triage/0.1']);
  });

  it('should send a custom user agent', async () => {
    connection = await new WebSocketTransport({ userAgent: 'triage-test' }).open(url, OPTIONS);
    await waitForPeer();

    expect(userAgents).toEqual(['triage-test']);
  });

  it('should reject with TransportError when nothing listens', async () => {
    const closed = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await new Promise<void>((resolve) => closed.once('listening', () => resolve()));
    const deadUrl = `ws://127.0.0.1:${portOf(closed.address())}`;
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const error = await new WebSocketTransport().open(deadUrl, OPTIONS).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: expect.stringMatching(/^WebSocket handshake failed: /) });
  });

  it('should reject with HandshakeTimeoutError when the peer never upgrades', async () => {
    const sockets: Socket[] = [];
    const silent = createServer((socket) => void sockets.push(socket));
    await new Promise<void>((resolve) => silent.listen(0, '127.0.0.1', () => resolve()));

    try {
      const error = await new WebSocketTransport()
        .open(`ws://127.0.0.1:${portOf(silent.address())}`, { handshakeTimeoutMs: 100 })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HandshakeTimeoutError);
    } finally {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => silent.close(() => resolve()));
    }
  });

  // --- receive() / send() ---

  it('should buffer frames until receive() asks for them', async () => {
    connection = await new WebSocketTransport().open(url, OPTIONS);
    const peer = await waitForPeer();

    peer.send('{"type":"danmaku"}');
    peer.send(Buffer.from('second'));

    expect(await connection.receive()).toBe('{"type":"danmaku"}');
    expect(await connection.receive()).toBe('second');
  });

  it('should deliver text frames to the peer', async () => {
    connection = await new WebSocketTransport().open(url, OPTIONS);
    const peer = await waitForPeer();
    const received = new Promise<string>((resolve) => {
      peer.once('message', (data) => resolve(data.toString()));
    });

    await connection.send('{"type":"reply"}');

    expect(await received).toBe('{"type":"reply"}');
  });

  // --- ping() ---

  it('should resolve ping() on the peer pong', async () => {
    connection = await new WebSocketTransport().open(url, OPTIONS);

    await expect(connection.ping()).resolves.toBeUndefined();
  });

  // --- close ---

  it('should resolve receive() with null when the peer closes', async () => {
    connection = await new WebSocketTransport().open(url, OPTIONS);
    const peer = await waitForPeer();
    const pending = connection.receive();

    peer.close(1000, 'bye');

    expect(await pending).toBeNull();
    await expect(connection.send('late')).rejects.toThrow('WebSocket is not open');
    await expect(connection.ping()).rejects.toThrow('WebSocket is not open');
  });

  it('should make close() idempotent and end receive()', async () => {
    connection = await new WebSocketTransport().open(url, OPTIONS);

    await connection.close();
    await connection.close();

    expect(await connection.receive()).toBeNull();
  });
});
