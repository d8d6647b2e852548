/**
 * WebSocket transport on the `ws` library.
 * Inbound frames are buffered until the supervisor's receive loop asks for them;
 * heartbeats use native ping/pong control frames.
 */

import { WebSocket, type RawData } from 'ws';
import { HandshakeTimeoutError, TransportError } from '../errors.js';
import type { ITransport, ITransportConnection, TransportOpenOptions } from './ITransport.js';

export interface WebSocketTransportOptions {
  userAgent?: string;
  headers?: Record<string, string>;
}

const DEFAULT_USER_AGENT = 'live-chat-triage/0.1';

export class WebSocketTransport implements ITransport {
  constructor(private readonly options: WebSocketTransportOptions = {}) {}

  async open(url: string, options: TransportOpenOptions): Promise<ITransportConnection> {
    const socket = new WebSocket(url, {
      handshakeTimeout: options.handshakeTimeoutMs,
      headers: {
        'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
        ...this.options.headers,
      },
    });

    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        socket.removeListener('error', onError);
        resolve();
      };
      // Stays attached after a failed handshake so a late second error is not thrown.
      const onError = (error: Error) => {
        socket.removeListener('open', onOpen);
        if (/timed out|timeout/i.test(error.message)) {
          reject(new HandshakeTimeoutError(options.handshakeTimeoutMs));
        } else {
          reject(new TransportError(`WebSocket handshake failed: ${error.message}`, { url }, error));
        }
      };
      socket.once('open', onOpen);
      socket.on('error', onError);
    });

    return new WebSocketConnection(socket);
  }
}

type FrameWaiter = (frame: string | null) => void;

interface PendingPing {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class WebSocketConnection implements ITransportConnection {
  private readonly inbox: string[] = [];
  private readonly waiters: FrameWaiter[] = [];
  private readonly pendingPings: PendingPing[] = [];
  private closed = false;

  constructor(private readonly socket: WebSocket) {
    socket.on('message', (data: RawData) => {
      this.deliver(rawToString(data));
    });
    socket.on('pong', () => {
      this.pendingPings.shift()?.resolve();
    });
    socket.on('close', () => {
      this.markClosed();
    });
    socket.on('error', () => {
      // Errors surface as a close; the supervisor reports the session end.
    });
  }

  receive(): Promise<string | null> {
    const next = this.inbox.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    return new Promise<string | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  send(data: string): Promise<void> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('WebSocket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (err) => {
        if (err) reject(new TransportError(`WebSocket send failed: ${err.message}`, undefined, err));
        else resolve();
      });
    });
  }

  ping(): Promise<void> {
    if (this.closed || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('WebSocket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      this.pendingPings.push({ resolve, reject });
      this.socket.ping();
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(1000, 'client disconnect');
    }
    this.markClosed();
  }

  private deliver(frame: string): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter(frame);
    else this.inbox.push(frame);
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
    for (const ping of this.pendingPings.splice(0)) {
      ping.reject(new TransportError('WebSocket closed before pong'));
    }
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
