/**
 * Supervised persistent connection.
 *
 * Owns one logical connection: handshake, receive loop, heartbeat, backoff
 * reconnects and shutdown. Consumers see a stream of decoded messages and a
 * send() that never throws; reconnect churn stays inside.
 *
 *   disconnected → connecting → connected → reconnecting → connecting …
 *   any → disconnected (disconnect/reset); retries exhausted → failed (terminal until reset)
 */

import { HeartbeatTimeoutError, InvalidStateTransitionError, RetriesExhaustedError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITransport, ITransportConnection } from '../transport/ITransport.js';
import type { InboundEvent, RoomActivityEvent } from '../types/frames.js';
import type {
  ConnectionMetrics,
  ConnectionMetricsSnapshot,
  ConnectionState,
  Message,
} from '../types/models.js';
import { backoffDelay, sleep, withTimeout } from '../utils/timers.js';
import type { ErrorHandler } from './ErrorHandler.js';
import { decodeFrame } from './FrameDecoder.js';

export interface SupervisorOptions {
  /** Reconnect attempts allowed before the connection is marked failed. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  heartbeatIntervalMs: number;
  handshakeTimeoutMs: number;
}

export const DEFAULT_SUPERVISOR_OPTIONS: SupervisorOptions = {
  maxRetries: 5,
  baseDelayMs: 3_000,
  maxDelayMs: 60_000,
  heartbeatIntervalMs: 30_000,
  handshakeTimeoutMs: 10_000,
};

export interface SupervisorListeners {
  onMessage?: (message: Message) => void | Promise<void>;
  onEvent?: (event: RoomActivityEvent) => void | Promise<void>;
  onStateChange?: (state: ConnectionState, metrics: ConnectionMetricsSnapshot) => void;
}

export interface ConnectionStats {
  name: string;
  url: string;
  state: ConnectionState;
  metrics: ConnectionMetricsSnapshot;
}

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'reconnecting', 'failed', 'disconnected'],
  connected: ['reconnecting', 'failed', 'disconnected'],
  reconnecting: ['connecting', 'failed', 'disconnected'],
  failed: ['disconnected'],
};

export class ConnectionSupervisor {
  private state: ConnectionState = 'disconnected';
  private readonly metrics: ConnectionMetrics = emptyMetrics();
  private readonly options: SupervisorOptions;
  private connection: ITransportConnection | null = null;
  private session: Promise<void> | null = null;
  private lifecycle: AbortController | null = null;
  private stopRequested = false;

  constructor(
    readonly name: string,
    readonly url: string,
    private readonly transport: ITransport,
    private readonly errorHandler: ErrorHandler,
    private readonly logger: ILogProvider,
    options: Partial<SupervisorOptions> = {},
    private readonly listeners: SupervisorListeners = {}
  ) {
    this.options = { ...DEFAULT_SUPERVISOR_OPTIONS, ...options };
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.connection !== null;
  }

  /**
   * Start a session. Resolves when the session ends: explicit disconnect or
   * terminal failure. Returns the running session if one is active.
   */
  connect(): Promise<void> {
    if (this.session) return this.session;

    if (this.state === 'failed') {
      this.logger.warn('Connect ignored: connection failed, reset required', { connection: this.name });
      return Promise.resolve();
    }

    this.stopRequested = false;
    const lifecycle = new AbortController();
    this.lifecycle = lifecycle;

    const session = this.run(lifecycle.signal).finally(() => {
      if (this.session === session) this.session = null;
    });
    this.session = session;
    return session;
  }

  /** Stop the session and close the transport. Idempotent. */
  async disconnect(): Promise<void> {
    this.stopRequested = true;
    this.lifecycle?.abort();

    const connection = this.connection;
    if (connection) await connection.close();

    if (this.state !== 'disconnected') {
      this.metrics.disconnectedAt = Date.now();
      this.transition('disconnected');
      this.logger.info('Disconnected', { connection: this.name });
    }
  }

  /** Leave the terminal failed state so connect() may be called again. */
  reset(): boolean {
    if (this.state !== 'failed') return false;
    this.metrics.reconnectCount = 0;
    this.transition('disconnected');
    return true;
  }

  /** Transmit a string or JSON-serialisable payload. Never throws. */
  async send(payload: string | object): Promise<boolean> {
    const connection = this.connection;
    if (this.state !== 'connected' || !connection) {
      this.logger.warn('Send skipped: not connected', { connection: this.name, state: this.state });
      return false;
    }

    let text = '';
    try {
      text = typeof payload === 'string' ? payload : JSON.stringify(payload);
      await connection.send(text);
    } catch (err) {
      await this.report(err, 'Failed to send message', { preview: text.slice(0, 100) });
      return false;
    }

    this.metrics.messagesOut += 1;
    this.metrics.bytesOut += Buffer.byteLength(text, 'utf8');
    return true;
  }

  getStats(): ConnectionStats {
    return {
      name: this.name,
      url: this.url,
      state: this.state,
      metrics: snapshot(this.metrics),
    };
  }

  // ── Session ──

  private async run(signal: AbortSignal): Promise<void> {
    try {
      while (!this.stopRequested) {
        this.transition('connecting');

        const connection = await this.handshake();
        if (connection) {
          if (this.stopRequested) {
            await connection.close();
            break;
          }
          await this.runSession(connection, signal);
        }

        if (this.stopRequested) break;
        if (!(await this.reconnect(signal))) break;
      }
    } catch (err) {
      await this.report(err, 'Connection supervisor stopped unexpectedly');
      // Forced: the state the failure left behind may have no edge to failed.
      if (!this.stopRequested && this.state !== 'failed') this.enter('failed');
    }
  }

  private async handshake(): Promise<ITransportConnection | null> {
    try {
      return await this.transport.open(this.url, {
        handshakeTimeoutMs: this.options.handshakeTimeoutMs,
      });
    } catch (err) {
      if (!this.stopRequested) {
        await this.report(err, 'Connection handshake failed');
      }
      return null;
    }
  }

  private async runSession(connection: ITransportConnection, signal: AbortSignal): Promise<void> {
    this.connection = connection;
    this.metrics.connectedAt = Date.now();
    this.metrics.disconnectedAt = null;
    this.metrics.reconnectCount = 0;
    this.transition('connected');
    this.logger.info('Connected', { connection: this.name, url: this.url });

    const heartbeat = new AbortController();
    const stopHeartbeat = () => heartbeat.abort();
    signal.addEventListener('abort', stopHeartbeat, { once: true });
    const heartbeatDone = this.heartbeatLoop(connection, heartbeat.signal);

    try {
      await this.receiveLoop(connection);
    } finally {
      heartbeat.abort();
      signal.removeEventListener('abort', stopHeartbeat);
      await connection.close();
      await heartbeatDone;
      this.connection = null;
      this.metrics.disconnectedAt = Date.now();
    }

    if (!this.stopRequested) {
      this.logger.warn('Connection closed', { connection: this.name });
    }
  }

  private async receiveLoop(connection: ITransportConnection): Promise<void> {
    for (;;) {
      let frame: string | null;
      try {
        frame = await connection.receive();
      } catch (err) {
        await this.report(err, 'WebSocket receive failed');
        return;
      }
      if (frame === null) return;

      this.metrics.messagesIn += 1;
      this.metrics.bytesIn += Buffer.byteLength(frame, 'utf8');

      const result = decodeFrame(frame);
      if (!result.ok) {
        await this.report(result.error, 'Dropped undecodable frame', result.error.details);
        continue;
      }
      await this.dispatch(result.event);
    }
  }

  private async heartbeatLoop(connection: ITransportConnection, signal: AbortSignal): Promise<void> {
    const timeoutMs = this.options.heartbeatIntervalMs * 2;

    while (await sleep(this.options.heartbeatIntervalMs, signal)) {
      this.metrics.lastPing = Date.now();
      try {
        await withTimeout(connection.ping(), timeoutMs, () => new HeartbeatTimeoutError(timeoutMs));
        this.metrics.lastPong = Date.now();
        this.logger.debug('Heartbeat ok', {
          connection: this.name,
          latencyMs: this.metrics.lastPong - this.metrics.lastPing,
        });
      } catch (err) {
        if (signal.aborted) return;
        await this.report(err, 'Heartbeat failed');
        // Closing ends the receive loop exactly like a peer close.
        await connection.close();
        return;
      }
    }
  }

  private async reconnect(signal: AbortSignal): Promise<boolean> {
    const attempt = this.metrics.reconnectCount;

    if (attempt >= this.options.maxRetries) {
      this.transition('failed');
      await this.report(
        new RetriesExhaustedError(`Connection retries exhausted after ${attempt} attempts`, {
          maxRetries: this.options.maxRetries,
        }),
        'Connection retries exhausted'
      );
      return false;
    }

    this.transition('reconnecting');
    const delay = backoffDelay(attempt, this.options.baseDelayMs, this.options.maxDelayMs);
    this.logger.info('Reconnecting', { connection: this.name, delayMs: delay, attempt: attempt + 1 });

    const elapsed = await sleep(delay, signal);
    if (!elapsed || this.stopRequested) return false;

    this.metrics.reconnectCount += 1;
    this.metrics.totalReconnects += 1;
    return true;
  }

  // ── Helpers ──

  private async dispatch(event: InboundEvent): Promise<void> {
    try {
      switch (event.kind) {
        case 'danmaku':
          await this.listeners.onMessage?.(event.message);
          break;
        case 'ignored':
          this.logger.debug('Ignored frame type', { connection: this.name, type: event.rawType });
          break;
        default:
          await this.listeners.onEvent?.(event);
      }
    } catch (err) {
      await this.report(err, 'Message listener failed', { kind: event.kind });
    }
  }

  private transition(next: ConnectionState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new InvalidStateTransitionError(this.state, next);
    }
    this.enter(next);
  }

  private enter(next: ConnectionState): void {
    this.state = next;

    try {
      this.listeners.onStateChange?.(next, snapshot(this.metrics));
    } catch (err) {
      this.logger.error('State change listener failed', {
        connection: this.name,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async report(
    error: unknown,
    message: string,
    extra: Record<string, unknown> = {}
  ): Promise<void> {
    await this.errorHandler.handle(error, message, {
      connection: this.name,
      url: this.url,
      state: this.state,
      ...extra,
    });
  }
}

function emptyMetrics(): ConnectionMetrics {
  return {
    connectedAt: null,
    disconnectedAt: null,
    lastPing: null,
    lastPong: null,
    reconnectCount: 0,
    totalReconnects: 0,
    messagesIn: 0,
    messagesOut: 0,
    bytesIn: 0,
    bytesOut: 0,
  };
}

function snapshot(metrics: ConnectionMetrics): ConnectionMetricsSnapshot {
  const { connectedAt, lastPing, lastPong } = metrics;
  return {
    ...metrics,
    uptimeMs: connectedAt !== null && lastPong !== null ? Math.max(0, lastPong - connectedAt) : 0,
    latencyMs: lastPing !== null && lastPong !== null && lastPong >= lastPing ? lastPong - lastPing : 0,
  };
}
