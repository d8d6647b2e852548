/**
 * Named set of supervised connections, one per live room.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITransport } from '../transport/ITransport.js';
import type { ConnectionMetricsSnapshot, ConnectionState } from '../types/models.js';
import type { ErrorHandler } from './ErrorHandler.js';
import {
  ConnectionSupervisor,
  type SupervisorListeners,
  type SupervisorOptions,
} from './ConnectionSupervisor.js';

export type RegistryStats = Record<ConnectionState, number> & {
  total: number;
  connections: Record<string, ConnectionMetricsSnapshot & { state: ConnectionState; url: string }>;
};

export interface BroadcastResult {
  sent: number;
  failed: number;
}

export type ListenerFactory = (name: string) => SupervisorListeners;

export class ConnectionRegistry {
  private readonly supervisors = new Map<string, ConnectionSupervisor>();
  private readonly sessions = new Map<string, Promise<void>>();

  constructor(
    private readonly transport: ITransport,
    private readonly errorHandler: ErrorHandler,
    private readonly logger: ILogProvider,
    private readonly options: Partial<SupervisorOptions> = {},
    private readonly listenersFor: ListenerFactory = () => ({})
  ) {}

  /** Register and start a connection. Returns the existing one if the name is taken. */
  add(name: string, url: string): ConnectionSupervisor {
    const existing = this.supervisors.get(name);
    if (existing) {
      this.logger.warn('Connection already registered', { connection: name, url: existing.url });
      return existing;
    }

    const supervisor = new ConnectionSupervisor(
      name,
      url,
      this.transport,
      this.errorHandler,
      this.logger.child(`connection:${name}`),
      this.options,
      this.listenersFor(name)
    );
    this.supervisors.set(name, supervisor);
    this.sessions.set(name, supervisor.connect());
    this.logger.info('Connection added', { connection: name, url });
    return supervisor;
  }

  get(name: string): ConnectionSupervisor | null {
    return this.supervisors.get(name) ?? null;
  }

  names(): string[] {
    return [...this.supervisors.keys()];
  }

  async remove(name: string): Promise<boolean> {
    const supervisor = this.supervisors.get(name);
    if (!supervisor) return false;

    await supervisor.disconnect();
    await this.sessions.get(name);
    this.supervisors.delete(name);
    this.sessions.delete(name);
    this.logger.info('Connection removed', { connection: name });
    return true;
  }

  /** Send to every connection. Failures are counted, not retried. */
  async broadcast(payload: string | object): Promise<BroadcastResult> {
    const results = await Promise.all(
      [...this.supervisors.values()].map((supervisor) => supervisor.send(payload))
    );
    const sent = results.filter(Boolean).length;
    const result = { sent, failed: results.length - sent };

    if (result.failed > 0) {
      this.logger.warn('Broadcast incomplete', { ...result });
    }
    return result;
  }

  stats(): RegistryStats {
    const stats: RegistryStats = {
      total: this.supervisors.size,
      disconnected: 0,
      connecting: 0,
      connected: 0,
      reconnecting: 0,
      failed: 0,
      connections: {},
    };

    for (const supervisor of this.supervisors.values()) {
      const { name, url, state, metrics } = supervisor.getStats();
      stats[state] += 1;
      stats.connections[name] = { ...metrics, state, url };
    }
    return stats;
  }

  /** Disconnect everything and wait for every session to wind down. */
  async disconnectAll(): Promise<void> {
    await Promise.all([...this.supervisors.values()].map((supervisor) => supervisor.disconnect()));
    await Promise.all(this.sessions.values());
    this.logger.info('All connections closed', { total: this.supervisors.size });
  }
}
