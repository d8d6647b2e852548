/**
 * Console-based log provider.
 * Keeps a capped in-memory buffer of events for inspection (useful in tests
 * and for the operator stats surface). Optionally writes one line per event to stdout.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { LOG_LEVEL_RANK } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to console.log as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are discarded. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Oldest events are dropped beyond this many. Default: 1000. */
  bufferSize?: number;
}

interface Sink {
  events: LogEvent[];
  outputToConsole: boolean;
  minLevel: LogLevel;
  bufferSize: number;
}

export class ConsoleLogProvider implements ILogProvider {
  private sink: Sink;
  private scope: string | null = null;

  constructor(options?: ConsoleLogProviderOptions) {
    this.sink = {
      events: [],
      outputToConsole: options?.outputToConsole ?? false,
      minLevel: options?.minLevel ?? 'debug',
      bufferSize: options?.bufferSize ?? 1000,
    };
  }

  /** Inspectable buffer of logged events (most recent last), shared with children. */
  get events(): readonly LogEvent[] {
    return this.sink.events;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_RANK[event.level] < LOG_LEVEL_RANK[this.sink.minLevel]) return;

    const fields = this.scope ? { scope: this.scope, ...event.fields } : event.fields;
    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(fields && { fields }),
    };

    this.sink.events.push(stamped);
    if (this.sink.events.length > this.sink.bufferSize) {
      this.sink.events.splice(0, this.sink.events.length - this.sink.bufferSize);
    }

    if (this.sink.outputToConsole) {
      const prefix = `[${stamped.level.toUpperCase()}]`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      console.log(`${stamped.timestamp} ${prefix} ${stamped.message}${fieldsStr}`);
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  child(scope: string): ConsoleLogProvider {
    const scoped = new ConsoleLogProvider();
    scoped.sink = this.sink;
    scoped.scope = this.scope ? `${this.scope}.${scope}` : scope;
    return scoped;
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Events at exactly this level. */
  eventsAt(level: LogLevel): LogEvent[] {
    return this.sink.events.filter((e) => e.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.sink.events.length = 0;
  }
}
