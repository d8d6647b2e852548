/**
 * Alert routing.
 * Every record is logged. Fatal records fan out to every channel, Error records
 * to channels registered with minLevel 'error', Warn/Info stay in the log.
 * Channel failures are logged and never re-alerted.
 */

import type { IAlertChannel } from '../providers/IAlertChannel.js';
import type { ILogProvider, LogLevel } from '../providers/ILogProvider.js';
import type { ErrorLevel, ErrorRecord } from '../types/models.js';

export interface AlertChannelRegistration {
  channel: IAlertChannel;
  /** 'fatal' channels only page for Fatal records; 'error' channels also get Error. */
  minLevel: 'fatal' | 'error';
}

export interface AlertManagerOptions {
  /** Suppress repeat deliveries of the same alert within this window. Fatal is never suppressed. */
  cooldownMs?: number;
}

export interface AlertOutcome {
  delivered: string[];
  failed: string[];
  suppressed: boolean;
}

const LOG_LEVEL_FOR: Record<ErrorLevel, LogLevel> = {
  fatal: 'error',
  error: 'error',
  warn: 'warn',
  info: 'info',
};

export class AlertManager {
  private readonly channels: AlertChannelRegistration[];
  private readonly cooldownMs: number;
  private readonly lastSent = new Map<string, number>();
  private readonly counts: Record<ErrorLevel, number> = { fatal: 0, error: 0, warn: 0, info: 0 };

  constructor(
    private readonly logger: ILogProvider,
    channels: AlertChannelRegistration[] = [],
    options: AlertManagerOptions = {}
  ) {
    this.channels = [...channels];
    this.cooldownMs = options.cooldownMs ?? 300_000;
  }

  addChannel(registration: AlertChannelRegistration): void {
    this.channels.push(registration);
  }

  async notify(record: ErrorRecord): Promise<AlertOutcome> {
    this.counts[record.level] += 1;
    this.logger.log({
      level: LOG_LEVEL_FOR[record.level],
      message: `[${record.level.toUpperCase()}] ${record.category}: ${record.message}`,
      fields: { error: record.errorMessage, ...record.context },
    });

    const targets = this.channelsFor(record.level);
    if (targets.length === 0) {
      return { delivered: [], failed: [], suppressed: false };
    }

    const key = `${record.category}:${record.level}:${record.message}`;
    const now = Date.now();
    const previous = this.lastSent.get(key);
    if (record.level !== 'fatal' && previous !== undefined && now - previous < this.cooldownMs) {
      this.logger.debug('Alert suppressed by cooldown', { key });
      return { delivered: [], failed: [], suppressed: true };
    }
    this.lastSent.set(key, now);

    const results = await Promise.allSettled(targets.map((t) => t.channel.send(record)));
    const outcome: AlertOutcome = { delivered: [], failed: [], suppressed: false };

    results.forEach((result, i) => {
      const name = targets[i].channel.name;
      if (result.status === 'fulfilled') {
        outcome.delivered.push(name);
      } else {
        outcome.failed.push(name);
        this.logger.error('Alert delivery failed', {
          channel: name,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });

    return outcome;
  }

  getStats(): { channels: string[]; counts: Record<ErrorLevel, number> } {
    return {
      channels: this.channels.map((r) => r.channel.name),
      counts: { ...this.counts },
    };
  }

  private channelsFor(level: ErrorLevel): AlertChannelRegistration[] {
    if (level === 'fatal') return this.channels;
    if (level === 'error') return this.channels.filter((r) => r.minLevel === 'error');
    return [];
  }
}
