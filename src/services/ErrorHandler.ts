/**
 * Single entry point for faults raised anywhere in the pipeline.
 * Classifies, records a bounded history, alerts, and optionally recovers.
 * Fatal records always reach the alert path.
 */

import { randomUUID } from 'node:crypto';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ErrorRecord } from '../types/models.js';
import { ErrorClassifier } from './ErrorClassifier.js';
import type { AlertManager } from './AlertManager.js';
import type { AutoRecovery } from './AutoRecovery.js';

export interface HandleOptions {
  /** Route non-fatal records to the alert path. Default: true. Fatal always alerts. */
  alert?: boolean;
  /** Run one AutoRecovery attempt immediately; success marks the record resolved. Default: false. */
  recover?: boolean;
}

export interface ErrorStats {
  totalErrors: number;
  /** Records in the last hour. */
  recentErrors: number;
  /** Unresolved records in the last hour. */
  unresolvedErrors: number;
  /** Keyed `category:level`. */
  counts: Record<string, number>;
}

const RECENT_WINDOW_MS = 60 * 60 * 1000;

export class ErrorHandler {
  private readonly history: ErrorRecord[] = [];
  private readonly counts = new Map<string, number>();
  private total = 0;

  constructor(
    private readonly alertManager: AlertManager,
    private readonly recovery: AutoRecovery,
    private readonly logger: ILogProvider,
    private readonly classifier: ErrorClassifier = new ErrorClassifier(),
    private readonly maxHistory = 1000
  ) {}

  async handle(
    error: unknown,
    message: string,
    context: Record<string, unknown> = {},
    options: HandleOptions = {}
  ): Promise<ErrorRecord> {
    const { category, level } = this.classifier.classify(error, message);

    const record: ErrorRecord = {
      id: randomUUID(),
      level,
      category,
      message,
      errorName: error instanceof Error ? error.name : typeof error,
      errorMessage: error instanceof Error ? error.message : String(error),
      context,
      occurredAt: Date.now(),
      retryCount: 0,
      resolved: false,
      escalated: false,
    };

    this.remember(record);

    if (level === 'fatal' || (options.alert ?? true)) {
      await this.alertManager.notify(record);
    }

    if (options.recover && (await this.retry(record))) {
      this.resolve(record);
    }

    return record;
  }

  /**
   * Run one recovery attempt for a record. When recovery refuses because the
   * record has used every retry, the record is marked unresolved, escalated and
   * alerted as Fatal.
   */
  async retry(record: ErrorRecord, signal?: AbortSignal): Promise<boolean> {
    const exhausted = record.retryCount >= this.recovery.maxRetries;
    if (exhausted) {
      await this.escalate(record);
      return false;
    }
    return this.recovery.attempt(record, signal);
  }

  /** Mark a record resolved once the operation it describes has succeeded. */
  resolve(record: ErrorRecord): void {
    record.resolved = true;
  }

  async escalate(record: ErrorRecord): Promise<void> {
    if (record.escalated) return;

    record.resolved = false;
    record.escalated = true;
    this.logger.warn('Escalating unrecovered error', {
      recordId: record.id,
      category: record.category,
      retryCount: record.retryCount,
    });
    await this.alertManager.notify({ ...record, level: 'fatal' });
  }

  getStats(): ErrorStats {
    const cutoff = Date.now() - RECENT_WINDOW_MS;
    const recent = this.history.filter((r) => r.occurredAt >= cutoff);

    return {
      totalErrors: this.total,
      recentErrors: recent.length,
      unresolvedErrors: recent.filter((r) => !r.resolved).length,
      counts: Object.fromEntries(this.counts),
    };
  }

  /** Most recent records, newest last. */
  recent(limit = 50): ErrorRecord[] {
    return this.history.slice(-limit);
  }

  private remember(record: ErrorRecord): void {
    this.total += 1;
    const key = `${record.category}:${record.level}`;
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);

    this.history.push(record);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
  }
}
