/**
 * Bounded recovery strategies, one per fault category.
 * Each call runs at most one attempt and never more than maxRetries in total.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ErrorCategory, ErrorRecord } from '../types/models.js';
import { sleep } from '../utils/timers.js';

export type RecoveryStrategy =
  | 'reconnect'
  | 'clear_and_retry'
  | 'backoff'
  | 'exponential_backoff'
  | 'none';

export const RECOVERY_STRATEGIES: Record<ErrorCategory, RecoveryStrategy> = {
  connection: 'reconnect',
  cache: 'clear_and_retry',
  external_api: 'exponential_backoff',
  network: 'exponential_backoff',
  language_model: 'backoff',
  speech: 'none',
  system: 'none',
};

/** Category-specific side effect run after the strategy's wait (clear a cache, reopen a client). */
export type RecoveryHandler = (record: ErrorRecord) => Promise<void> | void;

export interface AutoRecoveryOptions {
  maxRetries?: number;
  /** Unit delay in ms that every strategy's wait is a multiple of. Default: 1000. */
  baseDelayMs?: number;
}

export class AutoRecovery {
  readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly handlers = new Map<ErrorCategory, RecoveryHandler>();

  constructor(
    private readonly logger: ILogProvider,
    options: AutoRecoveryOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
  }

  registerHandler(category: ErrorCategory, handler: RecoveryHandler): void {
    this.handlers.set(category, handler);
  }

  /** Wait before the next attempt, or null when the strategy has no wait. */
  delayFor(record: ErrorRecord): number | null {
    const n = record.retryCount;
    switch (RECOVERY_STRATEGIES[record.category]) {
      case 'backoff':
        return Math.min(2 ** n, 30) * this.baseDelayMs;
      case 'exponential_backoff':
        return Math.min(1.5 * 2 ** n, 60) * this.baseDelayMs;
      case 'clear_and_retry':
        return this.baseDelayMs;
      case 'reconnect':
        return 2 * this.baseDelayMs;
      case 'none':
        return null;
    }
  }

  async attempt(record: ErrorRecord, signal?: AbortSignal): Promise<boolean> {
    if (record.retryCount >= this.maxRetries) {
      this.logger.warn('Recovery refused: retries exhausted', {
        recordId: record.id,
        retryCount: record.retryCount,
        maxRetries: this.maxRetries,
      });
      return false;
    }

    const strategy = RECOVERY_STRATEGIES[record.category];
    const delay = this.delayFor(record);
    if (delay === null) {
      this.logger.info('No recovery strategy', { recordId: record.id, category: record.category });
      return false;
    }

    this.logger.info('Attempting recovery', {
      recordId: record.id,
      strategy,
      delayMs: delay,
      attempt: record.retryCount + 1,
    });

    const waited = await sleep(delay, signal);
    if (!waited) return false;

    const handler = this.handlers.get(record.category);
    try {
      if (handler) await handler(record);
    } catch (err) {
      this.logger.error('Recovery handler failed', {
        recordId: record.id,
        strategy,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }

    record.retryCount += 1;
    return true;
  }
}
