/**
 * Alert channel interface.
 * Wraps an external notification target (webhook bot, pager, etc).
 */

import type { ErrorRecord } from '../types/models.js';

export interface IAlertChannel {
  /** Stable name used in logs and cooldown bookkeeping. */
  readonly name: string;

  /** Deliver one alert. Rejects when delivery fails. */
  send(record: ErrorRecord): Promise<void>;
}
