/**
 * Audit item storage.
 * Implementations hold a bounded set; the oldest item is evicted at capacity.
 */

import type { AuditItem, RiskLevel } from '../types/models.js';

export interface IAuditRepository {
  /** Store a new item. Returns the item evicted to make room, if any. */
  insert(item: AuditItem): AuditItem | null;

  findById(id: string): AuditItem | null;

  /** Pending items, optionally of one risk level, in insertion order. */
  findPending(riskLevel?: RiskLevel): AuditItem[];

  /** Apply a partial update. Returns the updated item, or null if not held. */
  update(id: string, changes: Partial<Omit<AuditItem, 'id'>>): AuditItem | null;

  count(): number;
}
