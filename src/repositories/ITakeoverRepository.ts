/**
 * Takeover request storage.
 * Implementations hold a bounded set; the oldest request is evicted at capacity.
 */

import type { TakeoverRequest, Urgency } from '../types/models.js';

export interface ITakeoverRepository {
  /** Store a new request. Returns the request evicted to make room, if any. */
  insert(request: TakeoverRequest): TakeoverRequest | null;

  findById(id: string): TakeoverRequest | null;

  /** Pending requests, optionally of one urgency, in insertion order. */
  findPending(urgency?: Urgency): TakeoverRequest[];

  /** Apply a partial update. Returns the updated request, or null if not held. */
  update(id: string, changes: Partial<Omit<TakeoverRequest, 'id'>>): TakeoverRequest | null;

  count(): number;
}
