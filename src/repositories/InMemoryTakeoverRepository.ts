/**
 * In-memory ITakeoverRepository backed by a ring buffer.
 */

import type { TakeoverRequest, Urgency } from '../types/models.js';
import type { ITakeoverRepository } from './ITakeoverRepository.js';
import { RingBuffer } from './RingBuffer.js';

export class InMemoryTakeoverRepository implements ITakeoverRepository {
  private readonly buffer: RingBuffer<TakeoverRequest>;

  constructor(capacity = 100) {
    this.buffer = new RingBuffer(capacity);
  }

  insert(request: TakeoverRequest): TakeoverRequest | null {
    return this.buffer.push({ ...request });
  }

  findById(id: string): TakeoverRequest | null {
    const found = this.buffer.find(id);
    return found ? { ...found } : null;
  }

  findPending(urgency?: Urgency): TakeoverRequest[] {
    return this.buffer
      .filter((r) => r.status === 'pending' && (!urgency || r.urgency === urgency))
      .map((r) => ({ ...r }));
  }

  update(id: string, changes: Partial<Omit<TakeoverRequest, 'id'>>): TakeoverRequest | null {
    const current = this.buffer.find(id);
    if (!current) return null;
    const next = { ...current, ...changes };
    this.buffer.replace(id, next);
    return { ...next };
  }

  count(): number {
    return this.buffer.size;
  }
}
