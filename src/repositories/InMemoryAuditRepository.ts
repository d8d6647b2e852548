/**
 * In-memory IAuditRepository backed by a ring buffer.
 */

import type { AuditItem, RiskLevel } from '../types/models.js';
import type { IAuditRepository } from './IAuditRepository.js';
import { RingBuffer } from './RingBuffer.js';

export class InMemoryAuditRepository implements IAuditRepository {
  private readonly buffer: RingBuffer<AuditItem>;

  constructor(capacity = 100) {
    this.buffer = new RingBuffer(capacity);
  }

  insert(item: AuditItem): AuditItem | null {
    return this.buffer.push({ ...item });
  }

  findById(id: string): AuditItem | null {
    const found = this.buffer.find(id);
    return found ? { ...found } : null;
  }

  findPending(riskLevel?: RiskLevel): AuditItem[] {
    return this.buffer
      .filter((i) => i.status === 'pending' && (!riskLevel || i.riskLevel === riskLevel))
      .map((i) => ({ ...i }));
  }

  update(id: string, changes: Partial<Omit<AuditItem, 'id'>>): AuditItem | null {
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
