/**
 * Three-level bounded priority queue.
 *
 * High always drains before Medium before Low. There is no fairness: a steady
 * stream of High items starves the lower levels. A full level drops the
 * incoming item (newest-drop); existing items are never evicted.
 */

import type { Priority, TriagedItem } from '../types/models.js';
import { PRIORITIES } from '../types/models.js';

export interface QueueStats {
  high: number;
  medium: number;
  low: number;
  inQueue: number;
  totalEnqueued: number;
  totalDropped: number;
}

type Waiter = (item: TriagedItem | null) => void;

export class PriorityTriageQueue {
  private readonly levels: Record<Priority, TriagedItem[]> = { high: [], medium: [], low: [] };
  private readonly waiters: Waiter[] = [];
  private totalEnqueued = 0;
  private totalDropped = 0;

  constructor(readonly maxQueueSize = 100) {}

  /** Returns false when the item's level is full and the item was dropped. */
  enqueue(item: TriagedItem): boolean {
    const level = this.levels[item.priority];
    if (level.length >= this.maxQueueSize) {
      this.totalDropped += 1;
      return false;
    }

    level.push(item);
    this.totalEnqueued += 1;

    // A waiter only exists while every level is empty, so this is the head.
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(this.takeHead());
    }
    return true;
  }

  tryDequeue(): TriagedItem | null {
    return this.takeHead();
  }

  /** Suspends while the queue is empty. Resolves null if the signal aborts first. */
  dequeue(signal?: AbortSignal): Promise<TriagedItem | null> {
    const head = this.takeHead();
    if (head) return Promise.resolve(head);
    if (signal?.aborted) return Promise.resolve(null);

    return new Promise<TriagedItem | null>((resolve) => {
      const waiter: Waiter = (item) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(null);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  depth(priority: Priority): number {
    return this.levels[priority].length;
  }

  get size(): number {
    return this.levels.high.length + this.levels.medium.length + this.levels.low.length;
  }

  stats(): QueueStats {
    return {
      high: this.levels.high.length,
      medium: this.levels.medium.length,
      low: this.levels.low.length,
      inQueue: this.size,
      totalEnqueued: this.totalEnqueued,
      totalDropped: this.totalDropped,
    };
  }

  private takeHead(): TriagedItem | null {
    for (const priority of PRIORITIES) {
      const item = this.levels[priority].shift();
      if (item) return item;
    }
    return null;
  }
}
