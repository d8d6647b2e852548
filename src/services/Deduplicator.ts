/**
 * Per-sender sliding-window duplicate suppression.
 * Equality is exact string match; paraphrases are not caught.
 */

export interface DeduplicatorOptions {
  /** Most recent messages remembered per sender. Default: 5. */
  maxRecent?: number;
  /** Window in seconds after which identical content is accepted again. Default: 30. */
  timeWindowSeconds?: number;
}

interface SeenEntry {
  content: string;
  seenAt: number;
}

export class Deduplicator {
  private readonly histories = new Map<string, SeenEntry[]>();
  private readonly maxRecent: number;
  private readonly windowMs: number;

  constructor(options: DeduplicatorOptions = {}) {
    this.maxRecent = options.maxRecent ?? 5;
    this.windowMs = (options.timeWindowSeconds ?? 30) * 1000;
  }

  isDuplicate(senderId: string, content: string): boolean {
    const now = Date.now();

    let history = this.histories.get(senderId);
    if (!history) {
      history = [];
      this.histories.set(senderId, history);
    }

    this.purge(history, now);

    if (history.some((entry) => entry.content === content)) {
      return true;
    }

    history.push({ content, seenAt: now });
    if (history.length > this.maxRecent) {
      history.shift();
    }
    return false;
  }

  /** Forget senders whose whole history has aged out. Returns how many were dropped. */
  sweep(): number {
    const now = Date.now();
    let dropped = 0;
    for (const [senderId, history] of this.histories) {
      this.purge(history, now);
      if (history.length === 0) {
        this.histories.delete(senderId);
        dropped += 1;
      }
    }
    return dropped;
  }

  get senderCount(): number {
    return this.histories.size;
  }

  clear(): void {
    this.histories.clear();
  }

  private purge(history: SeenEntry[], now: number): void {
    while (history.length > 0 && now - history[0].seenAt > this.windowMs) {
      history.shift();
    }
  }
}
