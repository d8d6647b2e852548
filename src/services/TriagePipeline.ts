/**
 * Ingest → dedup → triage → queue → classify → escalate/audit/reply.
 *
 * `ingest()` runs on the connection's receive path and never blocks on the
 * classifier. A single consumer drains the queue in priority order.
 */

import { ClassifierTimeoutError, TransportError } from '../errors.js';
import type { IContentClassifier, ClassificationResult } from '../providers/IContentClassifier.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { RoomActivityEvent } from '../types/frames.js';
import type { ErrorRecord, Message, TriagedItem } from '../types/models.js';
import { withTimeout } from '../utils/timers.js';
import type { AuditLedger } from './AuditLedger.js';
import type { Deduplicator } from './Deduplicator.js';
import type { ErrorHandler } from './ErrorHandler.js';
import type { EscalationClassifier } from './EscalationClassifier.js';
import type { PriorityTriageQueue, QueueStats } from './PriorityTriageQueue.js';

export type IngestOutcome = 'duplicate' | 'dropped' | 'queued';

export type ProcessOutcome =
  | 'replied'
  | 'undelivered'
  | 'audit'
  | 'takeover'
  | 'no_reply'
  | 'failed'
  | 'cancelled';

/** Sends a drafted reply. Resolves false when it did not leave the process. */
export type ReplyHandler = (item: TriagedItem, reply: string) => boolean | Promise<boolean>;

export interface TriagePipelineDeps {
  deduplicator: Deduplicator;
  queue: PriorityTriageQueue;
  escalation: EscalationClassifier;
  ledger: AuditLedger;
  classifier: IContentClassifier;
  errorHandler: ErrorHandler;
  logger: ILogProvider;
  onReply?: ReplyHandler;
}

export interface TriagePipelineOptions {
  classifierTimeoutMs: number;
  /** Earlier messages per room handed to the classifier. */
  contextSize: number;
  /** How often the running consumer drops expired dedup senders. */
  dedupSweepIntervalMs: number;
}

export interface PipelineStats {
  ingested: number;
  duplicates: number;
  dropped: number;
  processed: number;
  replies: number;
  undelivered: number;
  takeovers: number;
  audits: number;
  failures: number;
  events: Record<string, number>;
  queue: QueueStats;
}

type Counter = Exclude<keyof PipelineStats, 'events' | 'queue'>;

export class TriagePipeline {
  private readonly options: TriagePipelineOptions;
  private readonly counts: Record<Counter, number> = {
    ingested: 0,
    duplicates: 0,
    dropped: 0,
    processed: 0,
    replies: 0,
    undelivered: 0,
    takeovers: 0,
    audits: 0,
    failures: 0,
  };
  private readonly events = new Map<string, number>();
  private readonly roomHistory = new Map<string, Message[]>();
  /** Context captured at ingest, so a backlog does not blur what the viewer had seen. */
  private readonly contexts = new WeakMap<Message, Message[]>();
  private running = false;
  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly deps: TriagePipelineDeps,
    options: Partial<TriagePipelineOptions> = {}
  ) {
    this.options = {
      classifierTimeoutMs: 15_000,
      contextSize: 10,
      dedupSweepIntervalMs: 60_000,
      ...options,
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Producer side ──

  ingest(message: Message): IngestOutcome {
    const { deduplicator, escalation, ledger, queue, logger } = this.deps;
    this.counts.ingested += 1;

    if (deduplicator.isDuplicate(message.senderId, message.content)) {
      this.counts.duplicates += 1;
      logger.debug('Duplicate message skipped', { senderId: message.senderId, roomId: message.roomId });
      return 'duplicate';
    }

    this.remember(message);

    const { item, takeover } = escalation.triage(message, Date.now());
    if (takeover) {
      const request = ledger.raiseTakeover({ ...takeover, message });
      item.takeoverId = request.id;
      this.counts.takeovers += 1;
    }

    if (!queue.enqueue(item)) {
      this.counts.dropped += 1;
      logger.warn('Triage queue full, message dropped', {
        priority: item.priority,
        senderId: message.senderId,
        roomId: message.roomId,
      });
      return 'dropped';
    }
    return 'queued';
  }

  recordEvent(event: RoomActivityEvent): void {
    this.events.set(event.kind, (this.events.get(event.kind) ?? 0) + 1);
  }

  // ── Consumer side ──

  /** Run the consumer until stop(). Returns the running loop if already started. */
  start(): Promise<void> {
    if (this.loop) return this.loop;

    this.running = true;
    const abort = new AbortController();
    this.abort = abort;

    const sweeper = setInterval(() => this.sweepDedup(), this.options.dedupSweepIntervalMs);
    sweeper.unref();
    this.sweeper = sweeper;

    const loop = this.consume(abort.signal).finally(() => {
      clearInterval(sweeper);
      if (this.sweeper === sweeper) this.sweeper = null;
      if (this.loop === loop) this.loop = null;
    });
    this.loop = loop;
    return loop;
  }

  /** Stop the consumer. Waits for the item in flight to finish. */
  async stop(): Promise<void> {
    this.running = false;
    this.abort?.abort();
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
    await this.loop;
  }

  async processItem(item: TriagedItem, signal?: AbortSignal): Promise<ProcessOutcome> {
    const { escalation, ledger, logger } = this.deps;
    const { message } = item;

    const result = await this.classify(item, signal);
    if (!result && signal?.aborted) {
      logger.info('Classification abandoned on shutdown', {
        senderId: message.senderId,
        roomId: message.roomId,
      });
      return 'cancelled';
    }
    this.counts.processed += 1;

    if (!result) {
      this.counts.failures += 1;
      if (!item.takeoverId) {
        const request = ledger.raiseTakeover({
          reason: 'technical_error',
          urgency: escalation.config.urgency.technical_error,
          message,
        });
        item.takeoverId = request.id;
        this.counts.takeovers += 1;
      }
      return 'failed';
    }

    const { confidence, draftedReply } = result;
    const decision = escalation.evaluate({ content: message.content, confidence, draftedReply });

    if (item.takeoverId) {
      if (draftedReply) ledger.attachSuggestion(item.takeoverId, draftedReply, confidence);
    } else if (decision.takeover) {
      const request = ledger.raiseTakeover({
        ...decision.takeover,
        message,
        classifierConfidence: confidence,
        aiSuggestion: draftedReply ?? null,
      });
      item.takeoverId = request.id;
      this.counts.takeovers += 1;
    }
    const takenOver = item.takeoverId !== undefined;

    // A takeover and an audit may both apply; either one holds the reply back.
    if (draftedReply && decision.audit.triggered) {
      ledger.submitAudit({ message, draftedReply, confidence, riskLevel: decision.audit.riskLevel });
      this.counts.audits += 1;
      return takenOver ? 'takeover' : 'audit';
    }

    if (takenOver) return 'takeover';
    if (!draftedReply) return 'no_reply';

    return (await this.dispatchReply(item, draftedReply)) ? 'replied' : 'undelivered';
  }

  stats(): PipelineStats {
    return {
      ...this.counts,
      events: Object.fromEntries(this.events),
      queue: this.deps.queue.stats(),
    };
  }

  private async consume(signal: AbortSignal): Promise<void> {
    const { queue, errorHandler, logger } = this.deps;
    logger.info('Triage consumer started');

    while (this.running) {
      const item = await queue.dequeue(signal);
      if (!item) break;

      try {
        await this.processItem(item, signal);
      } catch (err) {
        await errorHandler.handle(err, 'Triage item processing failed', {
          senderId: item.message.senderId,
          roomId: item.message.roomId,
        });
      }
    }

    logger.info('Triage consumer stopped', { remaining: queue.size });
  }

  /** Classify with timeout, recovering through the error handler until it refuses. */
  private async classify(item: TriagedItem, signal?: AbortSignal): Promise<ClassificationResult | null> {
    const { classifier, errorHandler, logger } = this.deps;
    const timeoutMs = this.options.classifierTimeoutMs;
    const context = this.contextFor(item.message);
    let record: ErrorRecord | null = null;

    for (;;) {
      try {
        const result = await withTimeout(
          classifier.classify(item.message, context),
          timeoutMs,
          () => new ClassifierTimeoutError(timeoutMs)
        );
        if (record) errorHandler.resolve(record);
        return result;
      } catch (err) {
        if (record) {
          logger.warn('Content classification retry failed', {
            recordId: record.id,
            retryCount: record.retryCount,
            error: err instanceof Error ? err.message : String(err),
          });
        } else {
          record = await errorHandler.handle(err, 'Content classification failed', {
            senderId: item.message.senderId,
            roomId: item.message.roomId,
            category: item.category,
          });
        }
        if (!(await errorHandler.retry(record, signal))) return null;
      }
    }
  }

  private async dispatchReply(item: TriagedItem, reply: string): Promise<boolean> {
    const { onReply, errorHandler, logger } = this.deps;
    const { roomId, senderId } = item.message;
    if (!onReply) {
      logger.debug('Reply drafted with no reply handler', { senderId });
      return false;
    }

    let failure: unknown = null;
    try {
      if (await onReply(item, reply)) {
        this.counts.replies += 1;
        return true;
      }
      failure = new TransportError('Reply was not delivered', { roomId });
    } catch (err) {
      failure = err;
    }

    this.counts.undelivered += 1;
    await errorHandler.handle(failure, 'Reply dispatch failed', { roomId, senderId });
    return false;
  }

  private sweepDedup(): void {
    const { deduplicator, logger } = this.deps;
    const dropped = deduplicator.sweep();
    if (dropped > 0) {
      logger.debug('Expired dedup senders dropped', { dropped, remaining: deduplicator.senderCount });
    }
  }

  // ── Room context ──

  private remember(message: Message): void {
    const history = this.roomHistory.get(message.roomId) ?? [];
    this.contexts.set(message, [...history]);

    history.push(message);
    if (history.length > this.options.contextSize) history.shift();
    this.roomHistory.set(message.roomId, history);
  }

  private contextFor(message: Message): Message[] {
    return this.contexts.get(message) ?? [];
  }
}
