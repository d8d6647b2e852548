import { describe, it, expect, vi } from 'vitest';
import { TriagePipeline, type ReplyHandler } from '../../src/services/TriagePipeline.js';
import { AlertManager } from '../../src/services/AlertManager.js';
import { AuditLedger } from '../../src/services/AuditLedger.js';
import { AutoRecovery } from '../../src/services/AutoRecovery.js';
import { Deduplicator } from '../../src/services/Deduplicator.js';
import { ErrorHandler } from '../../src/services/ErrorHandler.js';
import { EscalationClassifier } from '../../src/services/EscalationClassifier.js';
import { PriorityTriageQueue } from '../../src/services/PriorityTriageQueue.js';
import { InMemoryTakeoverRepository } from '../../src/repositories/InMemoryTakeoverRepository.js';
import { InMemoryAuditRepository } from '../../src/repositories/InMemoryAuditRepository.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { TriagedItem } from '../../src/types/models.js';
import { MockContentClassifier } from '../mocks/MockContentClassifier.js';
import { RecordingAlertChannel } from '../mocks/RecordingAlertChannel.js';
import { makeMessage } from '../mocks/messages.js';

function setup(opts: { queueSize?: number; onReply?: ReplyHandler } = {}) {
  const logger = new ConsoleLogProvider();
  const pager = new RecordingAlertChannel('pager');
  const errorHandler = new ErrorHandler(
    new AlertManager(logger, [{ channel: pager, minLevel: 'fatal' }]),
    new AutoRecovery(logger, { baseDelayMs: 0 }),
    logger
  );
  const queue = new PriorityTriageQueue(opts.queueSize ?? 100);
  const ledger = new AuditLedger(new InMemoryTakeoverRepository(), new InMemoryAuditRepository(), logger);
  const classifier = new MockContentClassifier();
  const deduplicator = new Deduplicator();
  const replies: [TriagedItem, string][] = [];
  const record: ReplyHandler = (item, reply) => {
    replies.push([item, reply]);
    return true;
  };

  const pipeline = new TriagePipeline(
    {
      deduplicator,
      queue,
      escalation: new EscalationClassifier(),
      ledger,
      classifier,
      errorHandler,
      logger,
      onReply: opts.onReply ?? record,
    },
    { classifierTimeoutMs: 50, contextSize: 2 }
  );

  /** Ingest one message and take its queued item straight back out. */
  const ingestAndTake = (content: string, senderId = 'viewer-1'): TriagedItem => {
    expect(pipeline.ingest(makeMessage({ content, senderId }))).toBe('queued');
    const item = queue.tryDequeue();
    if (!item) throw new Error('nothing queued');
    return item;
  };

  return { pipeline, queue, ledger, classifier, deduplicator, errorHandler, logger, pager, replies, ingestAndTake };
}

describe('TriagePipeline', () => {
  // --- ingest() ---

  it('should raise a keyword takeover at ingest and queue the message as high', () => {
    const { pipeline, queue, ledger } = setup();

    expect(pipeline.ingest(makeMessage({ content: '我要投诉，这是假货，要赔偿' }))).toBe('queued');

    const [takeover] = ledger.listPendingTakeovers();
    expect(takeover).toMatchObject({ reason: 'severe_complaint', urgency: 'high' });
    const item = queue.tryDequeue();
    expect(item).toMatchObject({ priority: 'high', category: 'complaint', takeoverId: takeover.id });
  });

  it('should skip duplicates from the same sender', () => {
    const { pipeline, queue } = setup();
    expect(pipeline.ingest(makeMessage({ content: '在吗' }))).toBe('queued');
    expect(pipeline.ingest(makeMessage({ content: '在吗' }))).toBe('duplicate');
    expect(pipeline.ingest(makeMessage({ content: '在吗', senderId: 'viewer-2' }))).toBe('queued');
    expect(queue.size).toBe(2);
    expect(pipeline.stats()).toMatchObject({ ingested: 3, duplicates: 1 });
  });

  it('should report drops when the level is full', () => {
    const { pipeline, logger } = setup({ queueSize: 1 });
    expect(pipeline.ingest(makeMessage({ content: '这个多少钱' }))).toBe('queued');
    expect(pipeline.ingest(makeMessage({ content: '有现货吗', senderId: 'viewer-2' }))).toBe('dropped');

    expect(pipeline.stats()).toMatchObject({ dropped: 1, queue: { medium: 1, totalDropped: 1 } });
    expect(logger.eventsAt('warn').at(-1)).toMatchObject({
      message: 'Triage queue full, message dropped',
      fields: { priority: 'medium', senderId: 'viewer-2' },
    });
  });

  // --- processItem() ---

  it('should dispatch a confident reply', async () => {
    const { pipeline, replies, ingestAndTake } = setup();
    const item = ingestAndTake('什么颜色');

    await expect(pipeline.processItem(item)).resolves.toBe('replied');
    expect(replies).toEqual([[item, '感谢支持']]);
    expect(pipeline.stats()).toMatchObject({ processed: 1, replies: 1 });
  });

  it('should hand low-confidence answers to a human and hold the draft for audit', async () => {
    const { pipeline, classifier, ledger, replies, ingestAndTake } = setup();
    classifier.enqueue({ intent: 'price_inquiry', confidence: 0.4, draftedReply: '99元' });
    const item = ingestAndTake('这个多少钱');

    await expect(pipeline.processItem(item)).resolves.toBe('takeover');
    expect(ledger.listPendingTakeovers()).toMatchObject([
      { reason: 'low_confidence', urgency: 'medium', classifierConfidence: 0.4, aiSuggestion: '99元' },
    ]);
    expect(item.takeoverId).toBe(ledger.listPendingTakeovers()[0].id);
    expect(ledger.listPendingAudits()).toMatchObject([
      { draftedReply: '99元', confidence: 0.4, riskLevel: 'medium', message: item.message },
    ]);
    expect(pipeline.stats()).toMatchObject({ takeovers: 1, audits: 1, replies: 0 });
    expect(replies).toEqual([]);
  });

  it('should raise both a complaint takeover and a high-risk audit', async () => {
    const { pipeline, classifier, ledger, replies, ingestAndTake } = setup();
    classifier.enqueue({ intent: 'complaint', confidence: 0.9, draftedReply: '非常抱歉' });
    const item = ingestAndTake('我要投诉，这是假货，要赔偿');

    await expect(pipeline.processItem(item)).resolves.toBe('takeover');
    expect(ledger.listPendingTakeovers()).toMatchObject([
      { reason: 'severe_complaint', urgency: 'high', aiSuggestion: '非常抱歉' },
    ]);
    expect(ledger.listPendingAudits()).toMatchObject([
      { draftedReply: '非常抱歉', confidence: 0.9, riskLevel: 'high' },
    ]);
    expect(replies).toEqual([]);
  });

  it('should hold uncertain replies for audit', async () => {
    const { pipeline, classifier, ledger, replies, ingestAndTake } = setup();
    classifier.enqueue({ intent: 'product_info', confidence: 0.7, draftedReply: '可以换大一号哦' });
    const item = ingestAndTake('衣服有点大');

    await expect(pipeline.processItem(item)).resolves.toBe('audit');
    expect(ledger.listPendingAudits()).toMatchObject([
      { draftedReply: '可以换大一号哦', confidence: 0.7, riskLevel: 'medium', message: item.message },
    ]);
    expect(replies).toEqual([]);
  });

  it('should attach the drafted reply to an ingest-time takeover', async () => {
    const { pipeline, classifier, ledger, ingestAndTake } = setup();
    classifier.enqueue({ intent: 'complaint', confidence: 0.8, draftedReply: '非常抱歉' });
    const item = ingestAndTake('我要投诉');

    await expect(pipeline.processItem(item)).resolves.toBe('takeover');
    expect(ledger.getStatistics().takeovers.total).toBe(1);
    expect(ledger.getTakeover(String(item.takeoverId))).toMatchObject({
      aiSuggestion: '非常抱歉',
      classifierConfidence: 0.8,
    });
  });

  it('should not reply when the classifier drafts nothing', async () => {
    const { pipeline, classifier, replies, ingestAndTake } = setup();
    classifier.enqueue({ intent: 'other', confidence: 0.95 });

    await expect(pipeline.processItem(ingestAndTake('哈哈哈'))).resolves.toBe('no_reply');
    expect(replies).toEqual([]);
  });

  // --- classifier failures ---

  it('should recover from a transient classifier failure', async () => {
    const { pipeline, classifier, errorHandler, replies, ingestAndTake } = setup();
    classifier.enqueue(new Error('OpenAI completion failed'));

    await expect(pipeline.processItem(ingestAndTake('什么颜色'))).resolves.toBe('replied');
    expect(classifier.calls).toHaveLength(2);
    expect(replies).toHaveLength(1);
    expect(errorHandler.recent()).toHaveLength(1);
    expect(errorHandler.recent()[0]).toMatchObject({
      category: 'language_model',
      level: 'warn',
      message: 'Content classification failed',
      retryCount: 1,
      resolved: true,
    });
  });

  it('should time out a stalled classifier and retry', async () => {
    const { pipeline, classifier, errorHandler, ingestAndTake } = setup();
    classifier.enqueue('hang');

    await expect(pipeline.processItem(ingestAndTake('什么颜色'))).resolves.toBe('replied');
    expect(errorHandler.recent()[0]).toMatchObject({
      errorName: 'ClassifierTimeoutError',
      errorMessage: 'Content classifier did not answer within 50ms',
      category: 'language_model',
    });
  });

  it('should raise a technical takeover once recovery gives up', async () => {
    const { pipeline, classifier, ledger, pager, ingestAndTake } = setup();
    const failure = new Error('OpenAI completion failed');
    classifier.enqueue(failure, failure, failure, failure);
    const item = ingestAndTake('什么颜色');

    await expect(pipeline.processItem(item)).resolves.toBe('failed');
    expect(classifier.calls).toHaveLength(4);
    expect(ledger.listPendingTakeovers()).toMatchObject([
      { reason: 'technical_error', urgency: 'high', message: item.message },
    ]);
    expect(pager.received).toHaveLength(1);
    expect(pager.received[0]).toMatchObject({ level: 'fatal', category: 'language_model' });
    expect(pipeline.stats()).toMatchObject({ processed: 1, failures: 1, takeovers: 1 });
  });

  it('should report reply dispatch failures', async () => {
    const { pipeline, errorHandler, ingestAndTake } = setup({
      onReply: () => {
        throw new Error('WebSocket is not open');
      },
    });

    await pipeline.processItem(ingestAndTake('什么颜色'));
    expect(errorHandler.recent()[0]).toMatchObject({
      message: 'Reply dispatch failed',
      errorMessage: 'WebSocket is not open',
    });
    expect(pipeline.stats()).toMatchObject({ replies: 0, undelivered: 1 });
  });

  it('should not count a reply the handler could not deliver', async () => {
    const { pipeline, errorHandler, ingestAndTake } = setup({ onReply: async () => false });

    await expect(pipeline.processItem(ingestAndTake('什么颜色'))).resolves.toBe('undelivered');
    expect(pipeline.stats()).toMatchObject({ processed: 1, replies: 0, undelivered: 1 });
    expect(errorHandler.recent()[0]).toMatchObject({
      message: 'Reply dispatch failed',
      errorName: 'TransportError',
      errorMessage: 'Reply was not delivered',
      context: { roomId: 'room-1', senderId: 'viewer-1' },
    });
  });

  it('should not raise a technical takeover when shutdown interrupts recovery', async () => {
    const { pipeline, classifier, ledger, logger, ingestAndTake } = setup();
    classifier.enqueue(new Error('OpenAI completion failed'));
    const abort = new AbortController();
    abort.abort();

    await expect(pipeline.processItem(ingestAndTake('什么颜色'), abort.signal)).resolves.toBe('cancelled');
    expect(classifier.calls).toHaveLength(1);
    expect(ledger.listPendingTakeovers()).toEqual([]);
    expect(pipeline.stats()).toMatchObject({ processed: 0, failures: 0, takeovers: 0 });
    expect(logger.eventsAt('info').at(-1)?.message).toBe('Classification abandoned on shutdown');
  });

  // --- room context ---

  it('should pass earlier messages from the same room as context', async () => {
    const { pipeline, queue, classifier } = setup();
    const m1 = makeMessage({ content: '有现货吗', receivedAt: 1 });
    const m2 = makeMessage({ content: '多少钱', receivedAt: 2, senderId: 'viewer-2' });
    const other = makeMessage({ content: '在吗', receivedAt: 3, roomId: 'room-2' });
    const m3 = makeMessage({ content: '什么材质', receivedAt: 4, senderId: 'viewer-3' });
    const m4 = makeMessage({ content: '尺寸呢', receivedAt: 5, senderId: 'viewer-4' });
    for (const m of [m1, m2, other, m3, m4]) pipeline.ingest(m);

    for (let item = queue.tryDequeue(); item; item = queue.tryDequeue()) {
      await pipeline.processItem(item);
    }

    const contextOf = (content: string) =>
      classifier.calls.find((c) => c.message.content === content)?.context.map((m) => m.content);
    expect(contextOf('什么材质')).toEqual(['有现货吗', '多少钱']);
    expect(contextOf('尺寸呢')).toEqual(['多少钱', '什么材质']);
    expect(contextOf('在吗')).toEqual([]);
  });

  // --- consumer ---

  it('should drain the queue in priority order until stopped', async () => {
    const { pipeline, classifier, replies } = setup();
    pipeline.ingest(makeMessage({ content: '主播好' }));
    pipeline.ingest(makeMessage({ content: '这个怎么用', senderId: 'viewer-2' }));

    const loop = pipeline.start();
    expect(pipeline.start()).toBe(loop);
    expect(pipeline.isRunning).toBe(true);

    await vi.waitFor(() => expect(replies).toHaveLength(2));
    expect(classifier.calls.map((c) => c.message.content)).toEqual(['这个怎么用', '主播好']);

    pipeline.ingest(makeMessage({ content: '什么颜色', senderId: 'viewer-3' }));
    await vi.waitFor(() => expect(replies).toHaveLength(3));

    await pipeline.stop();
    await loop;
    expect(pipeline.isRunning).toBe(false);
  });

  it('should forget expired dedup senders while running', async () => {
    vi.useFakeTimers();
    try {
      const { pipeline, deduplicator } = setup();
      pipeline.ingest(makeMessage({ content: '在吗' }));
      pipeline.ingest(makeMessage({ content: '在吗', senderId: 'viewer-2' }));
      expect(deduplicator.senderCount).toBe(2);

      const loop = pipeline.start();
      await vi.advanceTimersByTimeAsync(60_000);

      expect(deduplicator.senderCount).toBe(0);
      await pipeline.stop();
      await loop;
    } finally {
      vi.useRealTimers();
    }
  });

  it('should stop while waiting on an empty queue', async () => {
    const { pipeline, logger } = setup();
    const loop = pipeline.start();
    await pipeline.stop();
    await loop;
    expect(logger.events.map((e) => e.message)).toEqual(['Triage consumer started', 'Triage consumer stopped']);
  });

  // --- recordEvent() / stats() ---

  it('should count room activity by kind', () => {
    const { pipeline } = setup();
    const base = { senderId: 'u1', displayName: '小王', roomId: 'room-1', receivedAt: 0 };
    pipeline.recordEvent({ kind: 'gift', ...base, giftId: 'g1', giftName: '小心心', giftCount: 1, giftValue: 1 });
    pipeline.recordEvent({ kind: 'gift', ...base, giftId: 'g1', giftName: '小心心', giftCount: 2, giftValue: 1 });
    pipeline.recordEvent({ kind: 'follow', ...base });

    expect(pipeline.stats()).toEqual({
      ingested: 0,
      duplicates: 0,
      dropped: 0,
      processed: 0,
      replies: 0,
      undelivered: 0,
      takeovers: 0,
      audits: 0,
      failures: 0,
      events: { gift: 2, follow: 1 },
      queue: { high: 0, medium: 0, low: 0, inQueue: 0, totalEnqueued: 0, totalDropped: 0 },
    });
  });
});
