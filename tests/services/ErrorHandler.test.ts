import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ErrorHandler } from '../../src/services/ErrorHandler.js';
import { AlertManager } from '../../src/services/AlertManager.js';
import { AutoRecovery } from '../../src/services/AutoRecovery.js';
import { ErrorClassifier } from '../../src/services/ErrorClassifier.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { RecordingAlertChannel } from '../mocks/RecordingAlertChannel.js';

describe('ErrorHandler', () => {
  let logger: ConsoleLogProvider;
  let oncall: RecordingAlertChannel;
  let pager: RecordingAlertChannel;
  let handler: ErrorHandler;

  beforeEach(() => {
    logger = new ConsoleLogProvider();
    oncall = new RecordingAlertChannel('oncall');
    pager = new RecordingAlertChannel('pager');
    const alerts = new AlertManager(logger, [
      { channel: oncall, minLevel: 'error' },
      { channel: pager, minLevel: 'fatal' },
    ]);
    handler = new ErrorHandler(alerts, new AutoRecovery(logger, { baseDelayMs: 0 }), logger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // --- handle() ---

  it('should build a classified record', async () => {
    const record = await handler.handle(new Error('WebSocket closed'), 'Receive failed', { connection: 'room-1' });

    expect(record).toMatchObject({
      level: 'error',
      category: 'connection',
      message: 'Receive failed',
      errorName: 'Error',
      errorMessage: 'WebSocket closed',
      context: { connection: 'room-1' },
      retryCount: 0,
      resolved: false,
      escalated: false,
    });
    expect(oncall.received).toEqual([record]);
  });

  it('should skip the alert path when alert is false', async () => {
    await handler.handle(new Error('WebSocket closed'), 'Receive failed', {}, { alert: false });
    expect(oncall.received).toHaveLength(0);
    expect(logger.events).toHaveLength(0);
  });

  it('should always alert fatal records', async () => {
    await handler.handle(new Error('JavaScript heap out of memory'), 'Worker crashed', {}, { alert: false });
    expect(pager.received).toHaveLength(1);
    expect(pager.received[0].level).toBe('fatal');
  });

  it('should resolve the record when recovery succeeds', async () => {
    const record = await handler.handle(new Error('Redis cache miss'), 'Cache read', {}, { recover: true });
    expect(record.retryCount).toBe(1);
    expect(record.resolved).toBe(true);
  });

  it('should leave the record unresolved when recovery has no strategy', async () => {
    const record = await handler.handle(new Error('EACCES: permission denied'), 'Write log', {}, { recover: true });
    expect(record.retryCount).toBe(0);
    expect(record.resolved).toBe(false);
  });

  // --- retry() / escalate() ---

  it('should escalate as fatal once retries are exhausted', async () => {
    const record = await handler.handle(new Error('OpenAI completion failed'), 'Classify', {});
    record.retryCount = 3;

    await expect(handler.retry(record)).resolves.toBe(false);
    expect(record.escalated).toBe(true);
    expect(record.resolved).toBe(false);
    expect(pager.received).toHaveLength(1);
    expect(pager.received[0]).toMatchObject({ id: record.id, level: 'fatal', category: 'language_model' });
  });

  it('should escalate a record only once', async () => {
    const record = await handler.handle(new Error('OpenAI completion failed'), 'Classify', {});
    await handler.escalate(record);
    await handler.escalate(record);
    expect(pager.received).toHaveLength(1);
  });

  // --- getStats() / recent() ---

  it('should count by category and level and window recent errors', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T08:00:00Z'));
    await handler.handle(new Error('WebSocket closed'), 'a');

    vi.setSystemTime(new Date('2026-03-01T10:00:00Z'));
    const recovered = await handler.handle(new Error('HTTP 503'), 'b');
    handler.resolve(recovered);
    await handler.handle(new Error('HTTP 503'), 'c');

    expect(handler.getStats()).toEqual({
      totalErrors: 3,
      recentErrors: 2,
      unresolvedErrors: 1,
      counts: { 'connection:error': 1, 'external_api:warn': 2 },
    });
  });

  it('should bound the history', async () => {
    const alerts = new AlertManager(logger);
    const small = new ErrorHandler(alerts, new AutoRecovery(logger), logger, new ErrorClassifier(), 2);
    await small.handle(new Error('one'), 'first');
    await small.handle(new Error('two'), 'second');
    await small.handle(new Error('three'), 'third');

    expect(small.recent().map((r) => r.message)).toEqual(['second', 'third']);
    expect(small.getStats().totalErrors).toBe(3);
  });
});
