import type { ErrorRecord } from '../../src/types/models.js';

export function makeRecord(overrides: Partial<ErrorRecord> = {}): ErrorRecord {
  return {
    id: 'rec-1',
    level: 'error',
    category: 'connection',
    message: 'Connection handshake failed',
    errorName: 'TransportError',
    errorMessage: 'Connection refused',
    context: {},
    occurredAt: Date.now(),
    retryCount: 0,
    resolved: false,
    escalated: false,
    ...overrides,
  };
}
