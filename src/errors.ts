/**
 * Typed pipeline errors.
 * Subclasses may pin an ErrorCategory and/or ErrorLevel; the ErrorClassifier
 * honours a pinned value before falling back to keyword matching.
 */

import type { ErrorCategory, ErrorLevel } from './types/models.js';

export interface PipelineErrorOptions {
  details?: Record<string, unknown>;
  category?: ErrorCategory;
  level?: ErrorLevel;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly category?: ErrorCategory;
  readonly level?: ErrorLevel;

  constructor(code: string, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
    this.category = options.category;
    this.level = options.level;
  }
}

// ── Transport ──

export class TransportError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('TRANSPORT_ERROR', message, { details, cause, category: 'connection' });
  }
}

export class HandshakeTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super('HANDSHAKE_TIMEOUT', `Connection handshake timed out after ${timeoutMs}ms`, {
      details: { timeoutMs },
      category: 'connection',
      level: 'error',
    });
  }
}

export class HeartbeatTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super('HEARTBEAT_TIMEOUT', `No pong within ${timeoutMs}ms`, {
      details: { timeoutMs },
      category: 'connection',
      level: 'error',
    });
  }
}

/** A single frame could not be decoded. Always Warn: the frame is dropped. */
export class DecodeError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DECODE_ERROR', message, { details, category: 'connection', level: 'warn' });
  }
}

export class RetriesExhaustedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('RETRIES_EXHAUSTED', message, { details, level: 'fatal' });
  }
}

export class ResourceExhaustedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('RESOURCE_EXHAUSTED', message, { details, category: 'system', level: 'fatal' });
  }
}

// ── Content classifier ──

export class ClassifierTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super('CLASSIFIER_TIMEOUT', `Content classifier did not answer within ${timeoutMs}ms`, {
      details: { timeoutMs },
      category: 'language_model',
    });
  }
}

export class ClassifierResponseError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CLASSIFIER_RESPONSE', message, { details, category: 'language_model' });
  }
}

// ── Programming / operator errors ──

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super('NOT_FOUND', message, { level: 'info' });
  }
}

export class InvalidStateTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super('INVALID_STATE_TRANSITION', `Illegal connection state transition: ${from} → ${to}`, {
      details: { from, to },
      category: 'connection',
      level: 'error',
    });
  }
}

export class ConfigError extends PipelineError {
  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`, {
      details: { issues },
      category: 'system',
      level: 'fatal',
    });
  }
}
