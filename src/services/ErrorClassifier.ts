/**
 * Fault taxonomy.
 * Maps any thrown value plus a free-text description to a category and level.
 * Typed PipelineErrors may pin either; otherwise the first keyword hit wins.
 */

import { PipelineError } from '../errors.js';
import type { ErrorCategory, ErrorLevel } from '../types/models.js';

export interface Classification {
  category: ErrorCategory;
  level: ErrorLevel;
}

// Order matters: the first category with a matching keyword is chosen.
export const CATEGORY_KEYWORDS: ReadonlyArray<[ErrorCategory, readonly string[]]> = [
  ['connection', ['websocket', 'connection', 'closed', 'disconnected', 'handshake', 'heartbeat']],
  ['cache', ['redis', 'cache', 'memcached', 'expired']],
  ['external_api', ['api', 'http', 'request', 'rate limit', '429', '503']],
  ['speech', ['asr', 'speech', 'audio', 'recognition', 'whisper']],
  ['language_model', ['llm', 'model', 'openai', 'token', 'completion']],
  ['network', ['network', 'dns', 'socket', 'econnrefused', 'etimedout', 'timeout']],
  ['system', ['memory', 'disk', 'cpu', 'permission', 'file not found']],
];

const EXHAUSTION_PATTERNS = ['out of memory', 'heap out of memory', 'enospc', 'emfile'];

const LEVEL_BY_CATEGORY: Record<ErrorCategory, ErrorLevel> = {
  connection: 'error',
  cache: 'error',
  system: 'error',
  external_api: 'warn',
  speech: 'warn',
  language_model: 'warn',
  network: 'warn',
};

export class ErrorClassifier {
  classify(error: unknown, message: string): Classification {
    const category = this.categorize(error, message);
    return { category, level: this.determineLevel(error, category) };
  }

  categorize(error: unknown, message: string): ErrorCategory {
    if (error instanceof PipelineError && error.category) {
      return error.category;
    }

    const haystack = `${describeError(error)} ${message}`.toLowerCase();
    for (const [category, keywords] of CATEGORY_KEYWORDS) {
      if (keywords.some((keyword) => haystack.includes(keyword))) {
        return category;
      }
    }
    return 'system';
  }

  determineLevel(error: unknown, category: ErrorCategory): ErrorLevel {
    if (error instanceof PipelineError && error.level) {
      return error.level;
    }

    const text = describeError(error).toLowerCase();
    if (EXHAUSTION_PATTERNS.some((pattern) => text.includes(pattern))) {
      return 'fatal';
    }

    return LEVEL_BY_CATEGORY[category];
  }
}

/** `Name: message` for Errors, the string form for anything else. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
