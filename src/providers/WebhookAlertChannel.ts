/**
 * Webhook alert channel.
 * Posts alerts to an incoming-webhook URL as generic JSON, or as the text
 * message shape expected by Feishu or WeCom group bots.
 */

import type { IAlertChannel } from './IAlertChannel.js';
import type { ErrorLevel, ErrorRecord } from '../types/models.js';

export type WebhookFormat = 'json' | 'feishu' | 'wecom';

export interface WebhookAlertChannelOptions {
  url: string;
  /** Payload shape. Default: 'json'. */
  format?: WebhookFormat;
  /** Channel name. Default: `webhook:<format>`. */
  name?: string;
  /** Request timeout in ms. Default: 10_000. */
  timeoutMs?: number;
}

const LEVEL_BADGE: Record<ErrorLevel, string> = {
  fatal: '🚨 FATAL',
  error: '❌ ERROR',
  warn: '⚠️ WARN',
  info: 'ℹ️ INFO',
};

export class WebhookAlertChannel implements IAlertChannel {
  readonly name: string;
  private readonly url: string;
  private readonly format: WebhookFormat;
  private readonly timeoutMs: number;

  constructor(options: WebhookAlertChannelOptions) {
    this.url = options.url;
    this.format = options.format ?? 'json';
    this.name = options.name ?? `webhook:${this.format}`;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async send(record: ErrorRecord): Promise<void> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(this.buildPayload(record)),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Webhook ${this.name} responded ${response.status}`);
    }
  }

  buildPayload(record: ErrorRecord): Record<string, unknown> {
    if (this.format === 'json') {
      return {
        level: record.level,
        category: record.category,
        message: record.message,
        error: record.errorMessage,
        occurredAt: new Date(record.occurredAt).toISOString(),
        context: record.context,
      };
    }

    const text = formatText(record);
    if (this.format === 'feishu') {
      return { msg_type: 'text', content: { text } };
    }
    return { msgtype: 'text', text: { content: text } };
  }
}

function formatText(record: ErrorRecord): string {
  const lines = [
    `${LEVEL_BADGE[record.level]} [${record.category}] ${record.message}`,
    `error: ${record.errorMessage}`,
    `time: ${new Date(record.occurredAt).toISOString()}`,
  ];
  if (Object.keys(record.context).length > 0) {
    lines.push(`context: ${JSON.stringify(record.context)}`);
  }
  return lines.join('\n');
}
