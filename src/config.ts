/**
 * Environment configuration.
 * Durations are read in seconds and exposed in milliseconds.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './providers/ILogProvider.js';
import type { SupervisorOptions } from './services/ConnectionSupervisor.js';

const count = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positive = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);
const ratio = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

export interface RoomConfig {
  name: string;
  url: string;
}

const RoomsSchema = z
  .string()
  .default('')
  .transform((value, ctx): RoomConfig[] => {
    const rooms: RoomConfig[] = [];
    for (const entry of value.split(',').map((s) => s.trim()).filter(Boolean)) {
      const separator = entry.indexOf('=');
      const name = separator > 0 ? entry.slice(0, separator).trim() : '';
      const url = separator > 0 ? entry.slice(separator + 1).trim() : '';
      if (!name || !/^wss?:\/\//.test(url)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected name=ws(s)://… but got "${entry}"` });
        continue;
      }
      rooms.push({ name, url });
    }
    return rooms;
  });

const EnvSchema = z.object({
  WEBSOCKET_MAX_RETRIES: count(5),
  WEBSOCKET_RETRY_DELAY: seconds(3),
  WEBSOCKET_MAX_DELAY: seconds(60),
  WEBSOCKET_HEARTBEAT_INTERVAL: seconds(30),
  WEBSOCKET_HANDSHAKE_TIMEOUT: seconds(10),
  DEDUP_MAX_RECENT: positive(5),
  DEDUP_TIME_WINDOW: seconds(30),
  QUEUE_MAX_SIZE: positive(100),
  LOW_CONFIDENCE_THRESHOLD: ratio(0.6),
  AUDIT_CONFIDENCE_THRESHOLD: ratio(0.75),
  CLASSIFIER_TIMEOUT: seconds(15),
  RECOVERY_MAX_RETRIES: count(3),
  ALERT_COOLDOWN: z.coerce.number().nonnegative().default(300),
  LIVE_ROOMS: RoomsSchema,
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ALERT_WEBHOOK_URL: z.string().url().optional(),
  FEISHU_WEBHOOK_URL: z.string().url().optional(),
  WECOM_WEBHOOK_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface PipelineConfig {
  supervisor: SupervisorOptions;
  dedup: { maxRecent: number; timeWindowSeconds: number };
  queueMaxSize: number;
  escalation: { lowConfidenceThreshold: number; auditConfidenceThreshold: number };
  classifier: { timeoutMs: number; apiKey?: string; model: string };
  recovery: { maxRetries: number };
  alerts: {
    cooldownMs: number;
    webhookUrl?: string;
    feishuWebhookUrl?: string;
    wecomWebhookUrl?: string;
  };
  rooms: RoomConfig[];
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  // Blank variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  return {
    supervisor: {
      maxRetries: e.WEBSOCKET_MAX_RETRIES,
      baseDelayMs: e.WEBSOCKET_RETRY_DELAY * 1000,
      maxDelayMs: e.WEBSOCKET_MAX_DELAY * 1000,
      heartbeatIntervalMs: e.WEBSOCKET_HEARTBEAT_INTERVAL * 1000,
      handshakeTimeoutMs: e.WEBSOCKET_HANDSHAKE_TIMEOUT * 1000,
    },
    dedup: { maxRecent: e.DEDUP_MAX_RECENT, timeWindowSeconds: e.DEDUP_TIME_WINDOW },
    queueMaxSize: e.QUEUE_MAX_SIZE,
    escalation: {
      lowConfidenceThreshold: e.LOW_CONFIDENCE_THRESHOLD,
      auditConfidenceThreshold: e.AUDIT_CONFIDENCE_THRESHOLD,
    },
    classifier: {
      timeoutMs: e.CLASSIFIER_TIMEOUT * 1000,
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
    },
    recovery: { maxRetries: e.RECOVERY_MAX_RETRIES },
    alerts: {
      cooldownMs: e.ALERT_COOLDOWN * 1000,
      webhookUrl: e.ALERT_WEBHOOK_URL,
      feishuWebhookUrl: e.FEISHU_WEBHOOK_URL,
      wecomWebhookUrl: e.WECOM_WEBHOOK_URL,
    },
    rooms: e.LIVE_ROOMS,
    logLevel: e.LOG_LEVEL,
  };
}
