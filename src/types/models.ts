/**
 * Domain models: core entities as the pipeline understands them.
 * Decoupled from the wire frames in ./frames.ts.
 */

// ── Chat ──

/** A single decoded viewer chat message (danmaku). Frozen on creation. */
export interface Message {
  readonly senderId: string;
  readonly displayName: string;
  readonly content: string;
  readonly roomId: string;
  /** Epoch milliseconds at which the frame was decoded. */
  readonly receivedAt: number;
}

export type Priority = 'high' | 'medium' | 'low';

export const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low'];

export type MessageCategory =
  | 'complaint'
  | 'after_sales'
  | 'technical'
  | 'price_inquiry'
  | 'stock_inquiry'
  | 'product_info'
  | 'greeting'
  | 'other';

export interface TriagedItem {
  message: Message;
  priority: Priority;
  category: MessageCategory;
  enqueuedAt: number;
  /** Set when a takeover was already raised for this message at ingest. */
  takeoverId?: string;
}

// ── Connections ──

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'failed';

export interface ConnectionMetrics {
  connectedAt: number | null;
  disconnectedAt: number | null;
  lastPing: number | null;
  lastPong: number | null;
  /** Consecutive reconnect attempts since the last healthy handshake. */
  reconnectCount: number;
  totalReconnects: number;
  messagesIn: number;
  messagesOut: number;
  bytesIn: number;
  bytesOut: number;
}

export interface ConnectionMetricsSnapshot extends ConnectionMetrics {
  uptimeMs: number;
  latencyMs: number;
}

// ── Human collaboration ──

export type TakeoverReason =
  | 'severe_complaint'
  | 'escalation_request'
  | 'low_confidence'
  | 'brand_risk'
  | 'technical_error';

export type Urgency = 'low' | 'medium' | 'high' | 'critical';

export const URGENCY_RANK: Record<Urgency, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export type TakeoverStatus = 'pending' | 'resolved';

export interface TakeoverRequest {
  id: string;
  reason: TakeoverReason;
  urgency: Urgency;
  message: Message;
  classifierConfidence: number | null;
  /** Drafted reply offered to the operator, if the classifier produced one. */
  aiSuggestion: string | null;
  createdAt: number;
  status: TakeoverStatus;
  resolution: string | null;
  resolvedAt: number | null;
}

export type RiskLevel = 'low' | 'medium' | 'high';

export const RISK_RANK: Record<RiskLevel, number> = {
  low: 1,
  medium: 2,
  high: 3,
};

export type AuditStatus = 'pending' | 'approved' | 'rejected' | 'modified';

export interface AuditItem {
  id: string;
  message: Message;
  draftedReply: string;
  confidence: number;
  riskLevel: RiskLevel;
  status: AuditStatus;
  reviewer: string | null;
  reviewedAt: number | null;
  modifiedReply: string | null;
  reviewNotes: string | null;
  createdAt: number;
}

// ── Faults ──

export type ErrorLevel = 'fatal' | 'error' | 'warn' | 'info';

export type ErrorCategory =
  | 'connection'
  | 'cache'
  | 'external_api'
  | 'speech'
  | 'language_model'
  | 'network'
  | 'system';

export interface ErrorRecord {
  id: string;
  level: ErrorLevel;
  category: ErrorCategory;
  /** Operator-facing description of what was being attempted. */
  message: string;
  errorName: string;
  errorMessage: string;
  context: Record<string, unknown>;
  occurredAt: number;
  retryCount: number;
  resolved: boolean;
  escalated: boolean;
}
