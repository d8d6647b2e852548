/**
 * Rule-ordered escalation decisions.
 *
 * Decides, from message text plus the content classifier's confidence and
 * drafted reply, whether a human must take over and whether the drafted reply
 * needs review. Pure: the result depends only on the input and the config
 * passed at construction.
 */

import type {
  Message,
  MessageCategory,
  Priority,
  RiskLevel,
  TakeoverReason,
  TriagedItem,
  Urgency,
} from '../types/models.js';
import type { EscalationConfig } from './keywords.js';
import { defaultEscalationConfig } from './keywords.js';

export interface EscalationInput {
  content: string;
  /** 0.0–1.0. Default 1.0: fully trusted automated path. */
  confidence?: number;
  draftedReply?: string;
  riskLevel?: RiskLevel;
}

export interface TakeoverDecision {
  reason: TakeoverReason;
  urgency: Urgency;
}

export interface AuditDecision {
  triggered: boolean;
  riskLevel: RiskLevel;
}

export interface EscalationDecision {
  takeover: TakeoverDecision | null;
  audit: AuditDecision;
}

export interface Categorization {
  category: MessageCategory;
  priority: Priority;
}

export interface TriageResult {
  item: TriagedItem;
  takeover: TakeoverDecision | null;
}

export class EscalationClassifier {
  readonly config: EscalationConfig;

  constructor(config: Partial<EscalationConfig> = {}) {
    this.config = defaultEscalationConfig(config);
  }

  evaluate(input: EscalationInput): EscalationDecision {
    const confidence = input.confidence ?? 1.0;
    return {
      takeover: this.checkTakeover(input.content, confidence),
      audit: this.checkAudit(input.content, confidence, input.draftedReply ?? '', input.riskLevel),
    };
  }

  categorize(content: string): Categorization {
    for (const rule of this.config.categories) {
      if (containsAny(content, rule.keywords)) {
        return { category: rule.category, priority: rule.priority };
      }
    }
    return { category: 'other', priority: 'medium' };
  }

  /**
   * Ingest-time triage: categorise and check keyword takeovers (no classifier
   * confidence is available yet, so the automated path is trusted).
   */
  triage(message: Message, now: number): TriageResult {
    const { category, priority } = this.categorize(message.content);
    const { takeover } = this.evaluate({ content: message.content });

    const urgent = takeover !== null && (takeover.urgency === 'high' || takeover.urgency === 'critical');

    return {
      item: {
        message,
        category,
        priority: urgent ? 'high' : priority,
        enqueuedAt: now,
      },
      takeover,
    };
  }

  private checkTakeover(content: string, confidence: number): TakeoverDecision | null {
    const { urgency } = this.config;

    if (containsAny(content, this.config.complaintKeywords)) {
      return { reason: 'severe_complaint', urgency: urgency.severe_complaint };
    }
    if (containsAny(content, this.config.escalationKeywords)) {
      return { reason: 'escalation_request', urgency: urgency.escalation_request };
    }
    if (confidence < this.config.lowConfidenceThreshold) {
      return { reason: 'low_confidence', urgency: urgency.low_confidence };
    }
    if (containsAny(content, this.config.brandRiskKeywords)) {
      return { reason: 'brand_risk', urgency: urgency.brand_risk };
    }
    return null;
  }

  private checkAudit(
    content: string,
    confidence: number,
    draftedReply: string,
    riskLevel: RiskLevel = 'medium'
  ): AuditDecision {
    let risk = riskLevel;
    let triggered = confidence < this.config.auditConfidenceThreshold;

    const keywords = this.config.auditKeywords;
    if (containsAny(content, keywords) || containsAny(draftedReply, keywords)) {
      triggered = true;
      risk = 'high';
    }

    if (risk === 'high') triggered = true;

    return { triggered, riskLevel: risk };
  }
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}
