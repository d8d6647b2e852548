/**
 * Human review ledger.
 * Tracks takeover requests awaiting an operator and drafted replies awaiting
 * audit, plus their resolution. Operator tooling calls the list/resolve/review methods.
 */

import { randomUUID } from 'node:crypto';
import type { ITakeoverRepository } from '../repositories/ITakeoverRepository.js';
import type { IAuditRepository } from '../repositories/IAuditRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AuditItem,
  AuditStatus,
  Message,
  RiskLevel,
  TakeoverReason,
  TakeoverRequest,
  Urgency,
} from '../types/models.js';
import { RISK_RANK, URGENCY_RANK } from '../types/models.js';

export interface RaiseTakeoverInput {
  reason: TakeoverReason;
  urgency: Urgency;
  message: Message;
  classifierConfidence?: number | null;
  aiSuggestion?: string | null;
}

export interface SubmitAuditInput {
  message: Message;
  draftedReply: string;
  confidence: number;
  riskLevel: RiskLevel;
}

export interface LedgerStatistics {
  takeovers: {
    total: number;
    resolved: number;
    pending: number;
    evicted: number;
    resolutionRate: number;
  };
  audits: {
    submitted: number;
    approved: number;
    rejected: number;
    modified: number;
    pending: number;
    evicted: number;
    approvalRate: number;
  };
}

export class AuditLedger {
  private takeoverTotal = 0;
  private takeoverResolved = 0;
  private takeoverEvicted = 0;
  private auditSubmitted = 0;
  private auditEvicted = 0;
  private readonly reviewCounts: Record<Exclude<AuditStatus, 'pending'>, number> = {
    approved: 0,
    rejected: 0,
    modified: 0,
  };

  constructor(
    private readonly takeoverRepo: ITakeoverRepository,
    private readonly auditRepo: IAuditRepository,
    private readonly logger: ILogProvider
  ) {}

  // ── Takeovers ──

  raiseTakeover(input: RaiseTakeoverInput): TakeoverRequest {
    const request: TakeoverRequest = {
      id: `TK-${randomUUID()}`,
      reason: input.reason,
      urgency: input.urgency,
      message: input.message,
      classifierConfidence: input.classifierConfidence ?? null,
      aiSuggestion: input.aiSuggestion ?? null,
      createdAt: Date.now(),
      status: 'pending',
      resolution: null,
      resolvedAt: null,
    };

    const evicted = this.takeoverRepo.insert(request);
    this.takeoverTotal += 1;
    if (evicted) {
      this.takeoverEvicted += 1;
      if (evicted.status === 'pending') {
        this.logger.warn('Pending takeover evicted at capacity', { id: evicted.id });
      }
    }

    this.logger.warn('Human takeover requested', {
      id: request.id,
      reason: request.reason,
      urgency: request.urgency,
      senderId: request.message.senderId,
      roomId: request.message.roomId,
    });
    return request;
  }

  /** Pending takeovers, most urgent first, oldest first within an urgency. */
  listPendingTakeovers(urgency?: Urgency): TakeoverRequest[] {
    return this.takeoverRepo
      .findPending(urgency)
      .sort((a, b) => URGENCY_RANK[b.urgency] - URGENCY_RANK[a.urgency] || a.createdAt - b.createdAt);
  }

  getTakeover(id: string): TakeoverRequest | null {
    return this.takeoverRepo.findById(id);
  }

  /** Attach the drafted reply once the classifier has produced one. */
  attachSuggestion(id: string, aiSuggestion: string, confidence: number): boolean {
    return this.takeoverRepo.update(id, { aiSuggestion, classifierConfidence: confidence }) !== null;
  }

  resolveTakeover(id: string, resolution: string): boolean {
    const current = this.takeoverRepo.findById(id);
    if (!current || current.status !== 'pending') return false;

    this.takeoverRepo.update(id, { status: 'resolved', resolution, resolvedAt: Date.now() });
    this.takeoverResolved += 1;
    this.logger.info('Takeover resolved', { id });
    return true;
  }

  // ── Audits ──

  submitAudit(input: SubmitAuditInput): AuditItem {
    const item: AuditItem = {
      id: `AU-${randomUUID()}`,
      message: input.message,
      draftedReply: input.draftedReply,
      confidence: input.confidence,
      riskLevel: input.riskLevel,
      status: 'pending',
      reviewer: null,
      reviewedAt: null,
      modifiedReply: null,
      reviewNotes: null,
      createdAt: Date.now(),
    };

    const evicted = this.auditRepo.insert(item);
    this.auditSubmitted += 1;
    if (evicted) this.auditEvicted += 1;

    this.logger.info('Reply submitted for audit', {
      id: item.id,
      riskLevel: item.riskLevel,
      confidence: item.confidence,
    });
    return item;
  }

  /** Pending audit items, highest risk first, oldest first within a risk level. */
  listPendingAudits(riskLevel?: RiskLevel): AuditItem[] {
    return this.auditRepo
      .findPending(riskLevel)
      .sort((a, b) => RISK_RANK[b.riskLevel] - RISK_RANK[a.riskLevel] || a.createdAt - b.createdAt);
  }

  getAudit(id: string): AuditItem | null {
    return this.auditRepo.findById(id);
  }

  approve(id: string, reviewer: string): boolean {
    return this.review(id, 'approved', reviewer, {});
  }

  reject(id: string, reviewer: string, notes = ''): boolean {
    return this.review(id, 'rejected', reviewer, { reviewNotes: notes });
  }

  modify(id: string, reviewer: string, modifiedReply: string, notes = ''): boolean {
    return this.review(id, 'modified', reviewer, { modifiedReply, reviewNotes: notes });
  }

  getStatistics(): LedgerStatistics {
    const { approved, rejected, modified } = this.reviewCounts;
    return {
      takeovers: {
        total: this.takeoverTotal,
        resolved: this.takeoverResolved,
        pending: this.takeoverRepo.findPending().length,
        evicted: this.takeoverEvicted,
        resolutionRate: this.takeoverTotal > 0 ? this.takeoverResolved / this.takeoverTotal : 0,
      },
      audits: {
        submitted: this.auditSubmitted,
        approved,
        rejected,
        modified,
        pending: this.auditRepo.findPending().length,
        evicted: this.auditEvicted,
        approvalRate: this.auditSubmitted > 0 ? approved / this.auditSubmitted : 0,
      },
    };
  }

  private review(
    id: string,
    status: Exclude<AuditStatus, 'pending'>,
    reviewer: string,
    changes: Partial<Pick<AuditItem, 'modifiedReply' | 'reviewNotes'>>
  ): boolean {
    const current = this.auditRepo.findById(id);
    if (!current || current.status !== 'pending') return false;

    this.auditRepo.update(id, { ...changes, status, reviewer, reviewedAt: Date.now() });
    this.reviewCounts[status] += 1;
    this.logger.info('Audit item reviewed', { id, status, reviewer });
    return true;
  }
}
