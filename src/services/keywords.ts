/**
 * Default escalation and categorisation rules.
 * Everything here is plain data; EscalationClassifier takes it through EscalationConfig.
 */

import type { MessageCategory, Priority, TakeoverReason, Urgency } from '../types/models.js';

export interface EscalationConfig {
  /** Legal/refund/fraud terms → severe_complaint. */
  complaintKeywords: string[];
  /** "Talk to a human" phrases → escalation_request. */
  escalationKeywords: string[];
  /** False-advertising/safety terms → brand_risk. */
  brandRiskKeywords: string[];
  /** Terms in the message or drafted reply that force an audit at high risk. */
  auditKeywords: string[];
  lowConfidenceThreshold: number;
  auditConfidenceThreshold: number;
  urgency: Record<TakeoverReason, Urgency>;
  /** Ordered: the first category with a keyword hit wins. */
  categories: CategoryRule[];
}

export interface CategoryRule {
  category: MessageCategory;
  priority: Priority;
  keywords: string[];
}

export const DEFAULT_COMPLAINT_KEYWORDS = [
  '投诉', '举报', '维权', '退款', '假货',
  '诈骗', '欺诈', '赔偿', '律师', '消费者协会',
  '差评', '曝光', '工商', '315',
];

export const DEFAULT_ESCALATION_KEYWORDS = [
  '人工客服', '转人工', '人工服务', '真人',
  '客服人员', '人工接听', '不要机器人',
];

export const DEFAULT_BRAND_RISK_KEYWORDS = ['虚假宣传', '价格欺诈', '质量问题', '安全隐患'];

export const DEFAULT_AUDIT_KEYWORDS = [
  '退款', '赔偿', '投诉', '维权',
  '质量问题', '假货', '欺诈',
];

export const DEFAULT_URGENCY: Record<TakeoverReason, Urgency> = {
  severe_complaint: 'high',
  escalation_request: 'medium',
  low_confidence: 'medium',
  brand_risk: 'high',
  technical_error: 'high',
};

export const DEFAULT_CATEGORIES: CategoryRule[] = [
  { category: 'complaint', priority: 'high', keywords: ['投诉', '举报', '维权', '假货', '骗'] },
  { category: 'after_sales', priority: 'high', keywords: ['售后', '退货', '换货', '退款', '坏了'] },
  { category: 'technical', priority: 'high', keywords: ['怎么用', '安装', '故障', '打不开', '连不上'] },
  { category: 'price_inquiry', priority: 'medium', keywords: ['多少钱', '价格', '优惠', '便宜', '折扣'] },
  { category: 'stock_inquiry', priority: 'medium', keywords: ['有货', '库存', '现货', '发货', '还有吗'] },
  { category: 'product_info', priority: 'medium', keywords: ['尺寸', '颜色', '材质', '型号', '参数'] },
  { category: 'greeting', priority: 'low', keywords: ['你好', '在吗', '哈喽', '主播好', '晚上好'] },
];

export function defaultEscalationConfig(
  overrides: Partial<EscalationConfig> = {}
): EscalationConfig {
  return {
    complaintKeywords: DEFAULT_COMPLAINT_KEYWORDS,
    escalationKeywords: DEFAULT_ESCALATION_KEYWORDS,
    brandRiskKeywords: DEFAULT_BRAND_RISK_KEYWORDS,
    auditKeywords: DEFAULT_AUDIT_KEYWORDS,
    lowConfidenceThreshold: 0.6,
    auditConfidenceThreshold: 0.75,
    urgency: DEFAULT_URGENCY,
    categories: DEFAULT_CATEGORIES,
    ...overrides,
  };
}
