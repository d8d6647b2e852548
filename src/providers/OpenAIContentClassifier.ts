/**
 * OpenAI content classifier.
 * Asks a chat model for a JSON verdict on one viewer message and validates the
 * answer before it reaches the escalation rules.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { ClassifierResponseError } from '../errors.js';
import type { Message } from '../types/models.js';
import type { ClassificationResult, IContentClassifier } from './IContentClassifier.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

const SYSTEM_PROMPT = [
  'You assist the host of a live-commerce stream by triaging viewer chat.',
  'Answer with a JSON object: {"intent": string, "confidence": number between 0 and 1, "reply": string}.',
  'intent is one of complaint, after_sales, technical, price_inquiry, stock_inquiry, product_info, greeting, other.',
  'reply is a short, friendly answer in the viewer\'s language, or an empty string when no reply is appropriate.',
  'Lower the confidence when the question needs facts you do not have.',
].join('\n');

const ClassificationSchema = z.object({
  intent: z.string().min(1),
  confidence: z.coerce.number().min(0).max(1),
  reply: z.string().optional(),
});

/** Validate a raw model answer. */
export function parseClassification(content: string | null | undefined): ClassificationResult {
  if (!content) {
    throw new ClassifierResponseError('Content classifier returned an empty answer');
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new ClassifierResponseError('Content classifier answer is not JSON', {
      preview: content.slice(0, 100),
    });
  }

  const parsed = ClassificationSchema.safeParse(json);
  if (!parsed.success) {
    throw new ClassifierResponseError('Content classifier answer failed validation', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const { intent, confidence, reply } = parsed.data;
  const draftedReply = reply?.trim();
  return draftedReply ? { intent, confidence, draftedReply } : { intent, confidence };
}

export class OpenAIContentClassifier implements IContentClassifier {
  private client: OpenAI;
  private model: string;

  constructor(opts?: { apiKey?: string; model?: string; baseURL?: string }) {
    this.client = new OpenAI({
      apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      baseURL: opts?.baseURL,
    });
    this.model = opts?.model ?? DEFAULT_MODEL;
  }

  async classify(message: Message, recentContext: readonly Message[]): Promise<ClassificationResult> {
    const context = recentContext
      .map((m) => `${m.displayName}: ${m.content}`)
      .join('\n');

    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0.2,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: context
            ? `Recent chat:\n${context}\n\nClassify this message from ${message.displayName}:\n${message.content}`
            : `Classify this message from ${message.displayName}:\n${message.content}`,
        },
      ],
    });

    return parseClassification(response.choices[0]?.message.content);
  }
}
