/**
 * Content classifier interface.
 * Reads a viewer message in its room context and proposes an intent, a
 * confidence and, optionally, a reply for the streamer's assistant to send.
 */

import type { Message } from '../types/models.js';

export interface ClassificationResult {
  /** Free-form intent label, e.g. `price_inquiry`. */
  intent: string;
  /** 0.0–1.0. */
  confidence: number;
  draftedReply?: string;
}

export interface IContentClassifier {
  /**
   * Classify `message`. `recentContext` holds earlier messages from the same
   * room, oldest first, and never includes `message` itself.
   */
  classify(message: Message, recentContext: readonly Message[]): Promise<ClassificationResult>;
}
