/**
 * Frame decoding.
 * Returns a Result instead of throwing so the receive loop's drop-and-continue
 * path is ordinary control flow. Unknown frame types decode to `ignored`.
 */

import { DecodeError } from '../errors.js';
import type { InboundEvent, RawFrame } from '../types/frames.js';
import { KNOWN_FRAME_TYPES, type FrameType } from '../types/frames.js';
import type { Message } from '../types/models.js';

export type DecodeResult =
  | { ok: true; event: InboundEvent }
  | { ok: false; error: DecodeError };

const ANONYMOUS = '匿名用户';

export function decodeFrame(raw: string, receivedAt: number = Date.now()): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return fail('Frame is not valid JSON', raw, err instanceof Error ? err.message : String(err));
  }

  if (!isRawFrame(parsed)) {
    return fail('Frame is not a JSON object', raw);
  }

  const type = parsed.type;
  if (typeof type !== 'string') {
    return fail('Frame has no string "type"', raw);
  }

  if (!isKnownType(type)) {
    return { ok: true, event: { kind: 'ignored', rawType: type } };
  }

  const base = {
    senderId: str(parsed.sender_id ?? parsed.user_id),
    displayName: str(parsed.display_name ?? parsed.username) || ANONYMOUS,
    roomId: str(parsed.room_id),
    receivedAt,
  };

  switch (type) {
    case 'danmaku': {
      if (typeof parsed.content !== 'string' || parsed.content.length === 0) {
        return fail('Danmaku frame requires non-empty "content"', raw);
      }
      if (!base.senderId) {
        return fail('Danmaku frame requires "sender_id"', raw);
      }
      const message: Message = Object.freeze({ ...base, content: parsed.content });
      return { ok: true, event: { kind: 'danmaku', message } };
    }
    case 'gift':
      return {
        ok: true,
        event: {
          kind: 'gift',
          ...base,
          giftId: str(parsed.gift_id),
          giftName: str(parsed.gift_name),
          giftCount: num(parsed.gift_count, 1),
          giftValue: num(parsed.gift_value, 0),
        },
      };
    case 'like':
      return {
        ok: true,
        event: {
          kind: 'like',
          ...base,
          likeCount: num(parsed.like_count, 1),
          totalLikes: num(parsed.total_likes, 0),
        },
      };
    case 'enter':
      return { ok: true, event: { kind: 'enter', ...base, userLevel: num(parsed.user_level, 0) } };
    case 'follow':
      return { ok: true, event: { kind: 'follow', ...base } };
    case 'share':
      return { ok: true, event: { kind: 'share', ...base, shareType: str(parsed.share_type) } };
  }
}

function isRawFrame(value: unknown): value is RawFrame {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownType(type: string): type is FrameType {
  return (KNOWN_FRAME_TYPES as readonly string[]).includes(type);
}

function str(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function fail(reason: string, raw: string, cause?: string): DecodeResult {
  return {
    ok: false,
    error: new DecodeError(reason, {
      preview: raw.slice(0, 100),
      ...(cause && { cause }),
    }),
  };
}
