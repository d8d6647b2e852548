/**
 * Wire frames: shapes of inbound room frames and the events decoded from them.
 * Kept apart from the domain models so the platform protocol can evolve independently.
 */

import type { Message } from './models.js';

/** Frame types the decoder understands. Anything else decodes to `ignored`. */
export const KNOWN_FRAME_TYPES = [
  'danmaku',
  'gift',
  'like',
  'enter',
  'follow',
  'share',
] as const;

export type FrameType = (typeof KNOWN_FRAME_TYPES)[number];

export interface RawFrame {
  type?: unknown;
  sender_id?: unknown;
  user_id?: unknown;
  display_name?: unknown;
  username?: unknown;
  content?: unknown;
  room_id?: unknown;
  timestamp?: unknown;
  [key: string]: unknown;
}

// ── Decoded events ──

interface EventBase {
  senderId: string;
  displayName: string;
  roomId: string;
  receivedAt: number;
}

export interface DanmakuEvent {
  kind: 'danmaku';
  message: Message;
}

export interface GiftEvent extends EventBase {
  kind: 'gift';
  giftId: string;
  giftName: string;
  giftCount: number;
  giftValue: number;
}

export interface LikeEvent extends EventBase {
  kind: 'like';
  likeCount: number;
  totalLikes: number;
}

export interface EnterEvent extends EventBase {
  kind: 'enter';
  userLevel: number;
}

export interface FollowEvent extends EventBase {
  kind: 'follow';
}

export interface ShareEvent extends EventBase {
  kind: 'share';
  shareType: string;
}

export interface IgnoredEvent {
  kind: 'ignored';
  rawType: string;
}

export type InboundEvent =
  | DanmakuEvent
  | GiftEvent
  | LikeEvent
  | EnterEvent
  | FollowEvent
  | ShareEvent
  | IgnoredEvent;

/** Non-chat room activity handed to `onEvent` listeners. */
export type RoomActivityEvent = Exclude<InboundEvent, DanmakuEvent | IgnoredEvent>;
