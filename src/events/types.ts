/**
 * Server → client event envelope and the catalogue of event types
 */

/**
 * Every frame on the wire: a type tag plus a tag-specific payload.
 */
export interface HubEvent<TData = unknown> {
  readonly type: string;
  readonly data: TData;
}

/**
 * Serialize an event once; the resulting string is shared by every recipient
 * of one delivery call.
 */
export function encodeEvent(event: HubEvent): string {
  return JSON.stringify({ type: event.type, data: event.data });
}

/**
 * Events the hub itself emits in response to client commands.
 */
export const VOICE_EVENTS = {
  ROOM_STATE: "voice.room_state",
  JOINED: "voice.joined",
  LEFT: "voice.left",
  OFFER: "voice.offer",
  ANSWER: "voice.answer",
  ICE: "voice.ice",
  MEDIA_STATE: "voice.media_state",
} as const;

export const TYPING_EVENT = "typing" as const;

/**
 * Events published by the REST and storage layers, grouped by domain.
 *
 * The hub never interprets these payloads; it only picks the audience.
 * Adding a new event: add the string to the right group, then publish it
 * through EventPublisher.
 */
export const PRODUCER_EVENTS = {
  /** Messages: channel scoped, except the global activity digest */
  message: {
    NEW: "message.new",
    EDIT: "message.edit",
    DELETE: "message.delete",
    ACTIVITY: "message.activity",
  },

  /** Reactions carry the full recomputed list, never a delta */
  reaction: {
    UPDATE: "reaction.update",
  },

  /** Channels and categories: sidebar structure */
  channel: {
    NEW: "channel.new",
    UPDATE: "channel.update",
    DELETE: "channel.delete",
    REORDER: "channels.reorder",
    CATEGORY_NEW: "category.new",
    CATEGORY_DELETE: "category.delete",
    CATEGORIES_UPDATE: "categories.update",
  },

  /** Members: roster sidebar */
  member: {
    NEW: "member.new",
    UPDATE: "member.update",
  },

  /** Custom emoji */
  emoji: {
    NEW: "emoji.new",
    DELETE: "emoji.delete",
  },
} as const;

type ValuesOf<T> = T[keyof T];

export type ProducerEventType = ValuesOf<{
  [K in keyof typeof PRODUCER_EVENTS]: ValuesOf<(typeof PRODUCER_EVENTS)[K]>;
}>;

/**
 * Runtime Set for O(1) allowlist lookup.
 */
export const KNOWN_PRODUCER_EVENTS: ReadonlySet<string> = new Set(
  Object.values(PRODUCER_EVENTS).flatMap((group) => Object.values(group)),
);

export function isProducerEventType(type: string): type is ProducerEventType {
  return KNOWN_PRODUCER_EVENTS.has(type);
}

/**
 * Outcome of one delivery call. Informational only: delivery is fire-and-forget.
 */
export interface DeliveryResult {
  /** Connections the event was addressed to */
  targetCount: number;
  /** Connections whose queue accepted the frame */
  delivered: number;
  /** Connections evicted because their queue refused the frame */
  evicted: number;
}

export type DeliveryScope = "global" | "channel" | "user" | "room" | "direct";
