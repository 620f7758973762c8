/**
 * Event Publisher
 * The surface REST handlers and the storage layer use to fan persistence
 * results out to connected clients.
 *
 * Routing:
 * - channel → connections viewing that text channel
 * - user    → every connection of one user
 * - global  → everyone
 *
 * Full message payloads only go to channel viewers; everyone else gets the
 * small `message.activity` digest for unread badges and notifications.
 */
import type { Hub } from "../hub/hub.js";
import type { Logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import {
  isProducerEventType,
  PRODUCER_EVENTS,
  type DeliveryResult,
  type ProducerEventType,
} from "./types.js";

export type PublishTarget =
  | { type: "global" }
  | { type: "channel"; channelId: string }
  | { type: "user"; userId: string };

export interface PublishResult extends DeliveryResult {
  accepted: boolean;
}

/** One result per event published for a new message */
export interface MessageCreatedResult {
  message: PublishResult;
  activity: PublishResult;
}

/** Characters of message content kept in the activity digest */
export const PREVIEW_LENGTH = 120;

export interface ChannelMessage {
  id: string;
  channel_id: string;
  user_id: string;
  content: string;
  [key: string]: unknown;
}

export interface MessageActivityContext {
  /** Display name of the channel; falls back to its id */
  channelName?: string;
  /** Display name of the author */
  authorName?: string;
}

export interface MessageActivity {
  channel_id: string;
  channel_name: string;
  author_id: string;
  author: string;
  preview: string;
  message_id: string;
}

export interface ReactionSummary {
  emoji: string;
  count: number;
  user_ids: string[];
}

/**
 * Truncate content to PREVIEW_LENGTH code points, marking the cut with an ellipsis
 */
export function buildPreview(content: string): string {
  const chars = Array.from(content);
  if (chars.length <= PREVIEW_LENGTH) return content;
  return `${chars.slice(0, PREVIEW_LENGTH).join("")}…`;
}

export function buildActivity(
  message: ChannelMessage,
  context: MessageActivityContext = {},
): MessageActivity {
  return {
    channel_id: message.channel_id,
    channel_name: context.channelName ?? message.channel_id,
    author_id: message.user_id,
    author: context.authorName ?? "Someone",
    preview: buildPreview(message.content),
    message_id: message.id,
  };
}

const REJECTED: PublishResult = {
  accepted: false,
  targetCount: 0,
  delivered: 0,
  evicted: 0,
};

export class EventPublisher {
  constructor(
    private readonly hub: Hub,
    private readonly logger: Logger,
  ) {}

  /**
   * Deliver a producer event to its audience.
   * Event types outside PRODUCER_EVENTS are refused.
   */
  publish(type: string, data: unknown, target: PublishTarget): PublishResult {
    // Only catalogued events pass through
    if (!isProducerEventType(type)) {
      this.logger.error(
        { event: type, target },
        "Unknown producer event, add it to PRODUCER_EVENTS before publishing",
      );
      metrics.producerEvents.inc({ event_type: "unknown", delivered: "rejected" });
      return { ...REJECTED };
    }

    const result = this.route(type, data, target);

    metrics.producerEvents.inc({
      event_type: type,
      delivered: result.delivered > 0 ? "true" : "false",
    });
    this.logger.debug(
      { event: type, target, ...result },
      "Producer event routed",
    );

    return { accepted: true, ...result };
  }

  private route(
    type: ProducerEventType,
    data: unknown,
    target: PublishTarget,
  ): DeliveryResult {
    const event = { type, data };
    switch (target.type) {
      case "channel":
        return this.hub.broadcastToChannel(target.channelId, event);
      case "user":
        return this.hub.sendToUser(target.userId, event);
      case "global":
        return this.hub.broadcastGlobal(event);
    }
  }

  // ─── Messages ────────────────────────────────────────────────────

  /**
   * message.new to viewers of the channel, then the activity digest to everyone
   */
  messageCreated(
    message: ChannelMessage,
    context: MessageActivityContext = {},
  ): MessageCreatedResult {
    const created = this.publish(PRODUCER_EVENTS.message.NEW, message, {
      type: "channel",
      channelId: message.channel_id,
    });
    const activity = this.publish(
      PRODUCER_EVENTS.message.ACTIVITY,
      buildActivity(message, context),
      { type: "global" },
    );
    return { message: created, activity };
  }

  messageEdited(message: ChannelMessage): PublishResult {
    return this.publish(PRODUCER_EVENTS.message.EDIT, message, {
      type: "channel",
      channelId: message.channel_id,
    });
  }

  messageDeleted(channelId: string, messageId: string): PublishResult {
    return this.publish(
      PRODUCER_EVENTS.message.DELETE,
      { id: messageId, channel_id: channelId },
      { type: "channel", channelId },
    );
  }

  /**
   * Carries the full recomputed reaction list, so concurrent updates that
   * arrive out of order still converge on the latest state.
   */
  reactionUpdated(
    channelId: string,
    messageId: string,
    reactions: ReactionSummary[],
  ): PublishResult {
    return this.publish(
      PRODUCER_EVENTS.reaction.UPDATE,
      { message_id: messageId, channel_id: channelId, reactions },
      { type: "channel", channelId },
    );
  }

  // ─── Sidebar structure ───────────────────────────────────────────

  channelCreated(channel: object): PublishResult {
    return this.publish(PRODUCER_EVENTS.channel.NEW, channel, { type: "global" });
  }

  channelUpdated(channel: object): PublishResult {
    return this.publish(PRODUCER_EVENTS.channel.UPDATE, channel, { type: "global" });
  }

  channelDeleted(channelId: string): PublishResult {
    return this.publish(PRODUCER_EVENTS.channel.DELETE, { id: channelId }, { type: "global" });
  }

  channelsReordered(channels: object[]): PublishResult {
    return this.publish(PRODUCER_EVENTS.channel.REORDER, channels, { type: "global" });
  }

  memberJoined(member: object): PublishResult {
    return this.publish(PRODUCER_EVENTS.member.NEW, member, { type: "global" });
  }

  emojiCreated(emoji: object): PublishResult {
    return this.publish(PRODUCER_EVENTS.emoji.NEW, emoji, { type: "global" });
  }

  emojiDeleted(emojiId: string): PublishResult {
    return this.publish(PRODUCER_EVENTS.emoji.DELETE, { id: emojiId }, { type: "global" });
  }
}
