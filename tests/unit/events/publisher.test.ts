import { describe, it, expect, beforeEach } from "vitest";
import type { AppContext } from "@src/context.js";
import {
  buildActivity,
  buildPreview,
  EventPublisher,
  PREVIEW_LENGTH,
  type ChannelMessage,
} from "@src/events/publisher.js";
import { isProducerEventType } from "@src/events/types.js";
import { connect, createContext, flush, type TestConnection } from "../../helpers/fakes.js";

const message: ChannelMessage = {
  id: "m1",
  channel_id: "general",
  user_id: "u1",
  content: "hello there",
};

describe("buildPreview", () => {
  it("keeps short content as is", () => {
    expect(buildPreview("hi")).toBe("hi");
    expect(buildPreview("x".repeat(PREVIEW_LENGTH))).toBe("x".repeat(PREVIEW_LENGTH));
  });

  it("cuts long content and marks the cut", () => {
    expect(buildPreview("x".repeat(PREVIEW_LENGTH + 5))).toBe(`${"x".repeat(PREVIEW_LENGTH)}…`);
  });

  it("counts code points, not UTF-16 units", () => {
    const emoji = "😀".repeat(PREVIEW_LENGTH);
    expect(buildPreview(emoji)).toBe(emoji);
    expect(buildPreview(`${emoji}😀`)).toBe(`${emoji}…`);
  });
});

describe("buildActivity", () => {
  it("uses the provided names", () => {
    expect(buildActivity(message, { channelName: "General", authorName: "Alice" })).toEqual({
      channel_id: "general",
      channel_name: "General",
      author_id: "u1",
      author: "Alice",
      preview: "hello there",
      message_id: "m1",
    });
  });

  it("falls back to the channel id and a generic author", () => {
    const activity = buildActivity(message);
    expect(activity.channel_name).toBe("general");
    expect(activity.author).toBe("Someone");
  });
});

describe("EventPublisher", () => {
  let ctx: AppContext;
  let publisher: EventPublisher;
  let viewer: TestConnection;
  let other: TestConnection;

  beforeEach(() => {
    ctx = createContext();
    publisher = new EventPublisher(ctx.hub, ctx.logger);
    viewer = connect(ctx, "u1");
    other = connect(ctx, "u2");
    ctx.hub.subscribe(viewer.connection, "general");
  });

  it("refuses event types outside the catalogue", () => {
    const result = publisher.publish("message.pin", {}, { type: "global" });

    expect(result).toEqual({ accepted: false, targetCount: 0, delivered: 0, evicted: 0 });
    expect(ctx.logger.error).toHaveBeenCalled();
  });

  it("routes a channel target to viewers only", async () => {
    const result = publisher.publish("message.edit", message, {
      type: "channel",
      channelId: "general",
    });
    await flush();

    expect(result).toEqual({ accepted: true, targetCount: 1, delivered: 1, evicted: 0 });
    expect(viewer.transport.eventsOfType("message.edit")).toHaveLength(1);
    expect(other.transport.frames).toEqual([]);
  });

  it("routes a user target to that user's connections", async () => {
    const otherTab = connect(ctx, "u2");

    const result = publisher.publish("member.update", { id: "u2" }, { type: "user", userId: "u2" });
    await flush();

    expect(result.delivered).toBe(2);
    expect(other.transport.frames).toHaveLength(1);
    expect(otherTab.transport.frames).toHaveLength(1);
    expect(viewer.transport.frames).toEqual([]);
  });

  it("accepts an event nobody receives", () => {
    expect(
      publisher.publish("message.delete", {}, { type: "channel", channelId: "empty" }),
    ).toEqual({ accepted: true, targetCount: 0, delivered: 0, evicted: 0 });
  });

  it("sends a new message to viewers and the activity digest to everyone", async () => {
    const result = publisher.messageCreated(message, { authorName: "Alice" });
    await flush();

    expect(result).toEqual({
      message: { accepted: true, targetCount: 1, delivered: 1, evicted: 0 },
      activity: { accepted: true, targetCount: 2, delivered: 2, evicted: 0 },
    });

    expect(viewer.transport.events().map((e) => e.type)).toEqual([
      "message.new",
      "message.activity",
    ]);
    expect(other.transport.events()).toEqual([
      {
        type: "message.activity",
        data: {
          channel_id: "general",
          channel_name: "general",
          author_id: "u1",
          author: "Alice",
          preview: "hello there",
          message_id: "m1",
        },
      },
    ]);
  });

  it("carries the full reaction list", async () => {
    const reactions = [{ emoji: "👍", count: 2, user_ids: ["u1", "u2"] }];

    publisher.reactionUpdated("general", "m1", reactions);
    await flush();

    expect(viewer.transport.events()).toEqual([
      {
        type: "reaction.update",
        data: { message_id: "m1", channel_id: "general", reactions },
      },
    ]);
  });

  it("sends sidebar changes to everyone", async () => {
    publisher.channelDeleted("old");
    await flush();

    const expected = [{ type: "channel.delete", data: { id: "old" } }];
    expect(viewer.transport.events()).toEqual(expected);
    expect(other.transport.events()).toEqual(expected);
  });
});

describe("isProducerEventType", () => {
  it("knows every catalogued group", () => {
    for (const type of [
      "message.new",
      "reaction.update",
      "channels.reorder",
      "categories.update",
      "member.new",
      "emoji.delete",
    ]) {
      expect(isProducerEventType(type)).toBe(true);
    }
  });

  it("rejects hub-emitted and unknown types", () => {
    expect(isProducerEventType("voice.joined")).toBe(false);
    expect(isProducerEventType("typing")).toBe(false);
    expect(isProducerEventType("")).toBe(false);
  });
});
