import { z } from "zod";

// Reusable validators
// Channel and user ids are opaque strings minted by the storage layer
const channelIdSchema = z.string().min(1).max(128);
const userIdSchema = z.string().min(1).max(128);

// ─────────────────────────────────────────────────────────────────
// Chat Schemas
// ─────────────────────────────────────────────────────────────────

/** Empty channel_id clears the viewed channel */
export const subscribeSchema = z.object({
  channel_id: z.string().max(128),
});

export const typingSchema = z.object({
  channel_id: channelIdSchema,
});

// ─────────────────────────────────────────────────────────────────
// Voice Room Schemas
// ─────────────────────────────────────────────────────────────────

export const voiceJoinSchema = z.object({
  channel_id: channelIdSchema,
});

export const voiceLeaveSchema = z.object({
  channel_id: channelIdSchema,
});

/**
 * offer / answer / ice share one shape. The payload (SDP or ICE candidate)
 * is opaque and relayed untouched.
 */
export const voiceSignalSchema = z.object({
  channel_id: z.string().max(128),
  target_user_id: userIdSchema,
  payload: z.unknown(),
});

export type VoiceSignalData = z.infer<typeof voiceSignalSchema>;

export const voiceMediaStateSchema = z.object({
  channel_id: channelIdSchema,
  cam_enabled: z.boolean().default(false),
  screen_sharing: z.boolean().default(false),
});

// ─────────────────────────────────────────────────────────────────
// Inbound frame
// ─────────────────────────────────────────────────────────────────

/** Outer shape of every inbound frame, before the tag is looked at */
export const frameSchema = z.object({
  type: z.string(),
  data: z.unknown(),
});

export const clientCommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), data: subscribeSchema }),
  z.object({ type: z.literal("typing"), data: typingSchema }),
  z.object({ type: z.literal("voice.join"), data: voiceJoinSchema }),
  z.object({ type: z.literal("voice.leave"), data: voiceLeaveSchema }),
  z.object({ type: z.literal("voice.offer"), data: voiceSignalSchema }),
  z.object({ type: z.literal("voice.answer"), data: voiceSignalSchema }),
  z.object({ type: z.literal("voice.ice"), data: voiceSignalSchema }),
  z.object({ type: z.literal("voice.media_state"), data: voiceMediaStateSchema }),
]);

export type ClientCommand = z.infer<typeof clientCommandSchema>;
export type CommandType = ClientCommand["type"];
export type CommandData<T extends CommandType> = Extract<ClientCommand, { type: T }>["data"];

export const COMMAND_TYPES: ReadonlySet<string> = new Set<CommandType>(
  clientCommandSchema.options.map((option) => option.shape.type.value),
);

export type DecodeFailure = "invalid_json" | "invalid_frame" | "unknown_type" | "invalid_payload";

export type DecodeResult =
  | { ok: true; command: ClientCommand }
  | { ok: false; reason: DecodeFailure; type?: string };

/**
 * Decode one inbound frame. Accepts the JSON text or an already-parsed object.
 * Never throws: a bad frame is reported and the connection carries on.
 */
export function decodeCommand(raw: unknown): DecodeResult {
  let value: unknown = raw;

  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return { ok: false, reason: "invalid_json" };
    }
  }

  const frame = frameSchema.safeParse(value);
  if (!frame.success) {
    return { ok: false, reason: "invalid_frame" };
  }

  const { type } = frame.data;
  if (!COMMAND_TYPES.has(type)) {
    return { ok: false, reason: "unknown_type", type };
  }

  const command = clientCommandSchema.safeParse(frame.data);
  if (!command.success) {
    return { ok: false, reason: "invalid_payload", type };
  }

  return { ok: true, command: command.data };
}
