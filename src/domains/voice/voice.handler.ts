import type { Connection } from "../../client/connection.js";
import type { AppContext } from "../../context.js";
import { VOICE_EVENTS, type HubEvent } from "../../events/types.js";
import type { SignalKind } from "../../hub/signalingRelay.js";
import type { VoiceSignalData } from "../../socket/schemas.js";
import { createHandler } from "../../shared/handler.utils.js";

/**
 * voice.join
 * 1. Reply voice.room_state to the joiner with everyone already present, so it
 *    can start offering to each peer without waiting for a roster push
 * 2. voice.joined to the rest of the room
 * 3. voice.joined to everyone, for sidebar occupancy
 * Steps 2 and 3 are skipped if the reply evicted the joiner.
 */
export const handleVoiceJoin = createHandler(
  "voice.join",
  (data, connection, { hub, logger }) => {
    const channelId = data.channel_id;
    const participants = hub.rooms.join(channelId, connection);

    hub.sendToConnection(connection, {
      type: VOICE_EVENTS.ROOM_STATE,
      data: { channel_id: channelId, participants },
    });

    // Evicted while replying: unregister has already announced voice.left
    if (!hub.has(connection)) return;

    const joined: HubEvent = {
      type: VOICE_EVENTS.JOINED,
      data: { channel_id: channelId, user_id: connection.userId },
    };
    hub.broadcastToRoom(channelId, joined, connection);
    hub.broadcastGlobal(joined);

    logger.debug(
      { channelId, userId: connection.userId, participants: participants.length },
      "Joined voice room",
    );
  },
);

/**
 * voice.leave: roster events only if the connection was actually in the room
 */
export const handleVoiceLeave = createHandler(
  "voice.leave",
  (data, connection, { hub, logger }) => {
    const channelId = data.channel_id;
    if (!hub.rooms.leave(channelId, connection)) return;

    const left: HubEvent = {
      type: VOICE_EVENTS.LEFT,
      data: { channel_id: channelId, user_id: connection.userId },
    };
    hub.broadcastToRoom(channelId, left);
    hub.broadcastGlobal(left);

    logger.debug({ channelId, userId: connection.userId }, "Left voice room");
  },
);

function forwardSignal(
  kind: SignalKind,
  data: VoiceSignalData,
  connection: Connection,
  { relay }: AppContext,
): void {
  relay.relay(connection, data.channel_id, data.target_user_id, kind, data.payload ?? null);
}

export const handleVoiceOffer = createHandler("voice.offer", (data, connection, context) =>
  forwardSignal(VOICE_EVENTS.OFFER, data, connection, context),
);
export const handleVoiceAnswer = createHandler("voice.answer", (data, connection, context) =>
  forwardSignal(VOICE_EVENTS.ANSWER, data, connection, context),
);
export const handleVoiceIce = createHandler("voice.ice", (data, connection, context) =>
  forwardSignal(VOICE_EVENTS.ICE, data, connection, context),
);

/**
 * voice.media_state: camera / screen-share flags to the rest of the room, so
 * peers can swap avatar and video tile without guessing from track state.
 */
export const handleVoiceMediaState = createHandler(
  "voice.media_state",
  (data, connection, { hub }) => {
    hub.broadcastToRoom(
      data.channel_id,
      {
        type: VOICE_EVENTS.MEDIA_STATE,
        data: {
          channel_id: data.channel_id,
          from_user_id: connection.userId,
          cam_enabled: data.cam_enabled,
          screen_sharing: data.screen_sharing,
        },
      },
      connection,
    );
  },
);
