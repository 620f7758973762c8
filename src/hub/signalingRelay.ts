/**
 * Signaling Relay
 * Forwards WebRTC offer/answer/ICE payloads between two users only while both
 * are joined to the same voice room.
 *
 * A refused relay is dropped silently: telling the sender would reveal whether
 * the target exists or is in the room. Payloads are never inspected.
 */
import type { Connection } from "../client/connection.js";
import type { Logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { VOICE_EVENTS } from "../events/types.js";
import type { Hub } from "./hub.js";

export type SignalKind =
  | typeof VOICE_EVENTS.OFFER
  | typeof VOICE_EVENTS.ANSWER
  | typeof VOICE_EVENTS.ICE;

export interface RelayedSignal {
  channel_id: string;
  from_user_id: string;
  payload: unknown;
}

export class SignalingRelay {
  constructor(
    private readonly hub: Hub,
    private readonly logger: Logger,
  ) {}

  /**
   * @returns whether the payload was forwarded
   */
  relay(
    sender: Connection,
    channelId: string,
    targetUserId: string,
    kind: SignalKind,
    payload: unknown,
  ): boolean {
    // Membership can change right after this check; a stale offer to a peer
    // that just left is ignored by its peer connection.
    const allowed =
      targetUserId !== sender.userId &&
      this.hub.rooms.areCoMembers(channelId, sender.userId, targetUserId);

    if (!allowed) {
      metrics.relayDecisions.inc({ kind, result: "dropped" });
      this.logger.debug(
        { connectionId: sender.id, userId: sender.userId, channelId, targetUserId, kind },
        "Signaling relay refused: not co-members",
      );
      return false;
    }

    const data: RelayedSignal = {
      channel_id: channelId,
      from_user_id: sender.userId,
      payload,
    };
    this.hub.sendToUser(targetUserId, { type: kind, data });
    metrics.relayDecisions.inc({ kind, result: "relayed" });

    return true;
  }
}
