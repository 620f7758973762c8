/**
 * Command dispatch - one handler per inbound command type
 *
 * The switch is exhaustive over ClientCommand: adding a command to
 * clientCommandSchema without routing it here fails to compile.
 */
import type { Connection } from "../client/connection.js";
import type { AppContext } from "../context.js";
import type { ClientCommand } from "../socket/schemas.js";

import { handleSubscribe, handleTyping } from "./chat/chat.handler.js";
import {
  handleVoiceAnswer,
  handleVoiceIce,
  handleVoiceJoin,
  handleVoiceLeave,
  handleVoiceMediaState,
  handleVoiceOffer,
} from "./voice/voice.handler.js";

export function dispatchCommand(
  command: ClientCommand,
  connection: Connection,
  context: AppContext,
): void {
  switch (command.type) {
    case "subscribe":
      return handleSubscribe(command.data, connection, context);
    case "typing":
      return handleTyping(command.data, connection, context);
    case "voice.join":
      return handleVoiceJoin(command.data, connection, context);
    case "voice.leave":
      return handleVoiceLeave(command.data, connection, context);
    case "voice.offer":
      return handleVoiceOffer(command.data, connection, context);
    case "voice.answer":
      return handleVoiceAnswer(command.data, connection, context);
    case "voice.ice":
      return handleVoiceIce(command.data, connection, context);
    case "voice.media_state":
      return handleVoiceMediaState(command.data, connection, context);
    default: {
      const unhandled: never = command;
      return unhandled;
    }
  }
}
