import { TYPING_EVENT } from "../../events/types.js";
import { createHandler } from "../../shared/handler.utils.js";

/**
 * subscribe: pick the text channel whose scoped events this connection gets.
 * One channel per connection, matching one socket per browser tab.
 */
export const handleSubscribe = createHandler(
  "subscribe",
  (data, connection, { hub }) => {
    hub.subscribe(connection, data.channel_id === "" ? null : data.channel_id);
  },
);

/**
 * typing: fan out to everyone viewing the channel, sender included
 * (clients filter their own indicator).
 */
export const handleTyping = createHandler(
  "typing",
  (data, connection, { hub }) => {
    hub.broadcastToChannel(data.channel_id, {
      type: TYPING_EVENT,
      data: { user_id: connection.userId, channel_id: data.channel_id },
    });
  },
);
