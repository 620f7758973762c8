/**
 * Connection lifecycle over Socket.IO
 *
 *   connecting  handshake + auth middleware (rejection never builds a Connection)
 *   active      registered with the hub; `frame` listener reads, writer pump writes
 *   closing     socket disconnected or hub closed the queue → hub.unregister
 *   closed      writer done, socket released
 */
import { Connection } from "../client/connection.js";
import type { AppContext } from "../context.js";
import { dispatchCommand } from "../domains/index.js";
import { metrics } from "../infrastructure/metrics.js";
import { Errors } from "../shared/errors.js";
import { decodeCommand } from "./schemas.js";
import { SocketIoTransport } from "./transport.js";
import { FRAME_EVENT, type HubServer, type HubSocket } from "./types.js";

export interface SocketOptions {
  sendQueueSize: number;
}

/**
 * Build the hub Connection for an authenticated socket and wire its reader
 * and teardown.
 */
export function attachConnection(
  socket: HubSocket,
  context: AppContext,
  options: SocketOptions,
): Connection {
  const { hub, logger } = context;
  const user = socket.data.user;

  const connection = new Connection({
    userId: user.user_id,
    username: user.username,
    transport: new SocketIoTransport(socket),
    sendQueueSize: options.sendQueueSize,
    logger,
  });

  // Reader: one frame at a time, a bad frame never ends the connection
  socket.on(FRAME_EVENT, (raw) => {
    const result = decodeCommand(raw);
    if (!result.ok) {
      // Client-supplied tags never become label values
      const type = result.reason === "unknown_type" ? "unknown" : (result.type ?? "unknown");
      metrics.commandsTotal.inc({ type, status: "invalid" });
      logger.debug(
        { connectionId: connection.id, userId: connection.userId, reason: result.reason, type: result.type },
        "Dropped malformed frame",
      );
      return;
    }
    dispatchCommand(result.command, connection, context);
  });

  socket.on("disconnect", (reason) => {
    logger.info(
      { connectionId: connection.id, userId: connection.userId, reason },
      "Socket disconnected",
    );
    hub.unregister(connection);
  });

  hub.register(connection);
  return connection;
}

export function initializeSocket(
  io: HubServer,
  context: AppContext,
  options: SocketOptions,
): void {
  io.on("connection", (socket) => {
    const { hub, logger } = context;

    if (!hub.accepting) {
      logger.debug({ socketId: socket.id }, Errors.SHUTTING_DOWN);
      socket.disconnect(true);
      return;
    }

    logger.info(
      { socketId: socket.id, userId: socket.data.user.user_id },
      "Socket connected",
    );

    attachConnection(socket, context, options);
  });
}
