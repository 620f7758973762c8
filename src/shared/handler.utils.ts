/**
 * Command handler utilities
 * Provides a createHandler wrapper for consistent error handling, logging and metrics
 */
import type { Connection } from "../client/connection.js";
import type { AppContext } from "../context.js";
import { metrics } from "../infrastructure/metrics.js";
import type { CommandData, CommandType } from "../socket/schemas.js";
import { generateCorrelationId } from "./crypto.js";

/**
 * Handler function signature. Handlers are synchronous: every hub operation
 * they call is a non-blocking enqueue.
 */
export type CommandHandler<T extends CommandType> = (
  data: CommandData<T>,
  connection: Connection,
  context: AppContext,
) => void;

/**
 * Wrap a command handler with:
 * - Centralized error handling (an exception never reaches the socket)
 * - Logging with correlation IDs
 * - Metrics tracking
 *
 * Payload validation happens once, in decodeCommand, before dispatch.
 *
 * @example
 * ```typescript
 * export const handleTyping = createHandler("typing", (data, connection, { hub }) => {
 *   hub.broadcastToChannel(data.channel_id, { type: "typing", data: { ... } });
 * });
 * ```
 */
export function createHandler<T extends CommandType>(
  type: T,
  handler: CommandHandler<T>,
): CommandHandler<T> {
  return (data, connection, context) => {
    const startTime = performance.now();
    const requestId = generateCorrelationId();

    try {
      handler(data, connection, context);

      const durationSec = (performance.now() - startTime) / 1000;
      metrics.commandsTotal.inc({ type, status: "handled" });
      metrics.commandLatency.observe({ type }, durationSec);

      context.logger.trace(
        {
          requestId,
          event: type,
          connectionId: connection.id,
          userId: connection.userId,
          durationMs: durationSec * 1000,
        },
        "Handler completed",
      );
    } catch (err) {
      metrics.commandsTotal.inc({ type, status: "error" });
      context.logger.error(
        {
          err,
          requestId,
          event: type,
          connectionId: connection.id,
          userId: connection.userId,
        },
        "Handler exception",
      );
    }
  };
}
