import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import { resolveToken } from "../../auth/middleware.js";
import { verifyJwt, type JwtOptions } from "../../auth/jwtValidator.js";
import type { Hub } from "../../hub/hub.js";
import type { Logger } from "../../infrastructure/logger.js";

export interface VoiceRoutesOptions {
  jwt: JwtOptions;
  logger: Logger;
}

/**
 * GET /api/voice/rooms
 * Who is in each voice room right now. Clients call this on page load to fill
 * sidebar occupancy before the socket starts delivering roster events.
 */
export const createVoiceRoutes = (
  hub: Hub,
  options: VoiceRoutesOptions,
): FastifyPluginAsync => {
  const requireUser = async (request: FastifyRequest, reply: FastifyReply) => {
    const token = resolveToken(request.headers);
    if (!token) {
      return reply.code(401).send({ error: "unauthorized" });
    }
    if (!verifyJwt(token, options.jwt, options.logger)) {
      return reply.code(401).send({ error: "invalid token" });
    }
  };

  return async (fastify) => {
    fastify.get(
      "/api/voice/rooms",
      { preHandler: requireUser },
      async () => ({ rooms: hub.rooms.snapshot() }),
    );
  };
};
