import type { FastifyPluginAsync } from "fastify";
import type { Hub } from "../hub/hub.js";

export const createHealthRoutes = (hub: Hub): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/health", async (_request, reply) => {
      const status = hub.accepting ? "ok" : "draining";

      if (status !== "ok") {
        reply.code(503);
      }

      return {
        status,
        connections: hub.connectionCount,
        users: hub.userCount,
        voiceRooms: hub.rooms.size,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    });
  };
};
