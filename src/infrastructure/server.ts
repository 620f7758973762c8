import Fastify, { type FastifyInstance } from "fastify";
import { Server } from "socket.io";
import fs from "fs";
import { config } from "../config/index.js";
import { createAuthMiddleware } from "../auth/middleware.js";
import type { AppContext } from "../context.js";
import { createVoiceRoutes } from "../domains/voice/voice.routes.js";
import { EventPublisher } from "../events/publisher.js";
import { Hub } from "../hub/hub.js";
import { SignalingRelay } from "../hub/signalingRelay.js";
import { initializeSocket } from "../socket/index.js";
import type {
  ClientToServerEvents,
  HubServer,
  InterServerEvents,
  ServerToClientEvents,
} from "../socket/types.js";
import type { AuthSocketData } from "../auth/types.js";
import { createHealthRoutes } from "./health.js";
import { logger } from "./logger.js";
import { createMetricsRoutes } from "./metrics.js";

export interface BootstrapResult {
  server: FastifyInstance;
  io: HubServer;
  hub: Hub;
  /** Handed to the REST and storage layers */
  publisher: EventPublisher;
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  // Configure HTTPS if certificates are provided
  const httpsOptions =
    config.SSL_KEY_PATH && config.SSL_CERT_PATH
      ? {
          key: fs.readFileSync(config.SSL_KEY_PATH),
          cert: fs.readFileSync(config.SSL_CERT_PATH),
        }
      : null;

  const fastify = (httpsOptions
    ? Fastify({
        loggerInstance: logger,
        https: httpsOptions,
      })
    : Fastify({
        loggerInstance: logger,
      })) as unknown as FastifyInstance;

  const io: HubServer = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    AuthSocketData
  >(fastify.server, {
    cors: config.CORS_ORIGINS.length > 0
      ? { origin: [...config.CORS_ORIGINS], credentials: true }
      : undefined,
    maxHttpBufferSize: config.MAX_FRAME_BYTES,
    pingInterval: config.PING_INTERVAL_MS,
    pingTimeout: config.PING_TIMEOUT_MS,
  });

  const hub = new Hub(logger);
  const context: AppContext = {
    hub,
    relay: new SignalingRelay(hub, logger),
    logger,
  };
  const jwt = { secret: config.JWT_SECRET, maxAgeSeconds: config.JWT_MAX_AGE_SECONDS };

  io.use(
    createAuthMiddleware({ jwt, allowedOrigins: config.CORS_ORIGINS, logger }),
  );
  initializeSocket(io, context, { sendQueueSize: config.SEND_QUEUE_SIZE });

  await fastify.register(createVoiceRoutes(hub, { jwt, logger }));
  await fastify.register(createHealthRoutes(hub));
  await fastify.register(createMetricsRoutes(hub));

  return {
    server: fastify,
    io,
    hub,
    publisher: new EventPublisher(hub, logger),
  };
}
