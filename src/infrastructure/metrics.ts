/**
 * Prometheus-compatible metrics for observability
 * Provides both JSON metrics (/metrics) and Prometheus format (/metrics/prometheus)
 */
import type { FastifyPluginAsync } from "fastify";
import os from "os";
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { Hub } from "../hub/hub.js";

// Create a custom registry
export const metricsRegistry = new Registry();

// Add default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: metricsRegistry });

/**
 * Application-specific metrics
 */
export const metrics = {
  // Connections
  connectionsActive: new Gauge({
    name: "huddle_connections_active",
    help: "Current number of registered hub connections",
    registers: [metricsRegistry],
  }),

  // Voice rooms
  voiceRoomsActive: new Gauge({
    name: "huddle_voice_rooms_active",
    help: "Number of voice rooms with at least one participant",
    registers: [metricsRegistry],
  }),

  // Inbound client commands
  commandsTotal: new Counter({
    name: "huddle_commands_total",
    help: "Total number of inbound client frames",
    labelNames: ["type", "status"] as const, // handled, invalid, error
    registers: [metricsRegistry],
  }),

  commandLatency: new Histogram({
    name: "huddle_command_latency_seconds",
    help: "Inbound command processing latency in seconds",
    labelNames: ["type"] as const,
    buckets: [0.0005, 0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25],
    registers: [metricsRegistry],
  }),

  // Outbound delivery
  framesDelivered: new Counter({
    name: "huddle_frames_delivered_total",
    help: "Frames enqueued onto connection send queues",
    labelNames: ["scope"] as const, // global, channel, user, room, direct
    registers: [metricsRegistry],
  }),

  evictions: new Counter({
    name: "huddle_connection_evictions_total",
    help: "Connections evicted because their send queue refused a frame",
    labelNames: ["scope"] as const,
    registers: [metricsRegistry],
  }),

  // Signaling relay
  relayDecisions: new Counter({
    name: "huddle_signaling_relay_total",
    help: "WebRTC signaling relay decisions",
    labelNames: ["kind", "result"] as const, // relayed, dropped
    registers: [metricsRegistry],
  }),

  // Producer events
  producerEvents: new Counter({
    name: "huddle_producer_events_total",
    help: "Events published by REST/storage producers",
    labelNames: ["event_type", "delivered"] as const,
    registers: [metricsRegistry],
  }),

  // Authentication
  authAttempts: new Counter({
    name: "huddle_auth_attempts_total",
    help: "Authentication attempts",
    labelNames: ["result"] as const, // success, invalid_token, no_token, origin_rejected, error
    registers: [metricsRegistry],
  }),
};

/**
 * Metrics Fastify routes plugin
 */
export const createMetricsRoutes = (hub: Hub): FastifyPluginAsync => {
  return async (fastify) => {
    // Prometheus format endpoint
    fastify.get("/metrics/prometheus", async (_request, reply) => {
      updateHubMetrics(hub);

      reply.header("Content-Type", metricsRegistry.contentType);
      return metricsRegistry.metrics();
    });

    // JSON format endpoint
    fastify.get("/metrics", async () => {
      const memoryUsage = process.memoryUsage();

      return {
        system: {
          uptime: process.uptime(),
          memory: {
            rss: memoryUsage.rss,
            heapTotal: memoryUsage.heapTotal,
            heapUsed: memoryUsage.heapUsed,
            external: memoryUsage.external,
          },
          cpu: process.cpuUsage(),
          loadAverage: os.loadavg(),
        },
        application: {
          connections: hub.connectionCount,
          users: hub.userCount,
          voiceRooms: hub.rooms.size,
        },
        timestamp: new Date().toISOString(),
      };
    });
  };
};

function updateHubMetrics(hub: Hub): void {
  metrics.connectionsActive.set(hub.connectionCount);
  metrics.voiceRoomsActive.set(hub.rooms.size);
}
