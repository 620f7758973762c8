import { pino } from "pino";
import { config, isDev } from "../config/index.js";

const devTransport = {
  target: "pino-pretty",
  options: {
    translateTime: "HH:MM:ss Z",
    ignore: "pid,hostname,service",
    colorize: true,
  },
};

export const logger = pino({
  level: config.LOG_LEVEL,
  base: { service: "huddle-realtime" },
  // Session tokens travel in these headers
  redact: {
    paths: ["req.headers.authorization", "req.headers.cookie"],
    censor: "[redacted]",
  },
  ...(isDev && { transport: devTransport }),
});

export type Logger = typeof logger;
