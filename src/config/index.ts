/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3030),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // SSL (optional, self-hosted installs usually sit behind a proxy)
  SSL_KEY_PATH: z.string().optional(),
  SSL_CERT_PATH: z.string().optional(),

  // Auth
  JWT_SECRET: z.string().min(16),
  JWT_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),

  // Realtime hub
  SEND_QUEUE_SIZE: z.coerce.number().int().positive().default(256),
  MAX_FRAME_BYTES: z.coerce.number().int().positive().default(64 * 1024),
  PING_INTERVAL_MS: z.coerce.number().int().positive().default(25_000),
  PING_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  // Security
  // Empty: only same-host browser origins are accepted
  CORS_ORIGINS: z.string().default('').transform(s => s.split(',').map(o => o.trim()).filter(Boolean)),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === 'development';
export const isProd = config.NODE_ENV === 'production';
