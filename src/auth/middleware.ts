import type { IncomingHttpHeaders } from "node:http";
import type { Logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import { Errors } from "../shared/errors.js";
import { tokenFingerprint } from "../shared/crypto.js";
import type { HubSocket } from "../socket/types.js";
import { extractBearerToken, verifyJwt, type JwtOptions } from "./jwtValidator.js";

/** Cookie the web client stores its session token in */
export const TOKEN_COOKIE = "huddle_token";

export interface AuthOptions {
  jwt: JwtOptions;
  /** Allowed browser origins; empty means same-host only */
  allowedOrigins: readonly string[];
  logger: Logger;
}

function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;
  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() === name) {
      const value = part.slice(eq + 1).trim();
      if (value.length === 0) return null;
      try {
        return decodeURIComponent(value);
      } catch {
        // Malformed percent-escape: treat as no cookie
        return null;
      }
    }
  }
  return null;
}

/**
 * Token lookup order: explicit handshake auth, session cookie, Authorization header
 */
export function resolveToken(
  headers: IncomingHttpHeaders,
  auth: Record<string, unknown> = {},
): string | null {
  return (
    extractBearerToken(auth.token) ??
    readCookie(headers.cookie, TOKEN_COOKIE) ??
    extractBearerToken(headers.authorization)
  );
}

/**
 * Non-browser clients send no Origin and are allowed. Browsers must match the
 * configured list, or the request host when the list is empty.
 */
export function isOriginAllowed(
  origin: string | undefined,
  host: string | undefined,
  allowedOrigins: readonly string[],
): boolean {
  if (!origin) return true;
  if (allowedOrigins.length > 0) {
    return allowedOrigins.includes("*") || allowedOrigins.includes(origin);
  }
  return host !== undefined && (origin === `http://${host}` || origin === `https://${host}`);
}

/**
 * Socket.IO handshake middleware. A rejected handshake never reaches the hub.
 */
export function createAuthMiddleware(options: AuthOptions) {
  const { logger } = options;

  return (socket: HubSocket, next: (err?: Error) => void): void => {
    const { headers, auth } = socket.handshake;

    if (!isOriginAllowed(headers.origin, headers.host, options.allowedOrigins)) {
      logger.warn({ socketId: socket.id, origin: headers.origin }, "Origin rejected");
      metrics.authAttempts.inc({ result: "origin_rejected" });
      return next(new Error(Errors.ORIGIN_NOT_ALLOWED));
    }

    const token = resolveToken(headers, auth);
    if (!token) {
      logger.warn({ socketId: socket.id }, "Connection attempt without token");
      metrics.authAttempts.inc({ result: "no_token" });
      return next(new Error(Errors.AUTH_REQUIRED));
    }

    try {
      const user = verifyJwt(token, options.jwt, logger);
      if (!user) {
        logger.warn(
          { socketId: socket.id, token: tokenFingerprint(token) },
          "Invalid token provided",
        );
        metrics.authAttempts.inc({ result: "invalid_token" });
        return next(new Error(Errors.INVALID_CREDENTIALS));
      }

      socket.data.user = user;
      metrics.authAttempts.inc({ result: "success" });
      logger.info({ socketId: socket.id, userId: user.user_id }, "Client authenticated");
      next();
    } catch (err) {
      logger.error({ err, socketId: socket.id }, "Authentication error");
      metrics.authAttempts.inc({ result: "error" });
      next(new Error(Errors.AUTH_FAILED));
    }
  };
}
