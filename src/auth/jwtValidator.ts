/**
 * JWT Validator: local HMAC-SHA256 signature verification
 *
 * Flow:
 *   1. Decode JWT (header.payload.signature)
 *   2. Reject any algorithm other than HS256
 *   3. Verify HMAC-SHA256 signature with shared secret
 *   4. Check expiry (exp claim, or iat + max age)
 *   5. Parse payload through Zod UserSchema
 */
import { createHmac, timingSafeEqual } from "node:crypto";
import { UserSchema } from "./types.js";
import type { AuthenticatedUser } from "./types.js";
import type { Logger } from "../infrastructure/logger.js";

export interface JwtOptions {
  secret: string;
  maxAgeSeconds: number;
}

/**
 * Base64URL decode (RFC 7515)
 */
function base64UrlDecode(input: string): Buffer {
  const base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  const padded = base64 + "=".repeat((4 - (base64.length % 4)) % 4);
  return Buffer.from(padded, "base64");
}

function decodeJson(segment: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(base64UrlDecode(segment).toString("utf-8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    return null;
  }
}

/**
 * Verify a JWT and extract the user claims.
 * Uses HMAC-SHA256 with timing-safe comparison to prevent timing attacks.
 *
 * @returns The validated user or null if verification fails
 */
export function verifyJwt(
  token: string,
  options: JwtOptions,
  logger: Logger,
): AuthenticatedUser | null {
  // 1. Split JWT into parts
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    logger.debug("JWT: Invalid format (expected 3 parts)");
    return null;
  }

  // 2. Only HMAC-SHA256 is accepted
  const header = decodeJson(headerB64);
  if (!header || header.alg !== "HS256") {
    logger.debug({ alg: header?.alg }, "JWT: Unexpected signing method");
    return null;
  }

  // 3. Verify signature (timing-safe)
  const expectedSignature = createHmac("sha256", options.secret)
    .update(`${headerB64}.${payloadB64}`)
    .digest();
  const receivedSignature = base64UrlDecode(signatureB64);

  if (
    expectedSignature.length !== receivedSignature.length ||
    !timingSafeEqual(expectedSignature, receivedSignature)
  ) {
    logger.debug("JWT: Signature verification failed");
    return null;
  }

  // 4. Decode payload
  const payload = decodeJson(payloadB64);
  if (!payload) {
    logger.debug("JWT: Failed to decode payload");
    return null;
  }

  // 5. Check expiry
  const now = Math.floor(Date.now() / 1000);

  if (typeof payload.exp === "number" && payload.exp < now) {
    logger.debug("JWT: Token expired");
    return null;
  }

  // Fallback: if no exp claim, check iat + max age
  if (
    typeof payload.exp !== "number" &&
    typeof payload.iat === "number" &&
    payload.iat + options.maxAgeSeconds < now
  ) {
    logger.debug("JWT: Token exceeds max age (no exp claim)");
    return null;
  }

  // 6. Validate claims via Zod
  const parseResult = UserSchema.safeParse(payload);
  if (!parseResult.success) {
    logger.debug(
      { errors: parseResult.error.format() },
      "JWT: Payload validation failed",
    );
    return null;
  }

  return parseResult.data;
}

/**
 * Pull the token out of "Bearer <token>" or a bare token string
 */
export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const token = value.replace(/^Bearer\s+/i, "").trim();
  return token.length > 0 ? token : null;
}
