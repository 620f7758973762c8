import { randomBytes, createHash } from "node:crypto";

/** Hex characters of the digest kept in log lines */
const FINGERPRINT_LENGTH = 12;

/**
 * Request id attached to every handler log line
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}

/**
 * Short SHA-256 prefix of a token. Lets rejected tokens be told apart in logs
 * without writing the token itself.
 */
export function tokenFingerprint(token: string): string {
  return createHash("sha256").update(token).digest("hex").slice(0, FINGERPRINT_LENGTH);
}
