/**
 * Shared error message constants for consistent error responses
 *
 * Only connection setup and HTTP queries can fail visibly; once a connection
 * is active, bad input is dropped without a reply.
 */
export const Errors = {
  // General
  INTERNAL_ERROR: "Internal server error",
  SHUTTING_DOWN: "Server is shutting down",

  // Auth
  ORIGIN_NOT_ALLOWED: "Origin not allowed",
  AUTH_REQUIRED: "Authentication required",
  INVALID_CREDENTIALS: "Invalid credentials",
  AUTH_FAILED: "Authentication failed",
} as const;

export type ErrorCode = (typeof Errors)[keyof typeof Errors];
