import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  createAuthMiddleware,
  isOriginAllowed,
  resolveToken,
  TOKEN_COOKIE,
} from "@src/auth/middleware.js";
import type { AuthSocketData } from "@src/auth/types.js";
import { metrics } from "@src/infrastructure/metrics.js";
import type { HubSocket } from "@src/socket/types.js";
import { createMockLogger, signTestToken, TEST_JWT_SECRET } from "../../helpers/fakes.js";

// ─── Helpers ──────────────────────────────────────────────────────────────

interface MockSocketOptions {
  auth?: Record<string, unknown>;
  headers?: Record<string, string>;
}

function createMockSocket(options: MockSocketOptions = {}) {
  const data: Partial<AuthSocketData> = {};
  const socket = {
    id: "test-socket-id",
    data,
    handshake: {
      auth: options.auth ?? {},
      headers: options.headers ?? { host: "chat.example.test", origin: "https://chat.example.test" },
    },
  };
  return { socket: socket as unknown as HubSocket, data };
}

const validToken = () =>
  signTestToken({
    user_id: "u1",
    username: "alice",
    exp: Math.floor(Date.now() / 1000) + 60,
  });

const middleware = (allowedOrigins: string[] = []) =>
  createAuthMiddleware({
    jwt: { secret: TEST_JWT_SECRET, maxAgeSeconds: 3600 },
    allowedOrigins,
    logger: createMockLogger(),
  });

// ─── Tests ────────────────────────────────────────────────────────────────

describe("createAuthMiddleware", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(metrics.authAttempts, "inc");
  });

  it("attaches the user to socket.data on success", () => {
    const { socket, data } = createMockSocket({ auth: { token: validToken() } });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith();
    expect(data).toEqual({ user: { user_id: "u1", username: "alice", is_owner: false } });
    expect(metrics.authAttempts.inc).toHaveBeenCalledWith({ result: "success" });
  });

  it("does not store the token in socket.data", () => {
    const { socket, data } = createMockSocket({ auth: { token: validToken() } });

    middleware()(socket, vi.fn());

    expect(data).not.toHaveProperty("token");
  });

  it("rejects a connection without token", () => {
    const { socket } = createMockSocket();
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith(
      expect.objectContaining({ message: "Authentication required" }),
    );
    expect(metrics.authAttempts.inc).toHaveBeenCalledWith({ result: "no_token" });
  });

  it("rejects an invalid token", () => {
    const { socket, data } = createMockSocket({ auth: { token: "invalid.jwt.token" } });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith(expect.objectContaining({ message: "Invalid credentials" }));
    expect(data).toEqual({});
    expect(metrics.authAttempts.inc).toHaveBeenCalledWith({ result: "invalid_token" });
  });

  it("rejects a cross-site origin before looking at the token", () => {
    const { socket } = createMockSocket({
      auth: { token: validToken() },
      headers: { host: "chat.example.test", origin: "https://evil.example.test" },
    });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith(expect.objectContaining({ message: "Origin not allowed" }));
    expect(metrics.authAttempts.inc).toHaveBeenCalledWith({ result: "origin_rejected" });
  });

  it("allows a connection without origin header (native clients)", () => {
    const { socket } = createMockSocket({
      auth: { token: validToken() },
      headers: { host: "chat.example.test" },
    });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith();
  });

  it("reads the token from the session cookie", () => {
    const { socket, data } = createMockSocket({
      headers: {
        host: "chat.example.test",
        origin: "http://chat.example.test",
        cookie: `theme=dark; ${TOKEN_COOKIE}=${validToken()}`,
      },
    });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith();
    expect(data.user?.user_id).toBe("u1");
  });

  it("treats a malformed cookie escape as a missing token", () => {
    const { socket } = createMockSocket({
      headers: { host: "chat.example.test", cookie: `${TOKEN_COOKIE}=%E0%A4%A` },
    });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith(
      expect.objectContaining({ message: "Authentication required" }),
    );
    expect(metrics.authAttempts.inc).toHaveBeenCalledWith({ result: "no_token" });
  });

  it("falls back to the Authorization header past a malformed cookie", () => {
    const { socket, data } = createMockSocket({
      headers: {
        host: "chat.example.test",
        cookie: `${TOKEN_COOKIE}=%E0%A4%A`,
        authorization: `Bearer ${validToken()}`,
      },
    });
    const next = vi.fn();

    middleware()(socket, next);

    expect(next).toHaveBeenCalledWith();
    expect(data.user?.user_id).toBe("u1");
  });

  it("reports unexpected failures as authentication errors", () => {
    const { socket } = createMockSocket({ auth: { token: validToken() } });
    const next = vi.fn();
    const broken = createAuthMiddleware({
      jwt: {
        get secret(): string {
          throw new Error("secret unavailable");
        },
        maxAgeSeconds: 3600,
      },
      allowedOrigins: [],
      logger: createMockLogger(),
    });

    broken(socket, next);

    expect(next).toHaveBeenCalledWith(
      expect.objectContaining({ message: "Authentication failed" }),
    );
    expect(metrics.authAttempts.inc).toHaveBeenCalledWith({ result: "error" });
  });
});

describe("resolveToken", () => {
  it("prefers handshake auth over cookie and header", () => {
    expect(
      resolveToken(
        { cookie: `${TOKEN_COOKIE}=from-cookie`, authorization: "Bearer from-header" },
        { token: "from-auth" },
      ),
    ).toBe("from-auth");
  });

  it("prefers the cookie over the Authorization header", () => {
    expect(
      resolveToken({ cookie: `${TOKEN_COOKIE}=from-cookie`, authorization: "Bearer from-header" }),
    ).toBe("from-cookie");
  });

  it("strips the Bearer prefix from the Authorization header", () => {
    expect(resolveToken({ authorization: "Bearer my.jwt.token" })).toBe("my.jwt.token");
  });

  it("ignores other cookies and empty values", () => {
    expect(resolveToken({ cookie: `session=abc; ${TOKEN_COOKIE}=` })).toBeNull();
  });

  it("ignores a cookie whose escape cannot be decoded", () => {
    expect(resolveToken({ cookie: `${TOKEN_COOKIE}=%E0%A4%A` })).toBeNull();
  });

  it("decodes an escaped cookie value", () => {
    expect(resolveToken({ cookie: `${TOKEN_COOKIE}=a%2Eb%2Ec` })).toBe("a.b.c");
  });

  it("returns null when nothing is present", () => {
    expect(resolveToken({})).toBeNull();
  });
});

describe("isOriginAllowed", () => {
  it("allows a missing origin", () => {
    expect(isOriginAllowed(undefined, "chat.example.test", [])).toBe(true);
  });

  it("accepts the same host over http and https when no list is configured", () => {
    expect(isOriginAllowed("http://chat.example.test", "chat.example.test", [])).toBe(true);
    expect(isOriginAllowed("https://chat.example.test", "chat.example.test", [])).toBe(true);
    expect(isOriginAllowed("https://other.example.test", "chat.example.test", [])).toBe(false);
  });

  it("uses the configured list when present", () => {
    const allowed = ["https://app.example.test"];
    expect(isOriginAllowed("https://app.example.test", "api.example.test", allowed)).toBe(true);
    expect(isOriginAllowed("https://api.example.test", "api.example.test", allowed)).toBe(false);
  });

  it("accepts any origin with a wildcard entry", () => {
    expect(isOriginAllowed("https://anything.example.test", "x", ["*"])).toBe(true);
  });
});
