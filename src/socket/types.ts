import type { Server, Socket } from "socket.io";
import type { AuthSocketData } from "../auth/types.js";

/**
 * Every frame, both directions, rides the single `frame` event as JSON text
 * `{"type": ..., "data": ...}`. Inbound frames may also arrive pre-parsed.
 */
export const FRAME_EVENT = "frame";

export interface ServerToClientEvents {
  frame: (frame: string) => void;
}

export interface ClientToServerEvents {
  frame: (frame: unknown) => void;
}

export type InterServerEvents = Record<string, never>;

export type HubServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  AuthSocketData
>;

export type HubSocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  AuthSocketData
>;
