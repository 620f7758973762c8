import { EventEmitter } from "node:events";
import { vi } from "vitest";
import type { AuthSocketData } from "@src/auth/types.js";
import type { HubSocket } from "@src/socket/types.js";

type Listener = (...args: unknown[]) => void;

/**
 * Stand-in for the engine.io connection under a socket. While the peer reads,
 * every write is flushed at once and `drain` fires; once it stops, frames stay
 * in `writeBuffer` until `resume()`.
 */
export class FakeEngineConnection extends EventEmitter {
  readonly writeBuffer: string[] = [];
  readonly flushed: string[] = [];
  private reading = true;

  write(frame: string): void {
    this.writeBuffer.push(frame);
    if (this.reading) this.flush();
  }

  stopReading(): void {
    this.reading = false;
  }

  resume(): void {
    this.reading = true;
    this.flush();
  }

  private flush(): void {
    if (this.writeBuffer.length === 0) return;
    this.flushed.push(...this.writeBuffer.splice(0));
    this.emit("drain");
  }
}

/**
 * Just enough of a Socket.IO socket: inbound frames are fed with `receive`,
 * outbound emits go through `conn`.
 */
export class FakeSocket {
  readonly data: AuthSocketData;
  readonly conn = new FakeEngineConnection();
  connected = true;
  private readonly listeners = new Map<string, Listener[]>();

  constructor(
    readonly id: string,
    userId: string,
  ) {
    this.data = { user: { user_id: userId, username: `${userId}-name`, is_owner: false } };
  }

  get disconnected(): boolean {
    return !this.connected;
  }

  /** Frames the peer has actually been handed */
  get sent(): string[] {
    return this.conn.flushed;
  }

  on(event: string, listener: Listener): this {
    this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
    return this;
  }

  emit(_event: string, frame: string): boolean {
    this.conn.write(frame);
    return true;
  }

  disconnect = vi.fn((_close?: boolean) => {
    if (!this.connected) return this;
    this.connected = false;
    this.conn.emit("close", "forced close");
    this.fire("disconnect", "server namespace disconnect");
    return this;
  });

  receive(raw: unknown): void {
    this.fire("frame", raw);
  }

  /** Client went away on its own */
  drop(): void {
    this.connected = false;
    this.conn.emit("close", "transport close");
    this.fire("disconnect", "transport close");
  }

  private fire(event: string, ...args: unknown[]): void {
    for (const listener of this.listeners.get(event) ?? []) listener(...args);
  }

  asSocket(): HubSocket {
    return this as unknown as HubSocket;
  }
}
