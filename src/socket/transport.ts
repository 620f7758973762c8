import type { ConnectionTransport } from "../client/connection.js";
import { FRAME_EVENT, type HubSocket } from "./types.js";

/**
 * Connection transport backed by a Socket.IO socket.
 * Heartbeats and reconnection belong to Socket.IO, not to the hub.
 *
 * engine.io buffers a frame it cannot hand to the underlying transport yet and
 * emits `drain` once that buffer is flushed. A write stays pending until then,
 * so a peer that stops reading backs up into the connection's bounded queue
 * instead of into engine.io.
 */
export class SocketIoTransport implements ConnectionTransport {
  constructor(private readonly socket: HubSocket) {}

  get id(): string {
    return this.socket.id;
  }

  write(frame: string): void | Promise<void> {
    if (this.socket.disconnected) {
      throw new Error(`Socket ${this.socket.id} is disconnected`);
    }

    const conn = this.socket.conn;
    let flushed = false;
    const onFlushed = () => {
      flushed = true;
    };

    conn.on("drain", onFlushed);
    this.socket.emit(FRAME_EVENT, frame);
    conn.off("drain", onFlushed);

    if (flushed) return;

    return new Promise<void>((resolve, reject) => {
      const settle = () => {
        conn.off("drain", onDrain);
        conn.off("close", onClose);
      };
      const onDrain = () => {
        settle();
        resolve();
      };
      const onClose = (reason: string) => {
        settle();
        reject(new Error(`Socket ${this.socket.id} closed with frames pending: ${reason}`));
      };
      conn.on("drain", onDrain);
      conn.on("close", onClose);
    });
  }

  close(): void {
    if (this.socket.connected) {
      this.socket.disconnect(true);
    }
  }
}
