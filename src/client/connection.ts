import type { Logger } from "../infrastructure/logger.js";
import { OutboundQueue } from "./outboundQueue.js";

export type ConnectionState = "connecting" | "active" | "closing" | "closed";

/**
 * The wire under a connection. Socket.IO in production, fakes in tests.
 */
export interface ConnectionTransport {
  readonly id: string;
  /** Write one serialized frame. May resolve later if the transport is busy. */
  write(frame: string): void | Promise<void>;
  /** Release the transport. Must tolerate repeat calls. */
  close(): void;
}

export interface ConnectionOptions {
  userId: string;
  username?: string;
  transport: ConnectionTransport;
  sendQueueSize: number;
  logger: Logger;
}

/**
 * One authenticated client.
 *
 * The connection owns its outbound queue and the writer pump that drains it.
 * Registration and the global set belong to the Hub.
 */
export class Connection {
  readonly id: string;
  readonly userId: string;
  readonly username: string;

  private readonly transport: ConnectionTransport;
  private readonly queue: OutboundQueue<string>;
  private readonly logger: Logger;

  private currentState: ConnectionState = "connecting";
  private viewed: string | null = null;
  private pump: Promise<void> | null = null;

  constructor(options: ConnectionOptions) {
    this.id = options.transport.id;
    this.userId = options.userId;
    this.username = options.username ?? options.userId;
    this.transport = options.transport;
    this.queue = new OutboundQueue<string>(options.sendQueueSize);
    this.logger = options.logger;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Channel the client is looking at, or null before the first subscribe */
  get viewedChannel(): string | null {
    return this.viewed;
  }

  setViewedChannel(channelId: string | null): void {
    this.viewed = channelId;
  }

  get pendingFrames(): number {
    return this.queue.size;
  }

  /**
   * Non-blocking enqueue of an already-serialized frame.
   * @returns false when the queue is full or closed; the caller treats that as a dead peer
   */
  enqueue(frame: string): boolean {
    return this.queue.offer(frame);
  }

  /**
   * connecting → active. Starts the writer pump.
   */
  activate(): void {
    if (this.currentState !== "connecting") return;
    this.currentState = "active";
    this.pump = this.runWriter();
  }

  /**
   * Move to closing and close the outbound queue.
   * The writer drains what is already queued, then releases the transport.
   *
   * @returns true only for the call that actually closed the queue
   */
  close(): boolean {
    if (this.currentState === "connecting" || this.currentState === "active") {
      this.currentState = "closing";
    }

    const closedNow = this.queue.close();

    // Never activated: no writer will release the transport for us
    if (closedNow && !this.pump) {
      this.release();
    }
    return closedNow;
  }

  /**
   * Drop pending frames and release the transport immediately.
   * Used for peers that stopped draining, whose writer may be stuck mid-write.
   */
  abort(): void {
    if (this.currentState === "connecting" || this.currentState === "active") {
      this.currentState = "closing";
    }
    this.queue.close();
    this.queue.clear();
    this.release();
  }

  /**
   * Resolves once the writer pump has finished. Immediate if it never ran.
   */
  whenClosed(): Promise<void> {
    return this.pump ?? Promise.resolve();
  }

  private async runWriter(): Promise<void> {
    try {
      for (;;) {
        const frame = await this.queue.next();
        if (frame === undefined) break;
        await this.transport.write(frame);
      }
    } catch (err) {
      this.logger.debug(
        { err, connectionId: this.id, userId: this.userId },
        "Transport write failed",
      );
    } finally {
      this.queue.close();
      this.release();
    }
  }

  private release(): void {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.transport.close();
  }
}
