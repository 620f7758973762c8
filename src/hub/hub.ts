/**
 * Hub
 * Single source of truth for who is connected and how to reach them.
 *
 * Delivery patterns:
 * - global   → every registered connection
 * - channel  → connections currently viewing a text channel
 * - user     → every connection of one user (multiple devices/tabs)
 * - room     → members of a voice room, optionally minus the sender
 *
 * Every method runs to completion on the event loop, so each one is its own
 * critical section. Delivery is a synchronous non-blocking enqueue; a queue
 * that refuses a frame marks its connection dead. Dead connections are
 * collected during iteration and evicted only after it ends.
 */
import type { Connection } from "../client/connection.js";
import type { Logger } from "../infrastructure/logger.js";
import { metrics } from "../infrastructure/metrics.js";
import {
  encodeEvent,
  VOICE_EVENTS,
  type DeliveryResult,
  type DeliveryScope,
  type HubEvent,
} from "../events/types.js";
import { RoomRegistry } from "./roomRegistry.js";

const emptyResult = (): DeliveryResult => ({ targetCount: 0, delivered: 0, evicted: 0 });

export class Hub {
  readonly rooms: RoomRegistry<Connection>;

  private readonly connections = new Set<Connection>();
  /** userId → connections, so user-targeted delivery skips the full scan */
  private readonly userConnections = new Map<string, Set<Connection>>();
  private isAccepting = true;

  constructor(
    private readonly logger: Logger,
    rooms: RoomRegistry<Connection> = new RoomRegistry<Connection>(),
  ) {
    this.rooms = rooms;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  get userCount(): number {
    return this.userConnections.size;
  }

  /** False once shutdown has started */
  get accepting(): boolean {
    return this.isAccepting;
  }

  has(connection: Connection): boolean {
    return this.connections.has(connection);
  }

  isOnline(userId: string): boolean {
    return this.userConnections.has(userId);
  }

  // ─── Registration ────────────────────────────────────────────────

  /**
   * Add a connection to the global set and start its writer.
   * Callers register each connection exactly once.
   */
  register(connection: Connection): void {
    this.connections.add(connection);

    let owned = this.userConnections.get(connection.userId);
    if (!owned) {
      owned = new Set();
      this.userConnections.set(connection.userId, owned);
    }
    owned.add(connection);

    connection.activate();
    metrics.connectionsActive.set(this.connections.size);

    this.logger.debug(
      { connectionId: connection.id, userId: connection.userId },
      "Connection registered",
    );
  }

  /**
   * Remove a connection, close its queue and leave every voice room it is in.
   *
   * Idempotent: the reader noticing a disconnect and the hub evicting a dead
   * peer may both get here. Only the first call finds the connection in the
   * set and in any room, so `voice.left` is emitted once per room.
   * Also safe for a connection that was never registered.
   */
  unregister(connection: Connection): void {
    if (this.connections.delete(connection)) {
      this.unindexUser(connection);
      metrics.connectionsActive.set(this.connections.size);
      this.logger.debug(
        { connectionId: connection.id, userId: connection.userId },
        "Connection unregistered",
      );
    }
    connection.close();

    const affected = this.rooms.leaveAll(connection);
    for (const channelId of affected) {
      const left: HubEvent = {
        type: VOICE_EVENTS.LEFT,
        data: { channel_id: channelId, user_id: connection.userId },
      };
      this.broadcastToRoom(channelId, left);
      this.broadcastGlobal(left);
    }
  }

  /**
   * Close every connection without emitting roster events. Used on shutdown.
   */
  closeAll(): void {
    this.isAccepting = false;

    for (const connection of [...this.connections]) {
      this.connections.delete(connection);
      this.unindexUser(connection);
      this.rooms.leaveAll(connection);
      connection.close();
    }
    metrics.connectionsActive.set(0);
  }

  /**
   * Set the text channel whose scoped events this connection receives.
   * One channel per connection; null clears it.
   */
  subscribe(connection: Connection, channelId: string | null): void {
    connection.setViewedChannel(channelId);
  }

  // ─── Delivery ────────────────────────────────────────────────────

  broadcastGlobal(event: HubEvent): DeliveryResult {
    return this.deliver(this.connections, event, "global");
  }

  broadcastToChannel(channelId: string, event: HubEvent): DeliveryResult {
    return this.deliver(this.viewersOf(channelId), event, "channel");
  }

  sendToUser(userId: string, event: HubEvent): DeliveryResult {
    const owned = this.userConnections.get(userId);
    if (!owned) return emptyResult();
    return this.deliver(owned, event, "user");
  }

  broadcastToRoom(
    channelId: string,
    event: HubEvent,
    exclude?: Connection,
  ): DeliveryResult {
    const members = this.rooms
      .membersOf(channelId)
      .filter((member) => member !== exclude);
    return this.deliver(members, event, "room");
  }

  /** Direct reply to one connection (e.g. voice.room_state) */
  sendToConnection(connection: Connection, event: HubEvent): DeliveryResult {
    return this.deliver([connection], event, "direct");
  }

  private *viewersOf(channelId: string): Generator<Connection> {
    for (const connection of this.connections) {
      if (connection.viewedChannel === channelId) yield connection;
    }
  }

  /**
   * Serialize once, enqueue to every target, then evict the refusals.
   */
  private deliver(
    targets: Iterable<Connection>,
    event: HubEvent,
    scope: DeliveryScope,
  ): DeliveryResult {
    let frame: string;
    try {
      frame = encodeEvent(event);
    } catch (err) {
      this.logger.error({ err, event: event.type, scope }, "Failed to encode event");
      return emptyResult();
    }

    let targetCount = 0;
    let delivered = 0;
    const dead: Connection[] = [];

    for (const connection of targets) {
      targetCount++;
      if (connection.enqueue(frame)) {
        delivered++;
      } else {
        dead.push(connection);
      }
    }

    if (delivered > 0) {
      metrics.framesDelivered.inc({ scope }, delivered);
    }

    // Second phase: the target iteration is over, mutation is safe now
    for (const connection of dead) {
      this.evict(connection, scope, event.type);
    }

    return { targetCount, delivered, evicted: dead.length };
  }

  private evict(connection: Connection, scope: DeliveryScope, eventType: string): void {
    // Already evicted by a delivery nested inside this one
    if (connection.state === "closed" && !this.connections.has(connection)) {
      this.unregister(connection);
      return;
    }

    this.logger.info(
      {
        connectionId: connection.id,
        userId: connection.userId,
        pendingFrames: connection.pendingFrames,
        scope,
        event: eventType,
      },
      "Evicting connection that stopped draining",
    );
    metrics.evictions.inc({ scope });
    connection.abort();
    this.unregister(connection);
  }

  private unindexUser(connection: Connection): void {
    const owned = this.userConnections.get(connection.userId);
    if (!owned) return;
    owned.delete(connection);
    if (owned.size === 0) this.userConnections.delete(connection.userId);
  }
}
