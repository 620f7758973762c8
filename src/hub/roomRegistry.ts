/**
 * Voice/video room membership.
 *
 * Membership is tracked per connection (a user may have several tabs open),
 * while co-membership is answered per user, since WebRTC negotiation is
 * user-to-user. Rooms are in-memory only and start empty on every boot.
 */

export interface RoomMember {
  readonly userId: string;
}

export type RoomSnapshot = Record<string, string[]>;

export class RoomRegistry<TMember extends RoomMember = RoomMember> {
  private readonly rooms = new Map<string, Set<TMember>>();

  /** Number of rooms with at least one member */
  get size(): number {
    return this.rooms.size;
  }

  /**
   * Add a member to a room.
   * @returns user ids already present, excluding the joiner's own connection, deduplicated
   */
  join(channelId: string, member: TMember): string[] {
    let room = this.rooms.get(channelId);
    if (!room) {
      room = new Set();
      this.rooms.set(channelId, room);
    }

    const existing = new Set<string>();
    for (const other of room) {
      if (other !== member) existing.add(other.userId);
    }
    room.add(member);

    return [...existing];
  }

  /**
   * Remove a member from one room.
   * @returns whether the member was actually present
   */
  leave(channelId: string, member: TMember): boolean {
    const room = this.rooms.get(channelId);
    if (!room?.delete(member)) return false;

    if (room.size === 0) this.rooms.delete(channelId);
    return true;
  }

  /**
   * Remove a member from every room it is in (normally one).
   * @returns the affected channel ids
   */
  leaveAll(member: TMember): string[] {
    const affected: string[] = [];

    for (const [channelId, room] of this.rooms) {
      if (room.delete(member)) {
        affected.push(channelId);
        if (room.size === 0) this.rooms.delete(channelId);
      }
    }

    return affected;
  }

  /**
   * True iff both users have at least one connection in the room.
   */
  areCoMembers(channelId: string, userA: string, userB: string): boolean {
    const room = this.rooms.get(channelId);
    if (!room) return false;

    let foundA = false;
    let foundB = false;
    for (const member of room) {
      if (member.userId === userA) foundA = true;
      if (member.userId === userB) foundB = true;
      if (foundA && foundB) return true;
    }
    return false;
  }

  /** Members of one room, for room-scoped delivery */
  membersOf(channelId: string): TMember[] {
    const room = this.rooms.get(channelId);
    return room ? [...room] : [];
  }

  /** Channel ids whose room contains this member */
  roomsOf(member: TMember): string[] {
    const result: string[] = [];
    for (const [channelId, room] of this.rooms) {
      if (room.has(member)) result.push(channelId);
    }
    return result;
  }

  /**
   * Point-in-time copy of every room and its user ids.
   * Never contains an empty list.
   */
  snapshot(): RoomSnapshot {
    return Object.fromEntries(
      [...this.rooms].map(([channelId, room]) => [
        channelId,
        [...new Set([...room].map((m) => m.userId))],
      ]),
    );
  }
}
