// Room and session seams
//
// The core only ever talks to rooms through these interfaces. The live implementation
// is in session.ts; tests use the in-memory one in ../testing/fake-session.ts.

import type { Membership, RoomAlias, RoomId, RoomMessageContent, UserId, EventId } from '../types';

// Per-room tag storage (m.tag account data)
export interface TaggedRoom {
  readonly roomId: RoomId;
  tags(): Promise<string[]>;
  setTag(tag: string): Promise<void>;
  removeTag(tag: string): Promise<void>;
}

export interface RoomHandle extends TaggedRoom {
  // Live: re-read on every call, the sync loop updates it underneath
  membership(): Membership | undefined;
  canonicalAlias(): RoomAlias | undefined;
  altAliases(): RoomAlias[];
  // Joined plus invited members, from the sync summary or else the member lists
  activeMemberCount(): Promise<number>;
  send(content: RoomMessageContent): Promise<EventId>;
}

export interface ChatSession {
  readonly userId: UserId;
  getRoom(roomId: RoomId): RoomHandle | undefined;
  joinedRooms(): RoomHandle[];
}
