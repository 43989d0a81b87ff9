// In-memory rooms and session for tests

import type { ChatSession, RoomHandle } from '../services/rooms';
import type { EventId, Membership, RoomAlias, RoomId, RoomMessageContent, UserId } from '../types';
import type { AppContext, Settings } from '../context';
import { RoomConfigStore } from '../services/room-config';
import { EXAMPLE_ROOM_ID } from '../context';

export interface FakeRoomOptions {
  membership?: Membership;
  alias?: RoomAlias;
  altAliases?: RoomAlias[];
  members?: number;
  tags?: string[];
}

export class FakeRoom implements RoomHandle {
  readonly tagSet: Set<string>;
  readonly sent: RoomMessageContent[] = [];
  currentMembership?: Membership;
  alias?: RoomAlias;
  alternates: RoomAlias[];
  members: number;

  // Failure injection
  failTagReads = false;
  failTagWrites = false;
  failSends = false;
  failMemberCount = false;

  constructor(readonly roomId: RoomId, options: FakeRoomOptions = {}) {
    this.currentMembership = options.membership ?? 'join';
    this.alias = options.alias;
    this.alternates = options.altAliases ?? [];
    this.members = options.members ?? 2;
    this.tagSet = new Set(options.tags ?? []);
  }

  membership(): Membership | undefined {
    return this.currentMembership;
  }

  canonicalAlias(): RoomAlias | undefined {
    return this.alias;
  }

  altAliases(): RoomAlias[] {
    return [...this.alternates];
  }

  async activeMemberCount(): Promise<number> {
    if (this.failMemberCount) throw new Error('member count unavailable');
    return this.members;
  }

  async tags(): Promise<string[]> {
    if (this.failTagReads) throw new Error('tag read failed');
    return [...this.tagSet];
  }

  async setTag(tag: string): Promise<void> {
    if (this.failTagWrites) throw new Error('tag write failed');
    this.tagSet.add(tag);
  }

  async removeTag(tag: string): Promise<void> {
    if (this.failTagWrites) throw new Error('tag write failed');
    this.tagSet.delete(tag);
  }

  async send(content: RoomMessageContent): Promise<EventId> {
    if (this.failSends) throw new Error('send failed');
    this.sent.push(content);
    return `$event${this.sent.length}`;
  }

  // Bodies of everything sent so far
  bodies(): string[] {
    return this.sent.map((content) => content.body);
  }
}

export class FakeSession implements ChatSession {
  readonly rooms = new Map<RoomId, FakeRoom>();

  constructor(readonly userId: UserId = '@pokem:example.org') {}

  addRoom(roomId: RoomId, options: FakeRoomOptions = {}): FakeRoom {
    const room = new FakeRoom(roomId, options);
    this.rooms.set(roomId, room);
    return room;
  }

  getRoom(roomId: RoomId): RoomHandle | undefined {
    return this.rooms.get(roomId);
  }

  joinedRooms(): RoomHandle[] {
    return [...this.rooms.values()].filter((room) => room.membership() === 'join');
  }
}

export interface TestContextOptions {
  nicknames?: Record<string, string>;
  settings?: Partial<Settings>;
}

/**
 * Context over a FakeSession. Sleeps are recorded instead of waited.
 */
export function createTestContext(
  session: FakeSession,
  options: TestContextOptions = {}
): { ctx: AppContext; sleeps: number[] } {
  const sleeps: number[] = [];
  const ctx: AppContext = {
    session,
    rooms: new RoomConfigStore(),
    nicknames: new Map(Object.entries(options.nicknames ?? {})),
    settings: {
      commandPrefix: '!pokem',
      exampleRoomId: EXAMPLE_ROOM_ID,
      ...options.settings,
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  };
  return { ctx, sleeps };
}
