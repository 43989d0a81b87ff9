// Matrix chat session
//
// Logs in, keeps a picture of every room the bot is in from /sync, accepts invites from
// allowed users and hands prefixed messages to the command handler. No encryption.

import type { Sleep } from '../context';
import type {
  EventId,
  JoinedRoom,
  InvitedRoom,
  Membership,
  MatrixEvent,
  RoomAlias,
  RoomId,
  RoomMessageContent,
  SyncResponse,
  UserId,
} from '../types';
import type { ChatSession, RoomHandle } from './rooms';
import type { MatrixConfig } from './config';
import { MatrixClient } from './matrix-client';
import { SessionStore } from './session-store';
import { ErrorCodes } from '../types';
import { MatrixApiError, describeError } from '../utils/errors';

export interface SessionHandlers {
  onCommand?(sender: UserId, body: string, room: RoomHandle): Promise<void>;
  // After an invite has been accepted
  onJoin?(room: RoomHandle): Promise<void>;
}

export interface SessionOptions {
  allowList?: string;
  commandPrefix: string;
  roomSizeLimit?: number;
  store?: SessionStore;
  homeserverUrl: string;
  deviceId?: string;
  sleep: Sleep;
}

const SYNC_RETRY_INITIAL_MS = 1_000;
const SYNC_RETRY_MAX_MS = 60_000;

const MEMBERSHIPS: readonly Membership[] = ['join', 'invite', 'leave', 'ban', 'knock'];

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isMembership(value: unknown): value is Membership {
  return MEMBERSHIPS.some((membership) => membership === value);
}

/**
 * One room as seen through sync
 */
export class SessionRoom implements RoomHandle {
  private currentMembership?: Membership;
  private alias?: RoomAlias;
  private alternates: RoomAlias[] = [];
  private joinedCount?: number;
  private invitedCount?: number;

  constructor(
    private readonly client: MatrixClient,
    private readonly userId: UserId,
    readonly roomId: RoomId
  ) {}

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
    if (this.joinedCount !== undefined) {
      return this.joinedCount + (this.invitedCount ?? 0);
    }
    const [joined, invited] = await Promise.all([
      this.client.getJoinedMembers(this.roomId),
      this.client.getMembers(this.roomId, 'invite'),
    ]);
    return Object.keys(joined.joined).length + invited.chunk.length;
  }

  tags(): Promise<string[]> {
    return this.client.getRoomTags(this.userId, this.roomId);
  }

  setTag(tag: string): Promise<void> {
    return this.client.setRoomTag(this.userId, this.roomId, tag);
  }

  removeTag(tag: string): Promise<void> {
    return this.client.removeRoomTag(this.userId, this.roomId, tag);
  }

  send(content: RoomMessageContent): Promise<EventId> {
    return this.client.sendMessage(this.roomId, content);
  }

  setMembership(membership: Membership): void {
    this.currentMembership = membership;
  }

  applyStateEvent(event: { type: string; state_key?: string; content: Record<string, unknown> }): void {
    if (event.type === 'm.room.canonical_alias' && event.state_key === '') {
      this.alias = isString(event.content.alias) ? event.content.alias : undefined;
      const alternates = event.content.alt_aliases;
      this.alternates = Array.isArray(alternates) ? alternates.filter(isString) : [];
    } else if (event.type === 'm.room.member' && event.state_key === this.userId) {
      const membership = event.content.membership;
      if (isMembership(membership)) {
        this.currentMembership = membership;
      }
    }
  }

  applySummary(summary: JoinedRoom['summary']): void {
    if (!summary) return;
    if (summary['m.joined_member_count'] !== undefined) {
      this.joinedCount = summary['m.joined_member_count'];
    }
    if (summary['m.invited_member_count'] !== undefined) {
      this.invitedCount = summary['m.invited_member_count'];
    }
  }
}

export class MatrixSession implements ChatSession {
  private readonly rooms = new Map<RoomId, SessionRoom>();
  private readonly allowList?: RegExp;
  private since?: string;
  private stopped = false;
  private handlers: SessionHandlers = {};

  constructor(
    readonly client: MatrixClient,
    readonly userId: UserId,
    private readonly options: SessionOptions
  ) {
    this.allowList = options.allowList ? new RegExp(options.allowList) : undefined;
  }

  /**
   * Log in (or reuse a stored token) and run the first sync.
   */
  static async connect(config: MatrixConfig, options: Omit<SessionOptions, 'homeserverUrl'>): Promise<MatrixSession> {
    const stored = options.store ? await options.store.load() : null;
    const sameServer = stored?.homeserver_url === config.homeserver_url;

    let client: MatrixClient;
    let userId: UserId;
    let deviceId: string | undefined;
    let since: string | undefined;

    if (stored && sameServer) {
      client = new MatrixClient(config.homeserver_url, stored.access_token);
      userId = stored.user_id;
      deviceId = stored.device_id;
      since = stored.next_batch;
      console.log('[Session] Restored session', { userId, deviceId });
    } else if (config.access_token) {
      client = new MatrixClient(config.homeserver_url, config.access_token);
      const whoami = await client.whoami();
      userId = whoami.user_id;
      deviceId = whoami.device_id;
    } else if (config.password) {
      client = new MatrixClient(config.homeserver_url);
      const login = await client.login(config.username, config.password);
      userId = login.user_id;
      deviceId = login.device_id;
      console.log('[Session] Logged in', { userId, deviceId });
    } else {
      throw new Error('No password or access token configured for the Matrix account');
    }

    const session = new MatrixSession(client, userId, {
      ...options,
      homeserverUrl: config.homeserver_url,
      deviceId,
    });
    session.since = since;
    await session.initialSync();
    return session;
  }

  getRoom(roomId: RoomId): RoomHandle | undefined {
    return this.rooms.get(roomId);
  }

  joinedRooms(): RoomHandle[] {
    return [...this.rooms.values()].filter((room) => room.membership() === 'join');
  }

  isAllowed(sender: UserId): boolean {
    return this.allowList ? this.allowList.test(sender) : true;
  }

  setHandlers(handlers: SessionHandlers): void {
    this.handlers = handlers;
  }

  stop(): void {
    this.stopped = true;
  }

  /**
   * Sync without dispatching anything, so old commands are not replayed on start.
   */
  async initialSync(): Promise<void> {
    const response = await this.client.sync(this.since, { timeout: 0, fullState: true });
    this.applySync(response, false);
    await this.advance(response.next_batch);
    console.log('[Session] Ready', { userId: this.userId, rooms: this.rooms.size });
  }

  /**
   * Sync until stop(). Transient failures are retried with backoff; a revoked token
   * is thrown so a supervisor can restart the process.
   */
  async run(): Promise<void> {
    let retryDelay = SYNC_RETRY_INITIAL_MS;
    while (!this.stopped) {
      try {
        const response = await this.client.sync(this.since);
        this.applySync(response, true);
        await this.advance(response.next_batch);
        retryDelay = SYNC_RETRY_INITIAL_MS;
      } catch (error) {
        if (error instanceof MatrixApiError && error.errcode === ErrorCodes.M_UNKNOWN_TOKEN) {
          await this.options.store?.clear();
          throw error;
        }
        // Rate limited: the server says how long to wait
        const wait =
          error instanceof MatrixApiError && error.retryAfterMs !== undefined
            ? Math.max(retryDelay, error.retryAfterMs)
            : retryDelay;
        console.error('[Session] Sync failed, retrying', { wait, cause: describeError(error) });
        await this.options.sleep(wait);
        retryDelay = Math.min(retryDelay * 2, SYNC_RETRY_MAX_MS);
      }
    }
  }

  /**
   * Fold one sync response into the room picture. A room that fails to apply is logged
   * and skipped so the sync position still advances.
   */
  applySync(response: SyncResponse, dispatch: boolean): void {
    for (const [roomId, joined] of Object.entries(response.rooms?.join ?? {})) {
      this.applyRoom(roomId, () => this.applyJoinedRoom(roomId, joined, dispatch));
    }
    for (const [roomId, invited] of Object.entries(response.rooms?.invite ?? {})) {
      this.applyRoom(roomId, () => this.applyInvitedRoom(roomId, invited));
    }
    for (const roomId of Object.keys(response.rooms?.leave ?? {})) {
      this.applyRoom(roomId, () => this.room(roomId).setMembership('leave'));
    }
  }

  private applyRoom(roomId: RoomId, apply: () => void): void {
    try {
      apply();
    } catch (error) {
      console.error('[Session] Failed to apply sync for room', { roomId, cause: describeError(error) });
    }
  }

  private room(roomId: RoomId): SessionRoom {
    let room = this.rooms.get(roomId);
    if (!room) {
      room = new SessionRoom(this.client, this.userId, roomId);
      this.rooms.set(roomId, room);
    }
    return room;
  }

  private applyJoinedRoom(roomId: RoomId, joined: JoinedRoom, dispatch: boolean): void {
    const room = this.room(roomId);
    room.setMembership('join');
    room.applySummary(joined.summary);
    for (const event of joined.state?.events ?? []) {
      room.applyStateEvent(event);
    }
    for (const event of joined.timeline?.events ?? []) {
      if (event.state_key !== undefined) {
        room.applyStateEvent(event);
      } else if (dispatch && event.type === 'm.room.message') {
        this.dispatchMessage(room, event);
      }
    }
  }

  private applyInvitedRoom(roomId: RoomId, invited: InvitedRoom): void {
    const room = this.room(roomId);
    if (room.membership() === 'invite') {
      return;
    }
    room.setMembership('invite');
    const ownInvite = invited.invite_state?.events?.find(
      (event) => event.type === 'm.room.member' && event.state_key === this.userId
    );
    const inviter = ownInvite?.sender;
    if (!inviter || !this.isAllowed(inviter)) {
      console.warn('[Session] Ignoring invite', { roomId, inviter });
      return;
    }
    this.acceptInvite(room, inviter).catch((error: unknown) => {
      console.error('[Session] Join handler failed', { roomId, cause: describeError(error) });
    });
  }

  private async acceptInvite(room: SessionRoom, inviter: UserId): Promise<void> {
    try {
      await this.client.joinRoom(room.roomId);
    } catch (error) {
      console.error('[Session] Failed to join room', { roomId: room.roomId, inviter, cause: describeError(error) });
      return;
    }
    room.setMembership('join');
    console.log('[Session] Joined room', { roomId: room.roomId, inviter });
    await this.handlers.onJoin?.(room);
  }

  private dispatchMessage(room: SessionRoom, event: MatrixEvent): void {
    const body = event.content.body;
    if (!isString(body) || !body.startsWith(this.options.commandPrefix)) return;
    if (event.sender === this.userId || !this.isAllowed(event.sender)) return;

    const onCommand = this.handlers.onCommand;
    if (!onCommand) return;

    this.runCommand(room, event.sender, body, onCommand).catch((error: unknown) => {
      console.error('[Session] Command failed', { roomId: room.roomId, cause: describeError(error) });
    });
  }

  private async runCommand(
    room: SessionRoom,
    sender: UserId,
    body: string,
    onCommand: NonNullable<SessionHandlers['onCommand']>
  ): Promise<void> {
    const limit = this.options.roomSizeLimit;
    if (limit !== undefined && (await room.activeMemberCount()) > limit) {
      console.warn('[Session] Ignoring command in room over size limit', { roomId: room.roomId, limit });
      return;
    }
    await onCommand(sender, body, room);
  }

  private async advance(nextBatch: string): Promise<void> {
    this.since = nextBatch;
    const token = this.client.token;
    if (!this.options.store || !token) return;
    try {
      await this.options.store.save({
        homeserver_url: this.options.homeserverUrl,
        user_id: this.userId,
        access_token: token,
        device_id: this.options.deviceId,
        next_batch: nextBatch,
      });
    } catch (error) {
      console.error('[Session] Failed to persist session', { cause: describeError(error) });
    }
  }
}
