// Matrix Client-Server HTTP Client
// Wrapper for fetch that adds the access token and turns error replies into MatrixApiError

import type {
  EventId,
  JoinedMembersResponse,
  Membership,
  LoginResponse,
  MatrixError,
  RoomId,
  RoomMembersResponse,
  RoomMessageContent,
  RoomTagsResponse,
  SyncResponse,
  UserId,
  WhoAmIResponse,
} from '../types';
import { ErrorCodes } from '../types';
import { MatrixApiError } from '../utils/errors';
import { generateTransactionId } from '../utils/ids';

/**
 * Request options
 */
export interface MatrixRequestOptions {
  method?: string;
  body?: Record<string, unknown>;
  query?: Record<string, string | number | undefined>;
  timeout?: number;
  // Login is the only call made without a token
  authenticated?: boolean;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const DEFAULT_TIMEOUT_MS = 30000; // 30 seconds
const SYNC_TIMEOUT_MS = 30000;
// The long poll itself plus time for the server to answer
const SYNC_REQUEST_TIMEOUT_MS = SYNC_TIMEOUT_MS + 15000;

const CLIENT_PREFIX = '/_matrix/client/v3';

function enc(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Matrix client for one account on one homeserver
 */
export class MatrixClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private accessToken: string | null;

  constructor(homeserverUrl: string, accessToken: string | null = null, fetchImpl: FetchLike = fetch) {
    this.baseUrl = homeserverUrl.replace(/\/+$/, '');
    this.accessToken = accessToken;
    this.fetchImpl = fetchImpl;
  }

  get token(): string | null {
    return this.accessToken;
  }

  /**
   * Password login. Keeps the returned token for later calls.
   */
  async login(username: string, password: string, deviceId?: string): Promise<LoginResponse> {
    const result = await this.request<LoginResponse>('/login', {
      method: 'POST',
      authenticated: false,
      body: {
        type: 'm.login.password',
        identifier: { type: 'm.id.user', user: username },
        password,
        device_id: deviceId,
        initial_device_display_name: 'Pokem',
      },
    });
    this.accessToken = result.access_token;
    return result;
  }

  async whoami(): Promise<WhoAmIResponse> {
    return this.request<WhoAmIResponse>('/account/whoami');
  }

  /**
   * Long-poll /sync. Without `since` this is an initial sync and returns at once.
   * `fullState` asks for complete room state even when resuming from a token.
   */
  async sync(since?: string, options: { timeout?: number; fullState?: boolean } = {}): Promise<SyncResponse> {
    const timeout = options.timeout ?? SYNC_TIMEOUT_MS;
    return this.request<SyncResponse>('/sync', {
      query: {
        since,
        timeout: since ? timeout : 0,
        full_state: options.fullState ? 'true' : undefined,
      },
      timeout: SYNC_REQUEST_TIMEOUT_MS,
    });
  }

  async joinRoom(roomIdOrAlias: string): Promise<RoomId> {
    const result = await this.request<{ room_id: RoomId }>(`/join/${enc(roomIdOrAlias)}`, {
      method: 'POST',
      body: {},
    });
    return result.room_id;
  }

  async sendMessage(roomId: RoomId, content: RoomMessageContent): Promise<EventId> {
    const txnId = generateTransactionId();
    const result = await this.request<{ event_id: EventId }>(
      `/rooms/${enc(roomId)}/send/m.room.message/${enc(txnId)}`,
      { method: 'PUT', body: { ...content } }
    );
    return result.event_id;
  }

  async getJoinedMembers(roomId: RoomId): Promise<JoinedMembersResponse> {
    return this.request<JoinedMembersResponse>(`/rooms/${enc(roomId)}/joined_members`);
  }

  async getMembers(roomId: RoomId, membership: Membership): Promise<RoomMembersResponse> {
    return this.request<RoomMembersResponse>(`/rooms/${enc(roomId)}/members`, { query: { membership } });
  }

  async getRoomTags(userId: UserId, roomId: RoomId): Promise<string[]> {
    const result = await this.request<RoomTagsResponse>(`/user/${enc(userId)}/rooms/${enc(roomId)}/tags`);
    return Object.keys(result.tags ?? {});
  }

  async setRoomTag(userId: UserId, roomId: RoomId, tag: string): Promise<void> {
    await this.request(`/user/${enc(userId)}/rooms/${enc(roomId)}/tags/${enc(tag)}`, {
      method: 'PUT',
      body: {},
    });
  }

  async removeRoomTag(userId: UserId, roomId: RoomId, tag: string): Promise<void> {
    await this.request(`/user/${enc(userId)}/rooms/${enc(roomId)}/tags/${enc(tag)}`, {
      method: 'DELETE',
    });
  }

  /**
   * Make a client-server API request
   * @throws MatrixApiError for an error reply, timeout or network failure
   */
  async request<T = unknown>(path: string, options: MatrixRequestOptions = {}): Promise<T> {
    const method = options.method || 'GET';
    const timeout = options.timeout || DEFAULT_TIMEOUT_MS;

    const url = new URL(`${this.baseUrl}${CLIENT_PREFIX}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }
    if (options.authenticated !== false) {
      if (!this.accessToken) {
        throw new MatrixApiError(ErrorCodes.M_MISSING_TOKEN, 'Not logged in', 401);
      }
      headers.Authorization = `Bearer ${this.accessToken}`;
    }

    // Create abort controller for timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new MatrixApiError(ErrorCodes.M_UNKNOWN, `Request timeout: ${method} ${path}`, 0);
      }
      throw new MatrixApiError(ErrorCodes.M_UNKNOWN, error instanceof Error ? error.message : 'Unknown error', 0);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      let errorData: Partial<MatrixError> | null = null;
      try {
        errorData = (await response.json()) as Partial<MatrixError>;
      } catch {
        // Not JSON, keep the status only
      }
      throw MatrixApiError.fromResponse(response.status, errorData);
    }

    return (await response.json()) as T;
  }
}
