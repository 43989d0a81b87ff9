// Matrix Protocol Types
// Client-side subset of https://spec.matrix.org/v1.12/client-server-api/

// User ID format: @localpart:domain
export type UserId = string;

// Room ID format: !opaque_id:domain
export type RoomId = string;

// Event ID format: $base64:domain
export type EventId = string;

// Room alias format: #alias:domain
export type RoomAlias = string;


// Membership states
export type Membership = 'join' | 'invite' | 'leave' | 'ban' | 'knock';

// Base event structure
export interface MatrixEvent {
  event_id: EventId;
  room_id?: RoomId;
  sender: UserId;
  type: string;
  state_key?: string;
  content: Record<string, unknown>;
  origin_server_ts: number;
}

// Intentional mentions (MSC3952)
export interface Mentions {
  user_ids?: UserId[];
  room?: boolean;
}

// Message event types
export interface RoomMessageContent {
  msgtype: string;
  body: string;
  format?: string;
  formatted_body?: string;
  'm.mentions'?: Mentions;
}

// Text message
export interface TextMessageContent extends RoomMessageContent {
  msgtype: 'm.text';
}

// Sync response types
export interface SyncResponse {
  next_batch: string;
  rooms?: {
    join?: Record<RoomId, JoinedRoom>;
    invite?: Record<RoomId, InvitedRoom>;
    leave?: Record<RoomId, LeftRoom>;
  };
}

export interface JoinedRoom {
  summary?: RoomSummary;
  state?: {
    events: MatrixEvent[];
  };
  timeline?: {
    events: MatrixEvent[];
    limited?: boolean;
    prev_batch?: string;
  };
}

export interface InvitedRoom {
  invite_state?: {
    events?: StrippedStateEvent[];
  };
}

export interface LeftRoom {
  state?: {
    events: MatrixEvent[];
  };
}

export interface RoomSummary {
  'm.heroes'?: UserId[];
  'm.joined_member_count'?: number;
  'm.invited_member_count'?: number;
}

export interface StrippedStateEvent {
  content: Record<string, unknown>;
  state_key: string;
  type: string;
  sender: UserId;
}

// Room tags (https://spec.matrix.org/v1.12/client-server-api/#room-tagging)
export interface TagInfo {
  order?: number;
}

export interface RoomTagsResponse {
  tags: Record<string, TagInfo>;
}

export interface LoginResponse {
  user_id: UserId;
  access_token: string;
  device_id: string;
}

export interface WhoAmIResponse {
  user_id: UserId;
  device_id?: string;
}

export interface RoomMembersResponse {
  chunk: MatrixEvent[];
}

export interface JoinedMembersResponse {
  joined: Record<UserId, { display_name?: string; avatar_url?: string }>;
}

// Error types
export interface MatrixError {
  errcode: string;
  error: string;
  retry_after_ms?: number;
}

// Common error codes
export const ErrorCodes = {
  M_UNKNOWN_TOKEN: 'M_UNKNOWN_TOKEN',
  M_MISSING_TOKEN: 'M_MISSING_TOKEN',
  M_UNKNOWN: 'M_UNKNOWN',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
