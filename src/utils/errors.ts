// Error types
//
// MatrixApiError wraps an error reply from the homeserver.
// PokeError is everything that can go wrong while delivering a poke.

import { ErrorCodes, type ErrorCode, type MatrixError } from '../types';

export class MatrixApiError extends Error {
  public readonly errcode: ErrorCode | string;
  public readonly status: number;
  public readonly retryAfterMs?: number;

  constructor(errcode: ErrorCode | string, message: string, status: number = 400, retryAfterMs?: number) {
    super(message);
    this.name = 'MatrixApiError';
    this.errcode = errcode;
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }

  static fromResponse(status: number, body: Partial<MatrixError> | null): MatrixApiError {
    return new MatrixApiError(
      body?.errcode ?? ErrorCodes.M_UNKNOWN,
      body?.error ?? `HTTP ${status}`,
      status,
      body?.retry_after_ms
    );
  }
}

export const PokeErrorCodes = {
  MALFORMED_REQUEST: 'MALFORMED_REQUEST',
  ROOM_NOT_FOUND: 'ROOM_NOT_FOUND',
  JOIN_TIMEOUT: 'JOIN_TIMEOUT',
  AUTH_REJECTED: 'AUTH_REJECTED',
  // Logged only; a refused send ends the delivery as `suppressed`
  SEND_REJECTED_BY_POLICY: 'SEND_REJECTED_BY_POLICY',
  TAG_WRITE_FAILURE: 'TAG_WRITE_FAILURE',
  SEND_FAILED: 'SEND_FAILED',
} as const;

export type PokeErrorCode = typeof PokeErrorCodes[keyof typeof PokeErrorCodes];

export class PokeError extends Error {
  public readonly code: PokeErrorCode;
  public readonly roomId?: string;

  constructor(code: PokeErrorCode, message: string, roomId?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PokeError';
    this.code = code;
    this.roomId = roomId;
  }

  // Text that is safe to show in a chat room. Auth failures say nothing about the token.
  get publicMessage(): string {
    if (this.code === PokeErrorCodes.AUTH_REJECTED) {
      return 'Failed to send message.';
    }
    return `Failed to send message: ${this.message}`;
  }
}

// Common error factories
export const PokeErrors = {
  malformedRequest(message: string = 'Request body is not valid UTF-8'): PokeError {
    return new PokeError(PokeErrorCodes.MALFORMED_REQUEST, message);
  },

  roomNotFound(name: string): PokeError {
    return new PokeError(PokeErrorCodes.ROOM_NOT_FOUND, `Failed to find room with name: ${name}`);
  },

  joinTimeout(roomId: string): PokeError {
    return new PokeError(PokeErrorCodes.JOIN_TIMEOUT, 'Failed to join room', roomId);
  },

  authRejected(roomId: string): PokeError {
    return new PokeError(PokeErrorCodes.AUTH_REJECTED, 'Incorrect Authentication Token', roomId);
  },

  tagWriteFailure(roomId: string, tag: string, cause: unknown): PokeError {
    return new PokeError(PokeErrorCodes.TAG_WRITE_FAILURE, `Failed to update room tag ${tag}`, roomId, { cause });
  },

  sendFailed(roomId: string, cause: unknown): PokeError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new PokeError(PokeErrorCodes.SEND_FAILED, detail, roomId, { cause });
  },
};

export function isPokeError(error: unknown): error is PokeError {
  return error instanceof PokeError;
}

// Error description for logs
export function describeError(error: unknown): string {
  if (error instanceof PokeError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof MatrixApiError) {
    return `${error.errcode} (${error.status}): ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
