// Poke authentication
//
// A room with an auth token only accepts pokes that carry it, either in an
// `authentication` / `auth` header or as the first thing in the message.

import type { RoomConfig } from './room-config';

export const AUTH_HEADERS = ['authentication', 'auth'] as const;

export type AuthResult =
  | { ok: true; message: string }
  | { ok: false };

function headerToken(headers: Headers): string {
  for (const name of AUTH_HEADERS) {
    const value = headers.get(name);
    if (value !== null) {
      return value;
    }
  }
  return '';
}

/**
 * Check the poke against the room's token. On success returns the message to send:
 * unchanged when the token came in a header, with the token and the whitespace after
 * it removed when it prefixed the message.
 */
export function validateAuthentication(config: RoomConfig, headers: Headers, message: string): AuthResult {
  const token = config.auth;
  if (token === undefined) {
    return { ok: true, message };
  }

  if (headerToken(headers) === token) {
    return { ok: true, message };
  }

  if (!message.startsWith(token)) {
    return { ok: false };
  }

  return { ok: true, message: message.slice(token.length).trimStart() };
}
