// Matrix ID utilities

import { randomUUID } from 'node:crypto';
import type { RoomId, RoomAlias } from '../types';

// Parse a room ID
export function parseRoomId(roomId: RoomId): { opaque: string; serverName: string } | null {
  const match = roomId.match(/^!([^:]+):(.+)$/);
  if (!match) return null;
  if (!isValidServerName(match[2])) return null;
  return { opaque: match[1], serverName: match[2] };
}

// Something like @someone:example.org. Names of this shape never resolve to a room,
// even though #@someone:example.org is a legal alias.
export function looksLikeUserId(name: string): boolean {
  return /^@.*:.*\..*/.test(name);
}

// Alias with a domain-like server part, e.g. #ops:example.org
export function looksLikeRoomAlias(name: string): boolean {
  return /^#.*:.*\..*/.test(name);
}

// Anything with a server part, used by the CLI to tell a room from the first word of a message
export function looksLikeRoomAddress(name: string): boolean {
  return /^.*:.*\..*/.test(name);
}

// The '#' is awkward to put in a URL, so it is optional
export function toAliasShape(name: string): RoomAlias {
  return name.startsWith('#') ? name : `#${name}`;
}

// Validate server name
export function isValidServerName(serverName: string): boolean {
  // Can be domain or domain:port or IPv4 or [IPv6]:port
  if (!serverName || serverName.length > 255) return false;

  const domainWithPort = /^([a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?\.)*[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(:\d+)?$/;
  const ipv4WithPort = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}(:\d+)?$/;
  const ipv6WithPort = /^\[[\da-fA-F:]+\](:\d+)?$/;

  return domainWithPort.test(serverName) || ipv4WithPort.test(serverName) || ipv6WithPort.test(serverName);
}

// Generate a transaction ID for idempotent sends
export function generateTransactionId(): string {
  const timestamp = Date.now().toString(36);
  const random = randomUUID().split('-')[0];
  return `${timestamp}_${random}`;
}
