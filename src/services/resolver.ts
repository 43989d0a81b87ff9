// Room Resolver
//
// Maps what a caller typed to a room the session knows:
//   !opaque:server       looked up directly
//   @user:server         refused, user targets are not supported
//   #alias:server, alias:server
//                        matched against the canonical and alternate aliases of every
//                        joined room. Rebuilt on every lookup; join sets are small.

import type { ChatSession, RoomHandle } from './rooms';
import { looksLikeRoomAlias, looksLikeUserId, parseRoomId, toAliasShape } from '../utils/ids';

export interface TopicTarget {
  target: string;
  // Set when an urgent poke has no escalation room and should ping everyone instead
  mentionRoom: boolean;
}

export function urgentNickname(topic: string): string {
  return `${topic}-urgent`;
}

/**
 * Apply the nickname table to a topic. Urgent pokes go to `<topic>-urgent` when it is
 * configured; otherwise they fall back to the plain topic with a room-wide mention.
 */
export function resolveTopic(nicknames: ReadonlyMap<string, string>, topic: string, urgent: boolean): TopicTarget {
  if (urgent) {
    const escalation = nicknames.get(urgentNickname(topic));
    if (escalation !== undefined) {
      return { target: escalation, mentionRoom: false };
    }
  }
  return {
    target: nicknames.get(topic) ?? topic,
    mentionRoom: urgent,
  };
}

export function resolveRoom(session: ChatSession, name: string): RoomHandle | undefined {
  if (!name) {
    return undefined;
  }

  if (parseRoomId(name)) {
    return session.getRoom(name);
  }

  if (looksLikeUserId(name)) {
    return undefined;
  }

  const alias = toAliasShape(name);
  if (!looksLikeRoomAlias(alias)) {
    console.warn('[Resolver] Not a room ID or alias', { name });
    return undefined;
  }

  for (const room of session.joinedRooms()) {
    if (room.canonicalAlias() === alias || room.altAliases().includes(alias)) {
      return room;
    }
  }
  return undefined;
}
