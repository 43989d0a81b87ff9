// Room Configuration Store
//
// Per-room settings are kept as room tags so they live on the homeserver with the room:
//   dev.pokem.block          block all pokes to the room
//   dev.pokem.auth.<token>   token required to poke the room
//   dev.pokem.pass.<token>   old name for the auth tag, rewritten on first read
//
// There is no locking. set() is several independent tag writes; if one of them is lost
// the leftovers are cleaned up by the next set(), or by the migration in get().

import type { TaggedRoom } from './rooms';
import { PokeErrors } from '../utils/errors';

export const TAG_NAMESPACE = 'dev.pokem';
export const BLOCK_TAG = `${TAG_NAMESPACE}.block`;
export const AUTH_TAG_PREFIX = `${TAG_NAMESPACE}.auth.`;
export const LEGACY_AUTH_TAG_PREFIX = `${TAG_NAMESPACE}.pass.`;

export interface RoomConfig {
  block: boolean;
  auth?: string;
}

interface ParsedTags {
  config: RoomConfig;
  hasLegacy: boolean;
}

export function defaultRoomConfig(): RoomConfig {
  return { block: false };
}

export function authTag(token: string): string {
  return `${AUTH_TAG_PREFIX}${token}`;
}

function parseTags(roomId: string, tags: string[]): ParsedTags {
  const config = defaultRoomConfig();
  let hasLegacy = false;

  for (const tag of tags) {
    if (tag === BLOCK_TAG) {
      config.block = true;
      continue;
    }

    let token: string | undefined;
    if (tag.startsWith(AUTH_TAG_PREFIX)) {
      token = tag.slice(AUTH_TAG_PREFIX.length);
    } else if (tag.startsWith(LEGACY_AUTH_TAG_PREFIX)) {
      hasLegacy = true;
      token = tag.slice(LEGACY_AUTH_TAG_PREFIX.length);
    } else {
      continue;
    }

    if (config.auth !== undefined) {
      // Usually a token change where the old tag could not be removed
      console.warn('[RoomConfig] Multiple auth tokens set for room', { roomId });
      continue;
    }
    config.auth = token;
  }

  return { config, hasLegacy };
}

async function readTags(room: TaggedRoom): Promise<string[]> {
  try {
    return await room.tags();
  } catch (error) {
    console.error('[RoomConfig] Failed to read room tags', { roomId: room.roomId, error });
    return [];
  }
}

export class RoomConfigStore {
  /**
   * Read the room's configuration. Never throws: unreadable tags give the defaults.
   * Reading a legacy auth tag rewrites it in the current shape.
   */
  async get(room: TaggedRoom): Promise<RoomConfig> {
    const { config, hasLegacy } = parseTags(room.roomId, await readTags(room));

    if (hasLegacy) {
      try {
        await this.set(room, config);
        console.log('[RoomConfig] Migrated legacy auth tag', { roomId: room.roomId });
      } catch (error) {
        // Retried on the next read
        console.error('[RoomConfig] Legacy auth tag migration failed', { roomId: room.roomId, error });
      }
    }

    return config;
  }

  /**
   * Write the configuration. Every tag in the auth namespaces that does not match the
   * desired token is removed, so repeating a set() repairs an earlier partial write.
   */
  async set(room: TaggedRoom, config: RoomConfig): Promise<void> {
    if (config.block) {
      await this.write(room, BLOCK_TAG, () => room.setTag(BLOCK_TAG));
    } else {
      await this.write(room, BLOCK_TAG, () => room.removeTag(BLOCK_TAG));
    }

    let placed = false;
    for (const tag of await readTags(room)) {
      if (tag.startsWith(LEGACY_AUTH_TAG_PREFIX)) {
        await this.write(room, tag, () => room.removeTag(tag));
      } else if (tag.startsWith(AUTH_TAG_PREFIX)) {
        if (config.auth !== undefined && !placed && tag === authTag(config.auth)) {
          placed = true;
        } else {
          await this.write(room, tag, () => room.removeTag(tag));
        }
      }
    }

    if (config.auth !== undefined && !placed) {
      const tag = authTag(config.auth);
      await this.write(room, tag, () => room.setTag(tag));
    }
  }

  /**
   * Rewrite legacy tags in the current shape. Returns whether anything needed migrating.
   * Unlike get(), a failed write is thrown.
   */
  async migrate(room: TaggedRoom): Promise<boolean> {
    const { config, hasLegacy } = parseTags(room.roomId, await readTags(room));
    if (!hasLegacy) {
      return false;
    }
    await this.set(room, config);
    return true;
  }

  private async write(room: TaggedRoom, tag: string, op: () => Promise<void>): Promise<void> {
    try {
      await op();
    } catch (error) {
      console.error('[RoomConfig] Tag write failed', { roomId: room.roomId, tag, error });
      throw PokeErrors.tagWriteFailure(room.roomId, tag, error);
    }
  }
}
