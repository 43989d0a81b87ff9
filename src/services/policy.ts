// Send policy
//
// Decides whether the bot may post into a room at all, for pokes and command replies alike.

import type { AppContext } from '../context';
import type { RoomHandle } from './rooms';

export async function canMessageRoom(ctx: AppContext, room: RoomHandle): Promise<boolean> {
  if (room.roomId === ctx.settings.exampleRoomId) {
    return true;
  }

  const config = await ctx.rooms.get(room);
  if (config.block) {
    console.warn('[Policy] Blocked from sending messages', { roomId: room.roomId });
    return false;
  }

  const limit = ctx.settings.roomSizeLimit;
  if (limit !== undefined && (await isOverSizeLimit(room, limit))) {
    console.warn('[Policy] Room exceeds size limit', { roomId: room.roomId, limit });
    return false;
  }

  return true;
}

export async function isOverSizeLimit(room: RoomHandle, limit: number): Promise<boolean> {
  try {
    return (await room.activeMemberCount()) > limit;
  } catch (error) {
    console.error('[Policy] Failed to count room members', { roomId: room.roomId, error });
    return false;
  }
}
