// info: where am I, and how do I poke this room

import type { AppContext } from '../context';
import type { RoomHandle } from '../services/rooms';
import type { CommandHandler, CommandReply } from './types';
import { canMessageRoom } from '../services/policy';
import { textPlain } from '../services/format';

export async function roomInfo(ctx: AppContext, room: RoomHandle): Promise<CommandReply> {
  if (!(await canMessageRoom(ctx, room))) {
    return [];
  }

  const replies: CommandReply = [];
  const alias = room.canonicalAlias();
  if (alias) {
    replies.push(textPlain(`This Room's Alias is: ${alias}`));
  }
  replies.push(textPlain(`This Room's ID is: ${room.roomId}`));

  const config = await ctx.rooms.get(room);
  if (config.auth !== undefined) {
    replies.push(textPlain(`This Room's Authentication token is: ${config.auth}`));
  }
  return replies;
}

export const info: CommandHandler = {
  description: 'Print room info',
  handle: (ctx, { room }) => roomInfo(ctx, room),
};
