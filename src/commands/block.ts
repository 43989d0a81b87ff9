// block / unblock: stop or allow pokes to this room

import type { CommandHandler } from './types';
import { canMessageRoom } from '../services/policy';
import { textPlain } from '../services/format';
import { describeError } from '../utils/errors';

export const block: CommandHandler = {
  description: "Block Pok'em from sending messages to this room",
  async handle(ctx, { room }) {
    // Already blocked (or unreachable): leave it alone and stay quiet
    if (!(await canMessageRoom(ctx, room))) {
      return [];
    }
    try {
      const config = await ctx.rooms.get(room);
      await ctx.rooms.set(room, { ...config, block: true });
    } catch (error) {
      console.error('[Commands] Failed to block room', { roomId: room.roomId, cause: describeError(error) });
      return [textPlain('ERROR: Failed to block myself.')];
    }
    return [
      textPlain(
        "Pok'em has been blocked from sending messages to this room.\n" +
          `Send \`${ctx.settings.commandPrefix} unblock\` to allow messages again.`
      ),
    ];
  },
};

export const unblock: CommandHandler = {
  description: "Unblock Pok'em to allow notifications to this room",
  async handle(ctx, { room }) {
    try {
      const config = await ctx.rooms.get(room);
      await ctx.rooms.set(room, { ...config, block: false });
    } catch (error) {
      console.error('[Commands] Failed to unblock room', { roomId: room.roomId, cause: describeError(error) });
      return [textPlain('ERROR: Failed to unblock myself.')];
    }
    return [textPlain("Pok'em has been unblocked from sending messages to this room.")];
  },
};
