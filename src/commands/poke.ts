// poke <room> <message>: send a poke from inside the chat

import type { CommandHandler } from './types';
import { deliver } from '../services/delivery';
import { canMessageRoom } from '../services/policy';
import { textPlain } from '../services/format';
import { PokeErrors, isPokeError } from '../utils/errors';

export const poke: CommandHandler = {
  usage: '<room> <message>',
  description: 'Poke the room',
  async handle(ctx, { args, room }) {
    const target = args[1] ?? '';
    const message = args.slice(2).join(' ');

    try {
      await deliver(ctx, {
        target,
        message,
        headers: new Headers(),
        mentionRoom: false,
      });
      return [];
    } catch (error) {
      const failure = isPokeError(error) ? error : PokeErrors.sendFailed(target, error);
      if (!(await canMessageRoom(ctx, room))) {
        return [];
      }
      return [textPlain(failure.publicMessage)];
    }
  },
};
