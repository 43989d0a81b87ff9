// Chat commands
//
// Messages of the form `<prefix> <command> [args...]` are looked up in COMMANDS.
// Replies go back into the room the command came from.

import type { AppContext } from '../context';
import type { RoomHandle } from '../services/rooms';
import type { UserId } from '../types';
import type { CommandHandler, CommandInvocation, CommandReply } from './types';
import { info } from './info';
import { poke } from './poke';
import { block, unblock } from './block';
import { set } from './set';
import { canMessageRoom } from '../services/policy';
import { textMarkdown, textPlain } from '../services/format';
import { describeError } from '../utils/errors';

export type { CommandHandler, CommandInvocation, CommandReply } from './types';

export type CommandName = 'help' | 'info' | 'poke' | 'block' | 'unblock' | 'set';

const help: CommandHandler = {
  description: 'Show this message',
  async handle(ctx) {
    const prefix = ctx.settings.commandPrefix;
    const lines = Object.entries(COMMANDS).map(([name, command]) => {
      const usage = command.usage ? ` ${command.usage}` : '';
      return `${prefix} ${name}${usage}: ${command.description}`;
    });
    return [textPlain(['Available commands:', ...lines].join('\n'))];
  },
};

export const COMMANDS: Record<CommandName, CommandHandler> = {
  help,
  info,
  poke,
  block,
  unblock,
  set,
};

function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

/**
 * Split a message into command words. Returns null when it is not addressed to the bot.
 */
export function parseCommand(prefix: string, text: string): string[] | null {
  if (!text.startsWith(prefix)) {
    return null;
  }
  const rest = text.slice(prefix.length);
  if (rest.length > 0 && !/^\s/.test(rest)) {
    // e.g. "!pokemon" with prefix "!pokem"
    return null;
  }
  return rest.trim().split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Run one command and return its replies without sending them.
 */
export async function runCommand(ctx: AppContext, invocation: CommandInvocation): Promise<CommandReply> {
  const name = invocation.args[0] ?? 'help';
  if (!isCommandName(name)) {
    return [textPlain(`Unknown command: ${name}\nSend \`${ctx.settings.commandPrefix} help\` to see available commands.`)];
  }
  return COMMANDS[name].handle(ctx, invocation);
}

async function sendReplies(room: RoomHandle, replies: CommandReply): Promise<void> {
  for (const reply of replies) {
    try {
      await room.send(reply);
    } catch (error) {
      console.error('[Commands] Failed to send reply', { roomId: room.roomId, cause: describeError(error) });
      return;
    }
  }
}

/**
 * Entry point for the chat session: parse, run, reply. Failures are reported in the
 * originating room unless the bot may not post there.
 */
export async function dispatchCommand(ctx: AppContext, sender: UserId, text: string, room: RoomHandle): Promise<void> {
  const args = parseCommand(ctx.settings.commandPrefix, text);
  if (args === null) {
    return;
  }

  let replies: CommandReply;
  try {
    replies = await runCommand(ctx, { sender, text, args, room });
  } catch (error) {
    console.error('[Commands] Command failed', {
      roomId: room.roomId,
      sender,
      command: args[0],
      cause: describeError(error),
    });
    if (!(await canMessageRoom(ctx, room))) {
      return;
    }
    const detail = error instanceof Error ? error.message : String(error);
    replies = [textPlain(`ERROR: ${detail}`)];
  }

  await sendReplies(room, replies);
}

/**
 * Greeting after accepting an invite
 */
export async function welcome(ctx: AppContext, room: RoomHandle): Promise<void> {
  const replies: CommandReply = [];
  if (await canMessageRoom(ctx, room)) {
    replies.push(
      textMarkdown(`Welcome to Pok'em!\n\nSend \`${ctx.settings.commandPrefix} help\` to see available commands.`)
    );
  }
  replies.push(...(await info.handle(ctx, { sender: ctx.session.userId, text: '', args: ['info'], room })));
  await sendReplies(room, replies);
}
