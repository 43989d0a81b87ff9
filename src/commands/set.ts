// set <block|auth> <on|off|token>: change this room's settings

import type { AppContext } from '../context';
import type { RoomConfig } from '../services/room-config';
import type { CommandHandler } from './types';
import { textMarkdown } from '../services/format';

// pass/password/authentication are older spellings of auth
const AUTH_KEYS = new Set(['auth', 'authentication', 'password', 'pass']);

function usage(ctx: AppContext, config: RoomConfig): string {
  const prefix = ctx.settings.commandPrefix;
  const lines = [
    'Usage:',
    `\`${prefix} set [block|auth] <on|off|token>\``,
    'Current values:',
    `- block: ${config.block ? 'on' : 'off'}`,
  ];
  if (config.auth !== undefined) {
    lines.push(`- Authentication Token: ${config.auth}`);
  }
  return lines.join('\n');
}

function setBlock(ctx: AppContext, config: RoomConfig, value: string): string {
  if (!value) {
    return `Block cannot be empty\n\`${ctx.settings.commandPrefix} set block [on|off]\``;
  }
  switch (value.toLowerCase()) {
    case 'on':
      config.block = true;
      return 'Blocking messages';
    case 'off':
      config.block = false;
      return 'Unblocking messages';
    default:
      return "Invalid value, use 'on' or 'off'";
  }
}

function setAuth(ctx: AppContext, config: RoomConfig, value: string): string {
  if (!value) {
    return `Token cannot be empty\n\`${ctx.settings.commandPrefix} set auth [off|token]\``;
  }
  switch (value.toLowerCase()) {
    case 'on':
      return "Tried setting the Auth Token to 'on', that was probably an accident";
    case 'off':
      delete config.auth;
      return 'Auth Token removed';
    default:
      config.auth = value;
      return `Auth Token set to ${value}`;
  }
}

export const set: CommandHandler = {
  usage: '<block|auth> <on|off|token>',
  description: "Configure settings for Pok'em in this room",
  async handle(ctx, { args, room }) {
    const config = await ctx.rooms.get(room);
    const key = args[1] ?? '';
    const value = args[2] ?? '';
    console.log('[Commands] Setting room config', { roomId: room.roomId, key });

    let response: string;
    if (key === 'block') {
      response = setBlock(ctx, config, value);
    } else if (AUTH_KEYS.has(key)) {
      response = setAuth(ctx, config, value);
    } else {
      response = usage(ctx, config);
    }

    // Written back even when unchanged, which also clears out stale tags
    await ctx.rooms.set(room, config);
    return [textMarkdown(response)];
  },
};
