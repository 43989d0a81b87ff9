// Chat command types

import type { AppContext } from '../context';
import type { RoomHandle } from '../services/rooms';
import type { TextMessageContent, UserId } from '../types';

export interface CommandInvocation {
  sender: UserId;
  // Full message text, prefix included
  text: string;
  // Words after the prefix; args[0] is the command name
  args: string[];
  room: RoomHandle;
}

// Messages to post back into the originating room, in order
export type CommandReply = TextMessageContent[];

export interface CommandHandler {
  usage?: string;
  description: string;
  handle(ctx: AppContext, invocation: CommandInvocation): Promise<CommandReply>;
}
