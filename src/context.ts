// Application context
//
// Built once at startup and handed to every HTTP handler and chat command.

import type { ChatSession } from './services/rooms';
import { RoomConfigStore } from './services/room-config';
import { DEFAULT_COMMAND_PREFIX, nicknameTable, type Config } from './services/config';

// The public demo room, which can always be messaged
export const EXAMPLE_ROOM_ID = '!JYrjsPjErpFSDdpwpI:jackson.dev';

export interface Settings {
  commandPrefix: string;
  defaultFormat?: string;
  roomSizeLimit?: number;
  exampleRoomId: string;
}

export type Sleep = (ms: number) => Promise<void>;

export interface AppContext {
  session: ChatSession;
  rooms: RoomConfigStore;
  // Read-only after startup
  nicknames: ReadonlyMap<string, string>;
  settings: Settings;
  sleep: Sleep;
}

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function settingsFromConfig(config: Config): Settings {
  return {
    commandPrefix: config.matrix?.command_prefix ?? DEFAULT_COMMAND_PREFIX,
    defaultFormat: config.matrix?.format,
    roomSizeLimit: config.matrix?.room_size_limit,
    exampleRoomId: EXAMPLE_ROOM_ID,
  };
}

export function createContext(
  session: ChatSession,
  config: Config,
  overrides: Partial<Pick<AppContext, 'rooms' | 'sleep'>> = {}
): AppContext {
  return {
    session,
    rooms: overrides.rooms ?? new RoomConfigStore(),
    nicknames: nicknameTable(config),
    settings: settingsFromConfig(config),
    sleep: overrides.sleep ?? realSleep,
  };
}
