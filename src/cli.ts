// Command line
//
// Usage:
//   pokem [--config <path>] [--room <room>] [message...]   send one message
//   pokem --daemon [--config <path>]                       run the bot and HTTP server
//
// Options:
//   --config, -c <path>   Config file (default: $XDG_CONFIG_HOME/pokem/config.yaml)
//   --room, -r <room>     Room ID, alias or nickname
//   --daemon, -d          Run as a daemon
//   --help, -h            Show help

import type { Config } from './services/config';
import { defaultStateDir, nicknameTable } from './services/config';
import { pokeServer } from './services/poke-client';
import { MatrixSession } from './services/session';
import { SessionStore } from './services/session-store';
import { createContext, realSleep, settingsFromConfig } from './context';
import { deliver } from './services/delivery';
import { looksLikeRoomAddress } from './utils/ids';
import { describeError } from './utils/errors';

export interface CliArgs {
  config?: string;
  room?: string;
  daemon: boolean;
  help: boolean;
  message: string[];
}

export const HELP_TEXT = `Usage: pokem [options] [message...]

Options:
  -c, --config <path>   YAML config file (default: $XDG_CONFIG_HOME/pokem/config.yaml)
  -r, --room <room>     Room ID, alias or nickname
  -d, --daemon          Run the bot and HTTP server
  -h, --help            Show this help`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { daemon: false, help: false, message: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        args.config = argv[++i];
        if (args.config === undefined) throw new Error(`${arg} needs a value`);
        break;
      case '--room':
      case '-r':
        args.room = argv[++i];
        if (args.room === undefined) throw new Error(`${arg} needs a value`);
        break;
      case '--daemon':
      case '-d':
        args.daemon = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        args.message.push(arg);
    }
  }

  return args;
}

/**
 * Work out the target room and the words of the message.
 *  1. --room, through the nickname table
 *  2. the first word, when it looks like a room address
 *  3. the first word, when it is a nickname
 *  4. the `default` nickname
 */
export function chooseRoom(
  nicknames: ReadonlyMap<string, string>,
  room: string | undefined,
  words: string[]
): { room: string; message: string[] } {
  if (room !== undefined) {
    return { room: nicknames.get(room) ?? room, message: words };
  }

  const [first, ...rest] = words;
  if (first !== undefined) {
    if (looksLikeRoomAddress(first)) {
      return { room: first, message: rest };
    }
    const named = nicknames.get(first);
    if (named !== undefined) {
      return { room: named, message: rest };
    }
  }

  const fallback = nicknames.get('default');
  if (fallback === undefined) {
    throw new Error('No room specified');
  }
  return { room: fallback, message: words };
}

export async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return '';
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8').trim();
}

async function pokeAsClient(config: Config, room: string, message: string): Promise<void> {
  const matrix = config.matrix;
  if (!matrix) {
    throw new Error('No matrix config');
  }
  const settings = settingsFromConfig(config);
  const session = await MatrixSession.connect(matrix, {
    allowList: matrix.allow_list,
    commandPrefix: settings.commandPrefix,
    roomSizeLimit: settings.roomSizeLimit,
    store: new SessionStore(matrix.state_dir ?? defaultStateDir()),
    sleep: realSleep,
  });
  const ctx = createContext(session, config);
  await deliver(ctx, { target: room, message, headers: new Headers(), mentionRoom: false });
}

/**
 * Send one message. Tries the configured daemon first, then logging in directly.
 */
export async function pokeOnce(config: Config, args: CliArgs): Promise<void> {
  const { room, message: words } = chooseRoom(nicknameTable(config), args.room, args.message);
  const stdin = await readStdin();
  const message = [...words, ...(stdin ? [stdin] : [])].join(' ');
  console.log('[CLI] Poking', { room });

  if (!config.server && !config.matrix) {
    throw new Error('Nothing to send with: configure `server` or `matrix`');
  }

  if (config.server) {
    try {
      await pokeServer(config.server, room, message);
      console.log('[CLI] Successfully sent message');
      return;
    } catch (error) {
      console.error('[CLI] Failed to send message through server', { cause: describeError(error) });
      if (!config.matrix) {
        throw error;
      }
    }
  }

  await pokeAsClient(config, room, message);
  console.log('[CLI] Successfully sent message');
}
