// Configuration
//
// Read from a YAML file, then overridden from the environment:
//   POKEM_HOMESERVER_URL, POKEM_USERNAME, POKEM_PASSWORD, POKEM_ACCESS_TOKEN,
//   POKEM_ADDR, POKEM_PORT
// A missing file is an empty config. A file that does not match the schema is fatal.

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const DEFAULT_COMMAND_PREFIX = '!pokem';
export const DEFAULT_DAEMON_ADDR = '0.0.0.0';
export const DEFAULT_DAEMON_PORT = 80;

const MatrixConfigSchema = z.object({
  homeserver_url: z.string().url(),
  username: z.string().min(1),
  password: z.string().optional(),
  access_token: z.string().optional(),
  // Regex of user IDs the bot answers and accepts invites from
  allow_list: z.string().optional(),
  // Rooms with more active members than this are not messaged
  room_size_limit: z.number().int().positive().optional(),
  state_dir: z.string().optional(),
  command_prefix: z.string().min(1).optional(),
  // 'markdown' or 'plain'
  format: z.string().optional(),
});

const ServerConfigSchema = z.object({
  url: z.string().min(1),
  port: z.number().int().positive().max(65535).optional(),
});

const DaemonConfigSchema = z.object({
  addr: z.string().optional(),
  port: z.number().int().positive().max(65535).optional(),
});

export const ConfigSchema = z.object({
  matrix: MatrixConfigSchema.optional(),
  server: ServerConfigSchema.optional(),
  daemon: DaemonConfigSchema.optional(),
  // Nickname -> room ID or alias. 'default' is used by the CLI when no room is given.
  rooms: z.record(z.string(), z.string()).optional(),
});

export type MatrixConfig = z.infer<typeof MatrixConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'pokem', 'config.yaml');
}

export function defaultStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_STATE_HOME || path.join(os.homedir(), '.local', 'state');
  return path.join(base, 'pokem');
}

function readConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    console.warn(`[Config] No config file at ${filePath}, using defaults`);
    return {};
  }
  const contents = fs.readFileSync(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw new Error(`Config file ${filePath} is not valid YAML`, { cause: error });
  }
  // An empty file parses to null
  return parsed ?? {};
}

function parsePort(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const port = Number(value);
  return Number.isInteger(port) ? port : undefined;
}

// Apply environment overrides on top of the parsed file contents
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }
  const merged: Record<string, unknown> = { ...raw };

  const matrixOverrides = Object.fromEntries(
    Object.entries({
      homeserver_url: env.POKEM_HOMESERVER_URL,
      username: env.POKEM_USERNAME,
      password: env.POKEM_PASSWORD,
      access_token: env.POKEM_ACCESS_TOKEN,
    }).filter(([, v]) => v !== undefined && v !== '')
  );
  if (Object.keys(matrixOverrides).length > 0) {
    const existing = typeof merged.matrix === 'object' && merged.matrix !== null ? merged.matrix : {};
    merged.matrix = { ...existing, ...matrixOverrides };
  }

  const addr = env.POKEM_ADDR || undefined;
  const port = parsePort(env.POKEM_PORT);
  if (addr !== undefined || port !== undefined) {
    const existing = typeof merged.daemon === 'object' && merged.daemon !== null ? merged.daemon : {};
    merged.daemon = {
      ...existing,
      ...(addr !== undefined ? { addr } : {}),
      ...(port !== undefined ? { port } : {}),
    };
  }

  return merged;
}

export function loadConfig(filePath: string | undefined, env: NodeJS.ProcessEnv = process.env): Config {
  const resolved = filePath ?? env.POKEM_CONFIG ?? defaultConfigPath(env);
  const raw = applyEnvOverrides(readConfigFile(resolved), env);
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config in ${resolved}: ${issues}`);
  }
  return result.data;
}

// Nickname table as a read-only map
export function nicknameTable(config: Config): ReadonlyMap<string, string> {
  return new Map(Object.entries(config.rooms ?? {}));
}
