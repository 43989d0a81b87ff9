// Session persistence
//
// Keeps the access token, device and sync position between restarts so the bot does
// not create a new device on every start.

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

const StoredSessionSchema = z.object({
  homeserver_url: z.string(),
  user_id: z.string(),
  access_token: z.string(),
  device_id: z.string().optional(),
  next_batch: z.string().optional(),
});

export type StoredSession = z.infer<typeof StoredSessionSchema>;

export class SessionStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, 'session.json');
  }

  async load(): Promise<StoredSession | null> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf8');
    } catch {
      return null;
    }
    try {
      const result = StoredSessionSchema.safeParse(JSON.parse(contents));
      if (result.success) {
        return result.data;
      }
      console.warn('[SessionStore] Ignoring malformed session file', { file: this.filePath });
    } catch {
      console.warn('[SessionStore] Ignoring unreadable session file', { file: this.filePath });
    }
    return null;
  }

  async save(session: StoredSession): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(session, null, 2), { mode: 0o600 });
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
