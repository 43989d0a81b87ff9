// Daemon mode
//
// Logs the bot in, answers chat commands and serves the HTTP front door until killed.
// If the sync loop dies for good (revoked token) the process exits non-zero so the
// service manager can restart it.

import { serve } from '@hono/node-server';
import type { Config } from './services/config';
import { DEFAULT_DAEMON_ADDR, DEFAULT_DAEMON_PORT, defaultStateDir } from './services/config';
import { MatrixSession } from './services/session';
import { SessionStore } from './services/session-store';
import { createContext, realSleep, settingsFromConfig } from './context';
import { createApp } from './app';
import { dispatchCommand, welcome } from './commands';

export async function runDaemon(config: Config): Promise<void> {
  const matrix = config.matrix;
  if (!matrix) {
    throw new Error('Daemon mode needs a `matrix` config');
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

  session.setHandlers({
    onCommand: (sender, body, room) => dispatchCommand(ctx, sender, body, room),
    onJoin: (room) => welcome(ctx, room),
  });

  const hostname = config.daemon?.addr ?? DEFAULT_DAEMON_ADDR;
  const port = config.daemon?.port ?? DEFAULT_DAEMON_PORT;
  const app = createApp(ctx);
  const server = serve({ fetch: app.fetch, hostname, port }, (info) => {
    console.log(`[Daemon] Listening on ${info.address}:${info.port}`);
  });

  const shutdown = () => {
    console.log('[Daemon] Shutting down');
    session.stop();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await session.run();
}
