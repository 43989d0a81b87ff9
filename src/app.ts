// HTTP front door

import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { AppEnv } from './types';
import type { AppContext } from './context';
import poke from './api/poke';

export function createApp(ctx: AppContext): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // Global middleware
  app.use('*', logger());
  app.use('*', async (c, next) => {
    c.set('ctx', ctx);
    await next();
  });

  // Health check, outside the plain topic names
  app.get('/_health', (c) => c.json({ status: 'ok' }));

  // Everything else is a poke topic
  app.route('/', poke);

  // Error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    return c.text('Internal Server Error', 500);
  });

  return app;
}
