// Poke API
//
// GET  /<topic>           the poke form
// POST /<topic>[?query]   deliver a poke (any method other than GET does the same)
//
// Failures are not told apart here: every one of them is 404 "Failed to send message".

import { Hono } from 'hono';
import type { AppEnv } from '../types';
import type { AppContext } from '../context';
import { normalizeRequest, isUrgent, type PokeInput } from '../services/notification';
import { resolveTopic } from '../services/resolver';
import { deliver } from '../services/delivery';
import { pokeFormHtml } from '../ui/poke-form';
import { describeError } from '../utils/errors';

const app = new Hono<AppEnv>();

export type PokeResponse = { ok: true } | { ok: false };

/**
 * Normalize, resolve and deliver one HTTP poke.
 */
export async function handlePoke(ctx: AppContext, input: PokeInput): Promise<PokeResponse> {
  try {
    const notification = normalizeRequest(input);
    const { target, mentionRoom } = resolveTopic(
      ctx.nicknames,
      notification.topic,
      isUrgent(notification.priority)
    );
    await deliver(ctx, {
      target,
      message: notification.message,
      headers: input.headers,
      mentionRoom,
    });
    return { ok: true };
  } catch (error) {
    console.error('[Poke] Failed to send message', { path: input.path, cause: describeError(error) });
    return { ok: false };
  }
}

// ============================================
// Endpoints
// ============================================

app.get('*', (c) => {
  return c.html(pokeFormHtml());
});

app.all('*', async (c) => {
  const url = new URL(c.req.url);
  const body = new Uint8Array(await c.req.arrayBuffer());

  const result = await handlePoke(c.get('ctx'), {
    path: url.pathname,
    query: url.searchParams,
    headers: c.req.raw.headers,
    body,
  });

  if (!result.ok) {
    return c.text('Failed to send message', 404);
  }
  return c.text('OK', 200);
});

export default app;
