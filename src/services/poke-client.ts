// Remote poke client
// Sends a poke to a running Pokem daemon instead of logging in to Matrix.

import type { ServerConfig } from './config';
import type { FetchLike } from './matrix-client';

export function pokeUrl(server: ServerConfig, room: string): string {
  const base = server.url.replace(/\/+$/, '');
  const withPort = server.port !== undefined ? `${base}:${server.port}` : base;
  const withScheme = /^https?:\/\//.test(withPort) ? withPort : `http://${withPort}`;
  return `${withScheme}/${encodeURIComponent(room)}`;
}

/**
 * POST the message as the raw body.
 * @throws Error when the daemon answers with anything but 2xx
 */
export async function pokeServer(
  server: ServerConfig,
  room: string,
  message: string,
  fetchImpl: FetchLike = fetch
): Promise<void> {
  const url = pokeUrl(server, room);
  const response = await fetchImpl(url, {
    method: 'POST',
    headers: { 'Content-Type': 'text/plain' },
    body: message,
  });

  if (!response.ok) {
    console.error('[PokeClient] Failed to send message', { url, status: response.status });
    throw new Error(`Failed to send message: HTTP ${response.status}`);
  }
  console.log('[PokeClient] Response', { url, body: await response.text() });
}
