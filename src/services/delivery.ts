// Delivery Pipeline
//
// One poke, start to finish:
//   resolving -> awaiting-join -> authorizing -> formatting -> sending -> delivered
// A room the send policy refuses ends in `suppressed`: the caller is told it worked and
// only the log says otherwise. Every other problem ends in `failed` with a PokeError.

import type { AppContext, Sleep } from '../context';
import type { RoomHandle } from './rooms';
import type { EventId } from '../types';
import { resolveRoom } from './resolver';
import { validateAuthentication } from './auth';
import { chooseFormat, formatMessage } from './format';
import { canMessageRoom } from './policy';
import { PokeErrors, describeError, isPokeError } from '../utils/errors';

export type DeliveryState =
  | 'resolving'
  | 'awaiting-join'
  | 'authorizing'
  | 'formatting'
  | 'sending'
  | 'delivered'
  | 'suppressed'
  | 'failed';

export interface DeliveryRequest {
  // Room ID or alias, after nickname resolution
  target: string;
  message: string;
  // Carries the auth token and the format for HTTP pokes; empty for chat commands
  headers: Headers;
  mentionRoom: boolean;
}

export interface DeliveryResult {
  state: 'delivered' | 'suppressed';
  roomId: string;
  eventId?: EventId;
}

export const JOIN_WAIT_INITIAL_MS = 2_000;
// No single wait is longer than this; reaching it means giving up
export const JOIN_WAIT_MAX_DELAY_MS = 60_000;

/**
 * Wait while the room is still an unaccepted invite: 2s, 4s, 8s, ... until the next
 * wait would pass 60s. Returns the time spent waiting.
 * @throws PokeError JOIN_TIMEOUT
 */
export async function awaitJoin(room: RoomHandle, sleep: Sleep): Promise<number> {
  let delay = JOIN_WAIT_INITIAL_MS;
  let waited = 0;
  while (room.membership() === 'invite') {
    if (delay > JOIN_WAIT_MAX_DELAY_MS) {
      throw PokeErrors.joinTimeout(room.roomId);
    }
    await sleep(delay);
    waited += delay;
    delay *= 2;
  }
  return waited;
}

export class Delivery {
  private current: DeliveryState = 'resolving';
  private readonly visited: DeliveryState[] = ['resolving'];
  private roomId?: string;

  constructor(
    private readonly ctx: AppContext,
    private readonly request: DeliveryRequest
  ) {}

  get state(): DeliveryState {
    return this.current;
  }

  get history(): readonly DeliveryState[] {
    return this.visited;
  }

  async run(): Promise<DeliveryResult> {
    try {
      return await this.execute();
    } catch (error) {
      this.transition('failed');
      console.error('[Delivery] Failed to send message', {
        target: this.request.target,
        roomId: this.roomId,
        cause: describeError(error),
      });
      throw isPokeError(error) ? error : PokeErrors.sendFailed(this.roomId ?? this.request.target, error);
    }
  }

  private async execute(): Promise<DeliveryResult> {
    const { ctx, request } = this;

    const room = resolveRoom(ctx.session, request.target);
    if (!room) {
      throw PokeErrors.roomNotFound(request.target);
    }
    this.roomId = room.roomId;

    this.transition('awaiting-join');
    await awaitJoin(room, ctx.sleep);

    this.transition('authorizing');
    const config = await ctx.rooms.get(room);
    const auth = validateAuthentication(config, request.headers, request.message);
    if (!auth.ok) {
      throw PokeErrors.authRejected(room.roomId);
    }

    this.transition('formatting');
    const format = chooseFormat(request.headers.get('format'), ctx.settings.defaultFormat);
    const content = formatMessage(auth.message, format, request.mentionRoom);

    this.transition('sending');
    if (!(await canMessageRoom(ctx, room))) {
      this.transition('suppressed');
      console.warn('[Delivery] Send refused by policy', { roomId: room.roomId });
      return { state: 'suppressed', roomId: room.roomId };
    }

    let eventId: EventId;
    try {
      eventId = await room.send(content);
    } catch (error) {
      throw PokeErrors.sendFailed(room.roomId, error);
    }

    this.transition('delivered');
    return { state: 'delivered', roomId: room.roomId, eventId };
  }

  private transition(next: DeliveryState): void {
    console.debug(`[Delivery] ${this.current} -> ${next}`, { target: this.request.target, roomId: this.roomId });
    this.current = next;
    this.visited.push(next);
  }
}

export function deliver(ctx: AppContext, request: DeliveryRequest): Promise<DeliveryResult> {
  return new Delivery(ctx, request).run();
}
