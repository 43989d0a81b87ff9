// Tests for the delivery pipeline
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Delivery, deliver, awaitJoin, type DeliveryRequest } from './delivery';
import { BLOCK_TAG, authTag } from './room-config';
import { FakeRoom, FakeSession, createTestContext } from '../testing/fake-session';
import { EXAMPLE_ROOM_ID } from '../context';
import { PokeErrorCodes } from '../utils/errors';

function request(target: string, message: string, overrides: Partial<DeliveryRequest> = {}): DeliveryRequest {
  return { target, message, headers: new Headers(), mentionRoom: false, ...overrides };
}

describe('Delivery', () => {
  let session: FakeSession;
  let room: FakeRoom;

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    session = new FakeSession();
    room = session.addRoom('!ops:example.org', { alias: '#ops:example.org' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should walk every state and send the message', async () => {
    const { ctx } = createTestContext(session);
    const delivery = new Delivery(ctx, request('#ops:example.org', 'disk full', { mentionRoom: true }));

    const result = await delivery.run();

    expect(result).toEqual({ state: 'delivered', roomId: '!ops:example.org', eventId: '$event1' });
    expect(delivery.history).toEqual(['resolving', 'awaiting-join', 'authorizing', 'formatting', 'sending', 'delivered']);
    expect(room.sent).toEqual([{ msgtype: 'm.text', body: 'disk full', 'm.mentions': { room: true } }]);
  });

  it('should fail for a room the bot is not in', async () => {
    const { ctx } = createTestContext(session);
    await expect(deliver(ctx, request('#nope:example.org', 'hi'))).rejects.toMatchObject({
      code: PokeErrorCodes.ROOM_NOT_FOUND,
      message: 'Failed to find room with name: #nope:example.org',
    });
  });

  describe('join wait', () => {
    it('should give up after waiting 62 seconds on an invite', async () => {
      room.currentMembership = 'invite';
      const { ctx, sleeps } = createTestContext(session);

      await expect(deliver(ctx, request('!ops:example.org', 'hi'))).rejects.toMatchObject({
        code: PokeErrorCodes.JOIN_TIMEOUT,
        roomId: '!ops:example.org',
      });
      expect(sleeps).toEqual([2000, 4000, 8000, 16000, 32000]);
      expect(sleeps.reduce((a, b) => a + b, 0)).toBe(62000);
      expect(room.sent).toEqual([]);
    });

    it('should carry on once the invite is accepted', async () => {
      room.currentMembership = 'invite';
      const sleeps: number[] = [];
      const waited = await awaitJoin(room, async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 2) room.currentMembership = 'join';
      });
      expect(waited).toBe(6000);
      expect(sleeps).toEqual([2000, 4000]);
    });

    it('should not wait for a joined room', async () => {
      expect(await awaitJoin(room, async () => undefined)).toBe(0);
    });
  });

  describe('authentication', () => {
    beforeEach(() => {
      room.tagSet.add(authTag('test-secret'));
    });

    it('should refuse a poke without the token', async () => {
      const { ctx } = createTestContext(session);
      await expect(deliver(ctx, request('!ops:example.org', 'hello'))).rejects.toMatchObject({
        code: PokeErrorCodes.AUTH_REJECTED,
      });
      expect(room.sent).toEqual([]);
    });

    it('should strip the token from the message', async () => {
      const { ctx } = createTestContext(session);
      await deliver(ctx, request('!ops:example.org', 'test-secret hello'));
      expect(room.bodies()).toEqual(['hello']);
    });

    it('should accept the token in a header', async () => {
      const { ctx } = createTestContext(session);
      await deliver(ctx, request('!ops:example.org', 'hello', { headers: new Headers({ auth: 'test-secret' }) }));
      expect(room.bodies()).toEqual(['hello']);
    });
  });

  describe('send policy', () => {
    it('should suppress a poke to a blocked room', async () => {
      room.tagSet.add(BLOCK_TAG);
      const { ctx } = createTestContext(session);
      const delivery = new Delivery(ctx, request('!ops:example.org', 'hi'));

      expect(await delivery.run()).toEqual({ state: 'suppressed', roomId: '!ops:example.org' });
      expect(delivery.state).toBe('suppressed');
      expect(room.sent).toEqual([]);
    });

    it('should suppress a poke to a room over the size limit', async () => {
      room.members = 11;
      const { ctx } = createTestContext(session, { settings: { roomSizeLimit: 10 } });
      expect(await deliver(ctx, request('!ops:example.org', 'hi'))).toMatchObject({ state: 'suppressed' });
    });

    it('should send when the member count cannot be read', async () => {
      room.failMemberCount = true;
      const { ctx } = createTestContext(session, { settings: { roomSizeLimit: 10 } });
      expect(await deliver(ctx, request('!ops:example.org', 'hi'))).toMatchObject({ state: 'delivered' });
    });

    it('should always allow the example room', async () => {
      const example = session.addRoom(EXAMPLE_ROOM_ID, { tags: [BLOCK_TAG], members: 500 });
      const { ctx } = createTestContext(session, { settings: { roomSizeLimit: 10 } });
      expect(await deliver(ctx, request(EXAMPLE_ROOM_ID, 'hi'))).toMatchObject({ state: 'delivered' });
      expect(example.bodies()).toEqual(['hi']);
    });
  });

  describe('formatting', () => {
    it('should render markdown by default', async () => {
      const { ctx } = createTestContext(session);
      await deliver(ctx, request('!ops:example.org', '**bold**'));
      expect(room.sent).toEqual([
        {
          msgtype: 'm.text',
          body: '**bold**',
          format: 'org.matrix.custom.html',
          formatted_body: '<p><strong>bold</strong></p>',
        },
      ]);
    });

    it('should send plain text when the format header asks for it', async () => {
      const { ctx } = createTestContext(session);
      await deliver(ctx, request('!ops:example.org', '**bold**', { headers: new Headers({ format: 'plain' }) }));
      expect(room.sent).toEqual([{ msgtype: 'm.text', body: '**bold**' }]);
    });

    it('should use the configured default format', async () => {
      const { ctx } = createTestContext(session, { settings: { defaultFormat: 'plain' } });
      await deliver(ctx, request('!ops:example.org', '**bold**'));
      expect(room.sent).toEqual([{ msgtype: 'm.text', body: '**bold**' }]);
    });
  });

  it('should fail with the send error', async () => {
    room.failSends = true;
    const { ctx } = createTestContext(session);
    const delivery = new Delivery(ctx, request('!ops:example.org', 'hi'));
    await expect(delivery.run()).rejects.toMatchObject({ code: PokeErrorCodes.SEND_FAILED, message: 'send failed' });
    expect(delivery.state).toBe('failed');
  });
});
