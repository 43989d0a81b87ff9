// Tests for the room configuration store
import { describe, it, expect, vi, afterEach } from 'vitest';
import { RoomConfigStore, BLOCK_TAG, authTag } from './room-config';
import { FakeRoom } from '../testing/fake-session';
import { PokeError, PokeErrorCodes } from '../utils/errors';

describe('RoomConfigStore', () => {
  const store = new RoomConfigStore();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the defaults for an untagged room', async () => {
    const room = new FakeRoom('!plain:example.org');
    expect(await store.get(room)).toEqual({ block: false });
  });

  it('should ignore tags outside its namespace', async () => {
    const room = new FakeRoom('!plain:example.org', { tags: ['m.favourite', 'u.work'] });
    expect(await store.get(room)).toEqual({ block: false });
  });

  it('should read back what was written', async () => {
    const room = new FakeRoom('!r:example.org');
    await store.set(room, { block: true, auth: 's3cret' });
    expect([...room.tagSet].sort()).toEqual([BLOCK_TAG, 'dev.pokem.auth.s3cret'].sort());
    expect(await store.get(room)).toEqual({ block: true, auth: 's3cret' });
  });

  it('should remove the block tag and the old token on change', async () => {
    const room = new FakeRoom('!r:example.org', { tags: [BLOCK_TAG, authTag('old'), 'm.favourite'] });
    await store.set(room, { block: false, auth: 'new' });
    expect([...room.tagSet].sort()).toEqual(['dev.pokem.auth.new', 'm.favourite']);
  });

  it('should remove every auth tag when the token is cleared', async () => {
    const room = new FakeRoom('!r:example.org', { tags: [authTag('a'), authTag('b')] });
    await store.set(room, { block: false });
    expect([...room.tagSet]).toEqual([]);
  });

  it('should settle on the same tags when set() is repeated over mixed auth and pass tags', async () => {
    const room = new FakeRoom('!r:example.org', {
      tags: [authTag('a'), 'dev.pokem.pass.b', authTag('c'), BLOCK_TAG, 'm.favourite'],
    });
    const expected = [authTag('c'), 'm.favourite'];

    await store.set(room, { block: false, auth: 'c' });
    expect([...room.tagSet].sort()).toEqual(expected);
    await store.set(room, { block: false, auth: 'c' });
    expect([...room.tagSet].sort()).toEqual(expected);
    expect(await store.get(room)).toEqual({ block: false, auth: 'c' });
  });

  it('should migrate a legacy pass tag on read', async () => {
    const room = new FakeRoom('!r:example.org', { tags: ['dev.pokem.pass.hunter2'] });
    expect(await store.get(room)).toEqual({ block: false, auth: 'hunter2' });
    expect([...room.tagSet]).toEqual(['dev.pokem.auth.hunter2']);
  });

  it('should still return the config when the migration write fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const room = new FakeRoom('!r:example.org', { tags: ['dev.pokem.pass.hunter2'] });
    room.failTagWrites = true;
    expect(await store.get(room)).toEqual({ block: false, auth: 'hunter2' });
    expect([...room.tagSet]).toEqual(['dev.pokem.pass.hunter2']);
  });

  it('should report whether migrate() changed anything', async () => {
    const legacy = new FakeRoom('!a:example.org', { tags: ['dev.pokem.pass.x'] });
    const current = new FakeRoom('!b:example.org', { tags: [authTag('x')] });
    expect(await store.migrate(legacy)).toBe(true);
    expect(await store.migrate(current)).toBe(false);
    expect([...legacy.tagSet]).toEqual([authTag('x')]);
  });

  it('should use the first auth token and warn about the rest', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const room = new FakeRoom('!r:example.org', { tags: [authTag('first'), authTag('second')] });
    expect(await store.get(room)).toEqual({ block: false, auth: 'first' });
    expect(warn).toHaveBeenCalledWith('[RoomConfig] Multiple auth tokens set for room', {
      roomId: '!r:example.org',
    });
  });

  it('should fall back to the defaults when tags cannot be read', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const room = new FakeRoom('!r:example.org', { tags: [BLOCK_TAG] });
    room.failTagReads = true;
    expect(await store.get(room)).toEqual({ block: false });
  });

  it('should throw a tag write failure from set()', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const room = new FakeRoom('!r:example.org');
    room.failTagWrites = true;
    await expect(store.set(room, { block: true })).rejects.toBeInstanceOf(PokeError);
    await expect(store.set(room, { block: true })).rejects.toMatchObject({
      code: PokeErrorCodes.TAG_WRITE_FAILURE,
      message: `Failed to update room tag ${BLOCK_TAG}`,
    });
  });
});
