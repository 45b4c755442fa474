import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createStateManager, parseState, serializeState } from './state-manager';
import { createMemoryStore } from '../../test-utils/memory-store';

const BOUNDS = { minCounter: 1, maxCounter: 1000 };

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('parseState', () => {
  it('reads a bare counter', () => {
    expect(parseState('42', BOUNDS)).toEqual({ counter: 42 });
  });

  it('reads the last post URI from the second line', () => {
    expect(parseState('42\nat://did:plc:test/app.bsky.feed.post/abc\n', BOUNDS)).toEqual({
      counter: 42,
      lastPostUri: 'at://did:plc:test/app.bsky.feed.post/abc',
    });
  });

  it('maps garbage to the invalid sentinel', () => {
    expect(parseState('forty-two', BOUNDS)).toEqual({ counter: 0 });
    expect(parseState('', BOUNDS)).toEqual({ counter: 0 });
    expect(parseState('-3', BOUNDS)).toEqual({ counter: 0 });
  });

  it('maps out-of-bounds counters to the invalid sentinel', () => {
    expect(parseState('0', BOUNDS)).toEqual({ counter: 0 });
    expect(parseState('1001', BOUNDS)).toEqual({ counter: 0 });
  });
});

describe('serializeState', () => {
  it('writes one line per field', () => {
    expect(serializeState({ counter: 7 })).toBe('7\n');
    expect(serializeState({ counter: 7, lastPostUri: 'at://x/app.bsky.feed.post/1' })).toBe(
      '7\nat://x/app.bsky.feed.post/1\n'
    );
  });
});

describe('createStateManager', () => {
  it('starts from the minimum counter when nothing is stored', async () => {
    const manager = createStateManager(createMemoryStore(), BOUNDS);
    expect(await manager.readState()).toEqual({ counter: 1 });
  });

  it('round-trips state through the store', async () => {
    const store = createMemoryStore();
    const manager = createStateManager(store, BOUNDS);

    await manager.writeState({ counter: 99, lastPostUri: 'at://x/app.bsky.feed.post/99' });

    expect(store.values.get('counter.txt')).toBe('99\nat://x/app.bsky.feed.post/99\n');
    expect(await manager.readState()).toEqual({
      counter: 99,
      lastPostUri: 'at://x/app.bsky.feed.post/99',
    });
  });

  it('honours custom keys', async () => {
    const store = createMemoryStore({ 'state/day.txt': '12' });
    const manager = createStateManager(store, { ...BOUNDS, counterKey: 'state/day.txt' });
    expect(await manager.readState()).toEqual({ counter: 12 });
  });

  it('returns the sentinel when the store cannot be read', async () => {
    const store = createMemoryStore();
    store.get = async () => {
      throw new Error('EIO');
    };
    const manager = createStateManager(store, BOUNDS);
    expect(await manager.readState()).toEqual({ counter: 0 });
  });

  it('propagates write failures', async () => {
    const store = createMemoryStore();
    store.failWritesTo('counter.txt');
    const manager = createStateManager(store, BOUNDS);

    await expect(manager.writeState({ counter: 2 })).rejects.toThrow('EACCES');
  });

  it('stores, reads and clears the cooldown marker', async () => {
    const store = createMemoryStore();
    const manager = createStateManager(store, BOUNDS);
    const observedAt = new Date('2025-06-01T10:00:00.000Z');

    expect(await manager.readCooldown()).toBeNull();
    expect(await manager.hasCooldown()).toBe(false);

    await manager.writeCooldown({ observedAt });
    expect(store.values.get('rate_limit_failure.txt')).toBe('2025-06-01T10:00:00.000Z');
    expect(await manager.readCooldown()).toEqual({ observedAt });
    expect(await manager.hasCooldown()).toBe(true);

    await manager.clearCooldown();
    expect(await manager.readCooldown()).toBeNull();
  });

  it('reports no cooldown when the marker cannot be read', async () => {
    const store = createMemoryStore({ 'rate_limit_failure.txt': '2025-06-01T10:00:00.000Z' });
    store.get = async (key) => {
      throw new Error(`EACCES: permission denied, open '${key}'`);
    };
    const manager = createStateManager(store, BOUNDS);

    expect(await manager.readCooldown()).toBeNull();
    expect(await manager.hasCooldown()).toBe(false);
  });

  it('ignores an unreadable cooldown marker', async () => {
    const manager = createStateManager(createMemoryStore({ 'rate_limit_failure.txt': 'soon' }), BOUNDS);
    expect(await manager.readCooldown()).toBeNull();
  });
});
