import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as Sentry from '@sentry/node';
import { createStateManager } from '../entities/counter-state';
import type { CounterConfig } from '../features/daily-counter';
import { createMemoryStore, type MemoryStore } from '../test-utils/memory-store';
import { createFakePlatform, makePost, postUri } from '../test-utils/fake-platform';
import {
  clearCooldownCommand,
  convertCommand,
  runCommand,
  setCounterCommand,
  statusCommand,
  type CommandContext,
} from './commands';

vi.mock('@sentry/node', () => ({
  captureMessage: vi.fn(),
}));

const CONFIG: CounterConfig = {
  startDate: new Date(2025, 2, 18),
  minCounter: 1,
  maxCounter: 1000,
  cooldownMs: 16 * 60_000,
  pageSize: 50,
  finalText: 'هزارتو',
  suffix: 'تو',
};

/** 2025-03-20 carries counter 3 */
const TODAY = new Date(2025, 2, 20, 12, 0);

let logs: string[];
let errors: string[];

/** Command output without the state manager's own log lines */
function output(): string[] {
  return logs.filter((line) => !line.startsWith('State:'));
}

function contextWith(store: MemoryStore): CommandContext {
  return { config: CONFIG, stateManager: createStateManager(store, CONFIG), now: () => TODAY };
}

beforeEach(() => {
  logs = [];
  errors = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    logs.push(args.join(' '));
  });
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    errors.push(args.join(' '));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.mocked(Sentry.captureMessage).mockClear();
});

describe('runCommand', () => {
  it('posts what is owed and exits 0', async () => {
    const store = createMemoryStore({ 'counter.txt': '2\n' });
    const origin = { uri: 'at://did:plc:someone/app.bsky.feed.post/origin', cid: 'cid-origin' };
    const platform = createFakePlatform([makePost('two', 'دو تو', origin)]);

    const code = await runCommand({ ...contextWith(store), client: platform, isCi: true });

    expect(code).toBe(0);
    expect(store.values.get('counter.txt')).toBe(`3\n${platform.posts[0].uri}\n`);
    expect(platform.publishCalls.map((call) => call.text)).toEqual(['سه تو']);
    expect(logs).toContain('State changed during this run');
    expect(Sentry.captureMessage).not.toHaveBeenCalled();
  });

  it('reports a failed run to Sentry and returns its exit code', async () => {
    const store = createMemoryStore({ 'counter.txt': 'garbage\n' });
    const platform = createFakePlatform();

    const code = await runCommand({ ...contextWith(store), client: platform, isCi: true });

    expect(code).toBe(1);
    expect(platform.authenticateCalls).toBe(0);
    expect(logs).toContain('No state changes');
    expect(Sentry.captureMessage).toHaveBeenCalledWith(
      'Daily counter run failed: invalid-state',
      expect.objectContaining({ level: 'error', tags: { status: 'invalid-state', counter: '1' } })
    );
  });

  it('reports a recoverable stop as a warning', async () => {
    const store = createMemoryStore({ 'counter.txt': '2\n' });
    const platform = createFakePlatform([]);

    const code = await runCommand({ ...contextWith(store), client: platform, isCi: true });

    expect(code).toBe(0);
    expect(Sentry.captureMessage).toHaveBeenCalledWith(
      'Daily counter run stopped early: anchor-not-found',
      expect.objectContaining({ level: 'warning', tags: { status: 'anchor-not-found', counter: '3' } })
    );
  });
});

describe('statusCommand', () => {
  it('prints stored state, schedule and lag', async () => {
    const store = createMemoryStore({ 'counter.txt': `1\n${postUri('one')}\n` });

    expect(await statusCommand(contextWith(store))).toBe(0);

    expect(output()).toEqual([
      '🔢 Stored counter: 1',
      `🔗 Last post: ${postUri('one')}`,
      '📅 Expected counter: 3',
      '⏳ Lag: 2 day(s)',
      '✓ No rate limit cooldown',
    ]);
  });

  it('shows an active cooldown and a corrupt counter', async () => {
    const observedAt = new Date(TODAY.getTime() - 6 * 60_000);
    const store = createMemoryStore({
      'counter.txt': 'abc\n',
      'rate_limit_failure.txt': observedAt.toISOString(),
    });

    await statusCommand(contextWith(store));

    expect(output()).toEqual([
      '🔢 Stored counter: invalid',
      '🔗 Last post: not recorded',
      '📅 Expected counter: 3',
      '🚫 Rate limit cooldown active for 10m 0s',
    ]);
  });
});

describe('convertCommand', () => {
  it('prints each word', () => {
    expect(convertCommand(['3', '21'])).toBe(0);
    expect(logs).toEqual(['3: سه', '21: بیست و یک']);
  });

  it('fails on input it cannot convert', () => {
    expect(convertCommand(['abc', '5'])).toBe(1);
    expect(logs).toEqual(['abc: not an integer', '5: پنج']);
  });

  it('fails without arguments', () => {
    expect(convertCommand([])).toBe(1);
    expect(errors).toEqual(['✗ Usage: convert <number...>']);
  });
});

describe('clearCooldownCommand', () => {
  it('removes the cooldown marker', async () => {
    const store = createMemoryStore({ 'rate_limit_failure.txt': TODAY.toISOString() });

    expect(await clearCooldownCommand(contextWith(store))).toBe(0);
    expect(store.values.has('rate_limit_failure.txt')).toBe(false);
  });
});

describe('setCounterCommand', () => {
  it('writes the counter and post URI', async () => {
    const store = createMemoryStore();

    expect(await setCounterCommand(contextWith(store), ['7', postUri('seven')])).toBe(0);
    expect(store.values.get('counter.txt')).toBe(`7\n${postUri('seven')}\n`);
  });

  it('writes the counter alone', async () => {
    const store = createMemoryStore();

    await setCounterCommand(contextWith(store), ['7']);
    expect(store.values.get('counter.txt')).toBe('7\n');
  });

  it.each<[string[]]>([[[]], [['0']], [['1001']], [['seven']]])('rejects %j', async (args) => {
    const store = createMemoryStore();

    expect(await setCounterCommand(contextWith(store), args)).toBe(1);
    expect(store.writes).toEqual([]);
  });

  it('rejects a URI that is not a post URI', async () => {
    const store = createMemoryStore();

    expect(await setCounterCommand(contextWith(store), ['7', 'https://bsky.app/x'])).toBe(1);
    expect(store.writes).toEqual([]);
  });
});
