/**
 * In-memory key/value store for tests
 */

import type { KeyValueStore } from '../entities/counter-state';

export interface MemoryStore extends KeyValueStore {
  /** Current contents, keyed like the real files */
  readonly values: Map<string, string>;

  /** Keys passed to `put`, in call order */
  readonly writes: string[];

  /** Make every `put` for `key` reject */
  failWritesTo(key: string): void;
}

export function createMemoryStore(initial: Record<string, string> = {}): MemoryStore {
  const values = new Map(Object.entries(initial));
  const writes: string[] = [];
  const failing = new Set<string>();

  return {
    values,
    writes,

    failWritesTo(key: string): void {
      failing.add(key);
    },

    async get(key: string): Promise<string | null> {
      return values.get(key) ?? null;
    },

    async put(key: string, value: string): Promise<void> {
      writes.push(key);
      if (failing.has(key)) {
        throw new Error(`EACCES: permission denied, open '${key}'`);
      }
      values.set(key, value);
    },

    async delete(key: string): Promise<void> {
      values.delete(key);
    },
  };
}
