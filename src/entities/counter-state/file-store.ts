/**
 * File-backed key/value store
 *
 * One file per key inside a directory. Writes go to a temporary file that is
 * then renamed over the target, so readers see either the old or the new
 * contents.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { KeyValueStore } from './types';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Create a store that keeps each key in `<directory>/<key>`
 */
export function createFileStore(directory: string): KeyValueStore {
  const resolve = (key: string) => path.join(directory, key);

  return {
    async get(key: string): Promise<string | null> {
      try {
        return await readFile(resolve(key), 'utf-8');
      } catch (error) {
        if (isNotFound(error)) {
          return null;
        }
        throw error;
      }
    },

    async put(key: string, value: string): Promise<void> {
      const target = resolve(key);
      const temporary = `${target}.${process.pid}.tmp`;

      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(temporary, value, 'utf-8');
      await rename(temporary, target);
    },

    async delete(key: string): Promise<void> {
      await rm(resolve(key), { force: true });
    },
  };
}
