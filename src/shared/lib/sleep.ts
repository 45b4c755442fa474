/**
 * Abortable delay
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Wait for `ms` milliseconds
 *
 * Rejects with an `AbortError` as soon as `signal` is aborted.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/**
 * Whether an error came from an aborted signal
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
