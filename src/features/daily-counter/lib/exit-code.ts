/**
 * Process exit codes for a finished run
 *
 * The wrapping scheduler only needs to know whether a human has to step in.
 * Rate limits and missing anchors resolve on a later run (or after a manual
 * post), so they still exit cleanly.
 */

import type { RunResult, RunStatus } from '../model';

export const EXIT_OK = 0;

/** Bad state, bad schedule or bad credentials */
export const EXIT_FATAL = 1;

/** A post went out but the counter file was not updated */
export const EXIT_NEEDS_RECONCILE = 2;

const EXIT_CODES: Record<RunStatus, number> = {
  'up-to-date': EXIT_OK,
  'campaign-complete': EXIT_OK,
  completed: EXIT_OK,
  'cooldown-active': EXIT_OK,
  'rate-limited': EXIT_OK,
  'platform-error': EXIT_OK,
  'anchor-not-found': EXIT_OK,
  'invalid-state': EXIT_FATAL,
  'out-of-schedule': EXIT_FATAL,
  'auth-failed': EXIT_FATAL,
  'published-not-persisted': EXIT_NEEDS_RECONCILE,
};

export function exitCodeFor(result: Pick<RunResult, 'status'>): number {
  return EXIT_CODES[result.status];
}
