/**
 * Daily counter run types
 */

import type { StateManager } from '../../../entities/counter-state';
import type { PlatformClient } from '../../bluesky-poster';

/**
 * Static campaign settings
 */
export interface CounterConfig {
  /** Calendar date that announces `minCounter` */
  readonly startDate: Date;

  readonly minCounter: number;
  readonly maxCounter: number;

  /** How long to hold off after a rate limit (ms) */
  readonly cooldownMs: number;

  /** Number of recent posts searched for the anchor */
  readonly pageSize: number;

  /** Text posted on `maxCounter` instead of a numeral */
  readonly finalText: string;

  /** Word appended after each numeral */
  readonly suffix: string;
}

/**
 * Collaborators for a run
 */
export interface DailyCounterDeps {
  config: CounterConfig;
  stateManager: StateManager;
  client: PlatformClient;

  /** Clock (defaults to the system clock) */
  now?: () => Date;

  /** Delay used while waiting out a cooldown */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;

  /** Unattended runs give up on an active cooldown instead of waiting */
  isCi?: boolean;

  /** Aborts a cooldown wait */
  signal?: AbortSignal;
}

/**
 * Statuses that end a run without touching the network
 */
export type PreconditionStatus = 'invalid-state' | 'out-of-schedule' | 'campaign-complete' | 'up-to-date';

/**
 * Statuses for a run that stopped on a failed iteration
 */
export type FailureStatus =
  | 'cooldown-active'
  | 'rate-limited'
  | 'auth-failed'
  | 'platform-error'
  | 'anchor-not-found'
  | 'published-not-persisted';

export type RunStatus = PreconditionStatus | FailureStatus | 'completed';

/**
 * What a run did
 */
export interface RunResult {
  status: RunStatus;

  /** Counter read at the start of the run */
  storedCounter: number;

  /** Counter owed today (0 when not scheduled) */
  expectedCounter: number;

  /** Counter stored at the end of the run */
  finalCounter: number;

  /** Counters published during the run, in order */
  posted: number[];

  /** Counters found already published by an earlier run and saved from its post */
  recovered: number[];

  /** Whether any state file was written or left for the wrapper to commit */
  changesMade: boolean;

  /** Why the run stopped early */
  error?: string;
}
