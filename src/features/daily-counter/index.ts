/**
 * Daily Counter feature - public API
 *
 * Posts every counter value owed since the last run, quoting the previous post
 */

// Types
export type {
  CounterConfig,
  DailyCounterDeps,
  FailureStatus,
  PreconditionStatus,
  RunResult,
  RunStatus,
} from './model';

// Orchestration
export { runDailyCounter, exitCodeFor, EXIT_OK, EXIT_FATAL, EXIT_NEEDS_RECONCILE } from './lib';
