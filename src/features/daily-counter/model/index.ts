/**
 * Daily counter model exports
 */
export type {
  CounterConfig,
  DailyCounterDeps,
  FailureStatus,
  PreconditionStatus,
  RunResult,
  RunStatus,
} from './types';
