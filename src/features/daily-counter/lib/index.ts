/**
 * Daily counter logic exports
 */
export { runDailyCounter } from './orchestrator';
export { exitCodeFor, EXIT_OK, EXIT_FATAL, EXIT_NEEDS_RECONCILE } from './exit-code';
