/**
 * Shared library utilities
 */
export { sleep, isAbortError } from './sleep';
export { formatDuration, formatTimestamp, truncateText } from './format';
