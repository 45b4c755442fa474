/**
 * Bluesky poster model exports
 */
export type { BlueskyCredentials, Identity, PlatformClient, Post, PostRef } from './types';

export {
  AuthError,
  PlatformError,
  RateLimitedError,
  isRateLimitError,
  statusOf,
  toPlatformError,
} from './errors';
