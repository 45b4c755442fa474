/**
 * Bluesky Poster feature - public API
 *
 * Reads the account's own feed and publishes quote-posts to Bluesky
 */

// API client
export { createBlueskyClient, feedEntryToPost, DEFAULT_SERVICE, MAX_PAGE_SIZE, type FeedEntry } from './api';

// Types and errors
export type { BlueskyCredentials, Identity, PlatformClient, Post, PostRef } from './model';
export { AuthError, PlatformError, RateLimitedError, isRateLimitError, toPlatformError } from './model';

// Formatting and anchor lookup
export {
  renderPostText,
  findAnchorPost,
  findPublishedPost,
  getPostUrl,
  describePost,
  type RenderOptions,
  type AnchorSearch,
} from './lib';
