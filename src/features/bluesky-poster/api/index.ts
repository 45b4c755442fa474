/**
 * Bluesky API exports
 */
export {
  createBlueskyClient,
  feedEntryToPost,
  DEFAULT_SERVICE,
  MAX_PAGE_SIZE,
  type FeedEntry,
} from './bluesky-client';
