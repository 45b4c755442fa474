/**
 * Bluesky API client
 *
 * Handles authentication, reading the account's own feed and publishing
 * quote-posts
 */

import { AppBskyEmbedRecord, AppBskyEmbedRecordWithMedia, BskyAgent, RichText } from '@atproto/api';
import type { BlueskyCredentials, Identity, PlatformClient, Post, PostRef } from '../model';
import { AuthError, RateLimitedError, isRateLimitError, statusOf, toPlatformError } from '../model';

/** Default PDS entryway */
export const DEFAULT_SERVICE = 'https://bsky.social';

/** Largest page the author feed endpoint accepts */
export const MAX_PAGE_SIZE = 100;

/**
 * The parts of an author feed entry we read
 */
export interface FeedEntry {
  post: {
    uri: string;
    cid: string;
    author: { did: string };
    record: unknown;
    indexedAt: string;
  };

  /** Set when the entry is a repost or pin rather than an authored post */
  reason?: unknown;
}

/**
 * Pull the quoted post reference out of a post record's embed
 */
function quotedPostOf(embed: unknown): PostRef | undefined {
  if (AppBskyEmbedRecord.isMain(embed)) {
    return { uri: embed.record.uri, cid: embed.record.cid };
  }
  if (AppBskyEmbedRecordWithMedia.isMain(embed)) {
    return { uri: embed.record.record.uri, cid: embed.record.record.cid };
  }
  return undefined;
}

/**
 * Convert an author feed entry into a Post
 *
 * Returns null for reposts and for posts by anyone other than `actor`.
 */
export function feedEntryToPost(entry: FeedEntry, actor: string): Post | null {
  if (entry.reason || entry.post.author.did !== actor) {
    return null;
  }

  const record = entry.post.record;
  let text = '';
  let createdAt = entry.post.indexedAt;
  let embed: unknown;

  if (typeof record === 'object' && record !== null) {
    if ('text' in record && typeof record.text === 'string') {
      text = record.text;
    }
    if ('createdAt' in record && typeof record.createdAt === 'string') {
      createdAt = record.createdAt;
    }
    if ('embed' in record) {
      embed = record.embed;
    }
  }

  const quotedPost = quotedPostOf(embed);

  // Record timestamps are client-supplied; fall back to the index time
  let created = new Date(createdAt);
  if (Number.isNaN(created.getTime())) {
    created = new Date(entry.post.indexedAt);
  }

  return {
    uri: entry.post.uri,
    cid: entry.post.cid,
    text,
    createdAt: created,
    ...(quotedPost && { quotedPost }),
  };
}

/**
 * Create a Bluesky API client
 *
 * Nothing touches the network until `authenticate()` is called.
 *
 * @param credentials - Bluesky login credentials
 * @param service - PDS URL to log in against
 */
export function createBlueskyClient(
  credentials: BlueskyCredentials,
  service: string = DEFAULT_SERVICE
): PlatformClient {
  const agent = new BskyAgent({ service });

  return {
    /**
     * Log in to Bluesky with the app password
     */
    async authenticate(): Promise<Identity> {
      try {
        const response = await agent.login({
          identifier: credentials.identifier,
          password: credentials.password,
        });

        const identity = { did: response.data.did, handle: response.data.handle };
        console.log(`Authenticated as @${identity.handle} (${identity.did})`);
        return identity;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        if (isRateLimitError(error)) {
          throw new RateLimitedError(`Rate limited while logging in: ${detail}`, { cause: error });
        }
        throw new AuthError(`Failed to log in as ${credentials.identifier}: ${detail}`, statusOf(error), {
          cause: error,
        });
      }
    },

    /**
     * Fetch the account's own recent posts, most recent first
     */
    async fetchRecentPosts(actor: string, pageSize: number): Promise<Post[]> {
      const limit = Math.min(Math.max(pageSize, 1), MAX_PAGE_SIZE);
      console.log(`Fetching up to ${limit} recent posts...`);

      try {
        const response = await agent.getAuthorFeed({
          actor,
          limit,
          filter: 'posts_no_replies',
        });

        const posts = response.data.feed
          .map((entry) => feedEntryToPost(entry, actor))
          .filter((post): post is Post => post !== null);

        console.log(`Got ${posts.length} posts (${response.data.feed.length} feed entries)`);
        return posts;
      } catch (error) {
        throw toPlatformError(error, 'fetching recent posts');
      }
    },

    /**
     * Post text quoting another post
     */
    async publishQuotePost(text: string, quoted: PostRef): Promise<PostRef> {
      try {
        // Create rich text to detect mentions, links, etc.
        const rt = new RichText({ text });
        await rt.detectFacets(agent);

        const response = await agent.post({
          text: rt.text,
          facets: rt.facets,
          embed: {
            $type: 'app.bsky.embed.record',
            record: {
              uri: quoted.uri,
              cid: quoted.cid,
            },
          },
        });

        return { uri: response.uri, cid: response.cid };
      } catch (error) {
        throw toPlatformError(error, 'publishing quote post');
      }
    },
  };
}
