/**
 * Post formatting utilities
 *
 * Renders counter posts and finds the post the next one should quote
 */

import { AtUri } from '@atproto/api';
import { convertToPersianWord } from '../../../entities/numeral';
import { formatTimestamp, truncateText } from '../../../shared/lib';
import type { Post } from '../model';

/** Characters of post text shown in log listings */
const MAX_PREVIEW_LENGTH = 100;

export interface RenderOptions {
  /** The campaign's last counter, announced with `finalText` */
  maxCounter: number;

  /** Text posted on the last day instead of a numeral */
  finalText: string;

  /** Word appended after the numeral, separated by a space (empty for none) */
  suffix: string;
}

export interface AnchorSearch extends RenderOptions {
  /** Counter announced by the post we are looking for */
  previousCounter: number;

  /** First counter of the campaign; its successor may quote any quote-post */
  minCounter: number;

  /** URI of the previous post, when it was recorded */
  lastPostUri?: string;
}

/**
 * Text for the post announcing `counter`
 */
export function renderPostText(counter: number, options: RenderOptions): string {
  if (counter === options.maxCounter) {
    return options.finalText;
  }

  const word = convertToPersianWord(counter);
  const suffix = options.suffix.trim();
  return suffix ? `${word} ${suffix}` : word;
}

function isQuotePost(post: Post): boolean {
  return post.quotedPost !== undefined;
}

/**
 * Find the post announcing the previous counter
 *
 * Looks the recorded URI up first. Without one (or when it has dropped out
 * of the window) falls back to matching the rendered text of the previous
 * counter against quote-posts, most recent first.
 */
export function findAnchorPost(posts: Post[], search: AnchorSearch): Post | null {
  if (search.lastPostUri) {
    const recorded = posts.find((post) => post.uri === search.lastPostUri);
    if (recorded) {
      return recorded;
    }
    console.warn(`Recorded post ${search.lastPostUri} not in recent posts, matching by text`);
  }

  const quotePosts = posts.filter(isQuotePost);

  if (search.previousCounter === search.minCounter) {
    return quotePosts[0] ?? null;
  }

  const expectedText = renderPostText(search.previousCounter, search);
  return quotePosts.find((post) => post.text.trim() === expectedText) ?? null;
}

/**
 * Find a quote-post that already announces `counter`
 *
 * A hit means an earlier run published but never saved its state.
 */
export function findPublishedPost(posts: Post[], counter: number, options: RenderOptions): Post | null {
  const text = renderPostText(counter, options);
  return posts.find((post) => isQuotePost(post) && post.text.trim() === text) ?? null;
}

/**
 * Web URL for a post
 */
export function getPostUrl(handle: string, uri: string): string {
  return `https://bsky.app/profile/${handle}/post/${new AtUri(uri).rkey}`;
}

/**
 * One-line summary of a post for log listings
 */
export function describePost(post: Post, index: number, handle: string): string {
  const kind = isQuotePost(post) ? '📝 Quote post' : '📄 Post';
  const preview = truncateText(post.text, MAX_PREVIEW_LENGTH).replace(/\n/g, ' ');
  const position = String(index).padStart(2, ' ');
  return `${position}. ${kind} | ${formatTimestamp(post.createdAt)} | ${getPostUrl(handle, post.uri)}\n    ${preview}`;
}
