/**
 * Scriptable platform client for tests
 */

import type { Identity, PlatformClient, Post, PostRef } from '../features/bluesky-poster';

export const TEST_IDENTITY: Identity = { did: 'did:plc:counter-test', handle: 'counter.test' };

export interface PublishCall {
  text: string;
  quoted: PostRef;
}

export interface FakePlatform extends PlatformClient {
  /** Posts returned by `fetchRecentPosts`, most recent first */
  posts: Post[];

  readonly authenticateCalls: number;
  readonly fetchCalls: number;
  readonly publishCalls: PublishCall[];

  /** References returned by successful publishes, in order */
  readonly published: PostRef[];

  /** Keep published posts out of the feed, as if not yet indexed */
  indexLag: boolean;

  /** Errors thrown by the next calls to each operation, in order (null lets a call through) */
  failAuthenticate: unknown[];
  failFetch: unknown[];
  failPublish: unknown[];
}

let sequence = 0;

export function postUri(rkey: string): string {
  return `at://${TEST_IDENTITY.did}/app.bsky.feed.post/${rkey}`;
}

/**
 * Build a post by the test account
 */
export function makePost(rkey: string, text: string, quotes?: PostRef): Post {
  return {
    uri: postUri(rkey),
    cid: `cid-${rkey}`,
    text,
    createdAt: new Date(2025, 5, 1, 9, 0),
    ...(quotes && { quotedPost: quotes }),
  };
}

/**
 * Create a fake whose published posts show up at the top of its feed
 */
export function createFakePlatform(initialPosts: Post[] = []): FakePlatform {
  let authenticateCalls = 0;
  let fetchCalls = 0;
  const publishCalls: PublishCall[] = [];
  const published: PostRef[] = [];

  const fake: FakePlatform = {
    posts: [...initialPosts],
    published,
    indexLag: false,
    failAuthenticate: [],
    failFetch: [],
    failPublish: [],

    get authenticateCalls() {
      return authenticateCalls;
    },
    get fetchCalls() {
      return fetchCalls;
    },
    get publishCalls() {
      return publishCalls;
    },

    async authenticate(): Promise<Identity> {
      authenticateCalls++;
      const failure = fake.failAuthenticate.shift();
      if (failure) {
        throw failure;
      }
      return TEST_IDENTITY;
    },

    async fetchRecentPosts(actor: string, pageSize: number): Promise<Post[]> {
      fetchCalls++;
      const failure = fake.failFetch.shift();
      if (failure) {
        throw failure;
      }
      return fake.posts.filter((post) => post.uri.startsWith(`at://${actor}/`)).slice(0, pageSize);
    },

    async publishQuotePost(text: string, quoted: PostRef): Promise<PostRef> {
      publishCalls.push({ text, quoted });
      const failure = fake.failPublish.shift();
      if (failure) {
        throw failure;
      }
      sequence++;
      const post = makePost(`published-${sequence}`, text, quoted);
      if (!fake.indexLag) {
        fake.posts.unshift(post);
      }
      const ref = { uri: post.uri, cid: post.cid };
      published.push(ref);
      return ref;
    },
  };

  return fake;
}
