/**
 * Bluesky posting types
 */

/**
 * Strong reference to a post
 */
export interface PostRef {
  /** AT-URI of the post */
  uri: string;

  /** Content hash of the post record */
  cid: string;
}

/**
 * A post from the authenticated account's own feed
 */
export interface Post extends PostRef {
  /** Post text */
  text: string;

  /** When the post was created */
  createdAt: Date;

  /** The post this one quotes (only set for quote-posts) */
  quotedPost?: PostRef;
}

/**
 * The account the bot posts as
 */
export interface Identity {
  /** Decentralized identifier (e.g., did:plc:...) */
  did: string;

  /** Handle (e.g., your-handle.bsky.social) */
  handle: string;
}

/**
 * Credentials for Bluesky authentication
 */
export interface BlueskyCredentials {
  /** Bluesky handle (e.g., your-handle.bsky.social) */
  identifier: string;

  /** App password (not main password) */
  password: string;
}

/**
 * Operations the posting loop needs from the platform
 */
export interface PlatformClient {
  /** Log in and return the posting account */
  authenticate(): Promise<Identity>;

  /** The account's own recent posts, most recent first */
  fetchRecentPosts(actor: string, pageSize: number): Promise<Post[]>;

  /** Publish `text` quoting `quoted`, returning the new post */
  publishQuotePost(text: string, quoted: PostRef): Promise<PostRef>;
}
