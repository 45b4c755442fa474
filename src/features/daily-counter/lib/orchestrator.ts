/**
 * Daily counter orchestration
 *
 * Pays off the counter increments owed since the last successful run, one
 * post per increment. Each post quotes the previous one. State advances only
 * after a confirmed publish, and the first failed iteration ends the run so
 * no day is ever skipped.
 */

import { INVALID_COUNTER, type PersistedState } from '../../../entities/counter-state';
import { formatDuration, sleep } from '../../../shared/lib';
import { NOT_SCHEDULED, expectedCounterFor, isCiEnvironment } from '../../counter-schedule';
import {
  PlatformError,
  RateLimitedError,
  describePost,
  findAnchorPost,
  findPublishedPost,
  getPostUrl,
  renderPostText,
  type Identity,
  type Post,
  type PostRef,
} from '../../bluesky-poster';
import type { DailyCounterDeps, FailureStatus, RunResult } from '../model';

type IterationOutcome =
  | { kind: 'posted'; post: PostRef }
  | { kind: 'recovered'; post: PostRef }
  | { kind: 'failed'; status: FailureStatus; error: string };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one pass of the daily counter
 */
export async function runDailyCounter(deps: DailyCounterDeps): Promise<RunResult> {
  const { config, stateManager, client, signal } = deps;
  const now = deps.now ?? (() => new Date());
  const wait = deps.sleep ?? sleep;
  const isCi = deps.isCi ?? isCiEnvironment();

  const stored = await stateManager.readState();
  const expectedCounter = expectedCounterFor(
    now(),
    config.startDate,
    config.minCounter,
    config.maxCounter
  );

  console.log(`🕒 Current time: ${now().toISOString()}`);
  console.log(`🔢 Stored counter value: ${stored.counter}`);
  console.log(`🔢 Expected counter value: ${expectedCounter}`);

  const result: RunResult = {
    status: 'up-to-date',
    storedCounter: stored.counter,
    expectedCounter,
    finalCounter: stored.counter,
    posted: [],
    recovered: [],
    changesMade: false,
  };

  if (stored.counter === INVALID_COUNTER) {
    console.error('✗ Stored counter is invalid. Fix the counter file before running again.');
    return { ...result, status: 'invalid-state', error: 'Stored counter is missing or corrupt' };
  }

  if (expectedCounter === NOT_SCHEDULED) {
    if (stored.counter === config.maxCounter) {
      console.log('✓ Campaign complete. Nothing left to post.');
      return { ...result, status: 'campaign-complete' };
    }
    console.error(
      `✗ Today is outside the schedule (counters ${config.minCounter}-${config.maxCounter})`
    );
    return { ...result, status: 'out-of-schedule', error: 'Today is outside the counter schedule' };
  }

  if (stored.counter >= expectedCounter) {
    if (stored.counter > expectedCounter) {
      console.warn(`Stored counter ${stored.counter} is ahead of the schedule (${expectedCounter})`);
    }
    console.log('✓ No post needed today. Stored counter is up to date.');
    return result;
  }

  const lag = expectedCounter - stored.counter;
  console.log(`⚠️  Stored counter is behind by ${lag} day(s). Proceeding to post...`);

  let current: PersistedState = stored;
  let identity: Identity | null = null;

  // Post saved by the previous iteration; the feed may not list it yet
  let previous: PostRef | null = null;

  /**
   * Record a rate limit so later iterations and runs hold off
   */
  async function recordRateLimit(error: RateLimitedError): Promise<IterationOutcome> {
    const observedAt = now();
    console.error(`🚫 ${error.message}`);
    console.log(`⏰ Rate limit will reset at: ${new Date(observedAt.getTime() + config.cooldownMs).toISOString()}`);

    try {
      await stateManager.writeCooldown({ observedAt });
    } catch (writeError) {
      console.error('Failed to save rate limit marker:', writeError);
    }

    return { kind: 'failed', status: 'rate-limited', error: error.message };
  }

  function platformFailure(error: unknown): IterationOutcome | null {
    if (error instanceof PlatformError) {
      console.error(`✗ Platform error (not rate limiting): ${error.message}`);
      return { kind: 'failed', status: 'platform-error', error: error.message };
    }
    return null;
  }

  /**
   * Wait out (or give up on) an active cooldown
   *
   * @returns true when clear to post
   */
  async function awaitCooldown(): Promise<boolean> {
    for (;;) {
      const marker = await stateManager.readCooldown();
      if (!marker) {
        return true;
      }

      let resetAt = marker.observedAt.getTime() + config.cooldownMs;

      if (marker.observedAt.getTime() > now().getTime()) {
        const observedAt = now();
        console.warn(
          `⚠️  Rate limit marker is dated in the future (${marker.observedAt.toISOString()}), restarting the cooldown from now`
        );
        resetAt = observedAt.getTime() + config.cooldownMs;
        try {
          await stateManager.writeCooldown({ observedAt });
        } catch (writeError) {
          console.error('Failed to save rate limit marker:', writeError);
        }
      }

      // Never wait longer than one cooldown per pass
      const remaining = Math.min(resetAt - now().getTime(), config.cooldownMs);

      if (remaining <= 0) {
        await stateManager.clearCooldown();
        console.log('✓ Rate limit period has expired. Safe to proceed.');
        return true;
      }

      console.warn(`⚠️  Rate limit active! Please wait ${formatDuration(remaining)}`);
      console.log(`⏰ Reset time: ${new Date(resetAt).toISOString()}`);

      if (isCi) {
        console.error('✗ Rate limit active. Exiting in CI to allow a scheduled retry.');
        return false;
      }

      console.log(`⏳ Waiting ${formatDuration(remaining)} for the rate limit to reset...`);
      await wait(remaining, signal);
      console.log('🔄 Checking rate limit status again...');
    }
  }

  /**
   * Publish (or recover) the post for `counter`
   */
  async function postCounter(counter: number): Promise<IterationOutcome> {
    if (!(await awaitCooldown())) {
      return { kind: 'failed', status: 'cooldown-active', error: 'Rate limit cooldown is still active' };
    }

    // One login per run; later iterations reuse the session
    let account: Identity;
    try {
      account = identity ?? (await client.authenticate());
    } catch (error) {
      if (error instanceof RateLimitedError) {
        return recordRateLimit(error);
      }
      console.error('✗ Failed to authenticate:', error);
      return { kind: 'failed', status: 'auth-failed', error: describeError(error) };
    }
    identity = account;

    let posts: Post[];
    try {
      posts = await client.fetchRecentPosts(account.did, config.pageSize);
    } catch (error) {
      if (error instanceof RateLimitedError) {
        return recordRateLimit(error);
      }
      const failure = platformFailure(error);
      if (failure) {
        return failure;
      }
      throw error;
    }

    console.log(`📋 Found ${posts.length} posts:`);
    posts.forEach((post, index) => console.log(describePost(post, index + 1, account.handle)));

    const already = findPublishedPost(posts, counter, config);
    if (already) {
      console.warn(
        `Counter ${counter} was already posted (${getPostUrl(account.handle, already.uri)}), saving state only`
      );
      return persist(counter, already, 'recovered');
    }

    const anchor: PostRef | null =
      previous ??
      findAnchorPost(posts, {
        ...config,
        previousCounter: current.counter,
        lastPostUri: current.lastPostUri,
      });

    if (!anchor) {
      console.error(`✗ No post for counter ${current.counter} found to quote. Skipping.`);
      return {
        kind: 'failed',
        status: 'anchor-not-found',
        error: `No post announcing counter ${current.counter} in the last ${posts.length} posts`,
      };
    }

    console.log(`🎯 Quoting: ${getPostUrl(account.handle, anchor.uri)}`);

    const text = renderPostText(counter, config);
    console.log(`📝 Posting quote post with text:\n${text}`);

    let published: PostRef;
    try {
      published = await client.publishQuotePost(text, { uri: anchor.uri, cid: anchor.cid });
    } catch (error) {
      if (error instanceof RateLimitedError) {
        return recordRateLimit(error);
      }
      const failure = platformFailure(error);
      if (failure) {
        return failure;
      }
      throw error;
    }

    console.log(`✓ Quote post published! ${getPostUrl(account.handle, published.uri)}`);
    return persist(counter, published, 'posted');
  }

  /**
   * Save the new counter, never republishing if that fails
   */
  async function persist(
    counter: number,
    post: PostRef,
    kind: 'posted' | 'recovered'
  ): Promise<IterationOutcome> {
    try {
      await stateManager.writeState({ counter, lastPostUri: post.uri });
      return { kind, post };
    } catch (error) {
      console.error(`⚠️  Post for ${counter} is live, but saving the counter failed:`, error);
      console.error(`🔧 Set the stored counter to ${counter} by hand (set-counter ${counter})`);
      if (kind === 'posted') {
        result.posted.push(counter);
      }
      return {
        kind: 'failed',
        status: 'published-not-persisted',
        error: `Counter ${counter} was posted but not saved: ${describeError(error)}`,
      };
    }
  }

  for (let i = 0; i < lag; i++) {
    const counter = current.counter + 1;
    console.log(`\n--- Processing counter value: ${counter} ---`);

    const outcome = await postCounter(counter);

    if (outcome.kind === 'failed') {
      console.error(`✗ Failed to post counter ${counter}`);
      const cooldownLeft = await stateManager.hasCooldown();
      return {
        ...result,
        status: outcome.status,
        finalCounter: current.counter,
        changesMade: result.changesMade || cooldownLeft,
        error: outcome.error,
      };
    }

    current = { counter, lastPostUri: outcome.post.uri };
    previous = { uri: outcome.post.uri, cid: outcome.post.cid };
    result.changesMade = true;
    result[outcome.kind].push(counter);
    console.log(`✓ Counter ${counter} done`);
  }

  return { ...result, status: 'completed', finalCounter: current.counter };
}
