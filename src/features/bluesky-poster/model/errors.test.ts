import { describe, it, expect } from 'vitest';
import {
  AuthError,
  PlatformError,
  RateLimitedError,
  isRateLimitError,
  statusOf,
  toPlatformError,
} from './errors';

class FakeXrpcError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
  }
}

describe('isRateLimitError', () => {
  it('recognises HTTP 429', () => {
    expect(isRateLimitError(new FakeXrpcError(429, 'Too Many Requests'))).toBe(true);
  });

  it('recognises rate limit wording', () => {
    expect(isRateLimitError(new Error('Rate Limit Exceeded'))).toBe(true);
  });

  it('rejects other failures', () => {
    expect(isRateLimitError(new FakeXrpcError(500, 'Internal Server Error'))).toBe(false);
    expect(isRateLimitError('boom')).toBe(false);
  });
});

describe('statusOf', () => {
  it('reads numeric statuses only', () => {
    expect(statusOf(new FakeXrpcError(502, 'Bad Gateway'))).toBe(502);
    expect(statusOf({ status: '502' })).toBeUndefined();
    expect(statusOf(null)).toBeUndefined();
  });
});

describe('toPlatformError', () => {
  it('classifies rate limits', () => {
    const error = toPlatformError(new FakeXrpcError(429, 'slow down'), 'publishing quote post');
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error.status).toBe(429);
    expect(error.message).toBe('Rate limited while publishing quote post: slow down');
  });

  it('wraps other errors with their status and cause', () => {
    const cause = new FakeXrpcError(400, 'InvalidRequest');
    const error = toPlatformError(cause, 'fetching recent posts');
    expect(error).not.toBeInstanceOf(RateLimitedError);
    expect(error.status).toBe(400);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Failed fetching recent posts: InvalidRequest');
  });

  it('passes platform errors through', () => {
    const original = new AuthError('bad password', 401);
    expect(toPlatformError(original, 'logging in')).toBe(original);
    expect(original).toBeInstanceOf(PlatformError);
  });
});
