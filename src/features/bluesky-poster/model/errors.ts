/**
 * Errors raised by the Bluesky client
 */

/** HTTP status Bluesky answers with when rate limiting */
const TOO_MANY_REQUESTS = 429;

/**
 * Non-rate-limit failure talking to the platform
 */
export class PlatformError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PlatformError';
  }
}

/**
 * The platform asked us to slow down
 */
export class RateLimitedError extends PlatformError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, TOO_MANY_REQUESTS, options);
    this.name = 'RateLimitedError';
  }
}

/**
 * Login failed
 */
export class AuthError extends PlatformError {
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'AuthError';
  }
}

/**
 * Read a numeric HTTP status off an unknown error, if it has one
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Check if an error is the platform rate limiting us
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitedError || statusOf(error) === TOO_MANY_REQUESTS) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return message.includes('rate limit') || message.includes('ratelimit');
}

/**
 * Wrap an unknown failure in the matching platform error
 */
export function toPlatformError(error: unknown, action: string): PlatformError {
  if (error instanceof PlatformError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);

  if (isRateLimitError(error)) {
    return new RateLimitedError(`Rate limited while ${action}: ${detail}`, { cause: error });
  }

  return new PlatformError(`Failed ${action}: ${detail}`, statusOf(error), { cause: error });
}
