/**
 * Counter state types for file storage
 */

/**
 * Stored progress of the campaign
 */
export interface PersistedState {
  /** Last counter value that was announced (0 means invalid) */
  counter: number;

  /** AT-URI of the post that announced `counter`, when known */
  lastPostUri?: string;
}

/**
 * Written when the platform reports rate limiting
 */
export interface CooldownMarker {
  /** When the rate limit was hit */
  observedAt: Date;
}

/**
 * Sentinel counter for missing bounds or unreadable state
 */
export const INVALID_COUNTER = 0;

/**
 * Minimal key/value storage, each value replaced as a whole
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}
