/**
 * State manager for the counter and the rate-limit cooldown
 *
 * Reads fail soft: a missing counter means a fresh campaign, unreadable
 * contents map to the invalid sentinel. Writes fail hard so the caller can
 * tell "posted and saved" from "posted but not saved".
 */

import { CooldownMarker, INVALID_COUNTER, KeyValueStore, PersistedState } from './types';

/** Default key for the counter file */
export const DEFAULT_COUNTER_KEY = 'counter.txt';

/** Default key for the cooldown marker file */
export const DEFAULT_COOLDOWN_KEY = 'rate_limit_failure.txt';

export interface StateManagerOptions {
  /** Lowest valid counter, also the value assumed when no state exists */
  minCounter: number;

  /** Highest valid counter */
  maxCounter: number;

  counterKey?: string;
  cooldownKey?: string;
}

/**
 * Parse the counter file: the counter on the first line, the last post URI
 * on the optional second line
 */
export function parseState(raw: string, options: Pick<StateManagerOptions, 'minCounter' | 'maxCounter'>): PersistedState {
  const [counterLine = '', uriLine = ''] = raw.trim().split(/\r?\n/);
  const counterText = counterLine.trim();

  if (!/^\d+$/.test(counterText)) {
    console.error(`State: counter "${counterText}" is not a number`);
    return { counter: INVALID_COUNTER };
  }

  const counter = Number(counterText);
  if (counter < options.minCounter || counter > options.maxCounter) {
    console.error(
      `State: counter ${counter} is outside ${options.minCounter}-${options.maxCounter}`
    );
    return { counter: INVALID_COUNTER };
  }

  const lastPostUri = uriLine.trim();
  return lastPostUri ? { counter, lastPostUri } : { counter };
}

export function serializeState(state: PersistedState): string {
  return state.lastPostUri ? `${state.counter}\n${state.lastPostUri}\n` : `${state.counter}\n`;
}

/**
 * Create a state manager on top of a key/value store
 */
export function createStateManager(store: KeyValueStore, options: StateManagerOptions) {
  const {
    minCounter,
    maxCounter,
    counterKey = DEFAULT_COUNTER_KEY,
    cooldownKey = DEFAULT_COOLDOWN_KEY,
  } = options;

  return {
    /**
     * Read the stored counter, never throwing
     */
    async readState(): Promise<PersistedState> {
      let raw: string | null;
      try {
        raw = await store.get(counterKey);
      } catch (error) {
        console.error(`State: error reading ${counterKey}:`, error);
        return { counter: INVALID_COUNTER };
      }

      if (raw === null) {
        console.warn(`State: ${counterKey} not found, starting from ${minCounter}`);
        return { counter: minCounter };
      }

      const state = parseState(raw, { minCounter, maxCounter });
      console.log(`State: read counter ${state.counter}`);
      return state;
    },

    /**
     * Replace the stored counter (throws on I/O failure)
     */
    async writeState(state: PersistedState): Promise<void> {
      await store.put(counterKey, serializeState(state));
      console.log(`State: counter saved as ${state.counter}`);
    },

    /**
     * Read the cooldown marker, treating unreadable markers as absent
     */
    async readCooldown(): Promise<CooldownMarker | null> {
      let raw: string | null;
      try {
        raw = await store.get(cooldownKey);
      } catch (error) {
        console.warn(`State: could not read ${cooldownKey}:`, error);
        return null;
      }

      if (raw === null) {
        return null;
      }

      const observedAt = new Date(raw.trim());
      if (Number.isNaN(observedAt.getTime())) {
        console.warn(`State: ignoring unreadable cooldown marker "${raw.trim()}"`);
        return null;
      }

      return { observedAt };
    },

    async writeCooldown(marker: CooldownMarker): Promise<void> {
      await store.put(cooldownKey, marker.observedAt.toISOString());
      console.log(`State: cooldown marker saved (${marker.observedAt.toISOString()})`);
    },

    async clearCooldown(): Promise<void> {
      await store.delete(cooldownKey);
    },

    /**
     * Whether a cooldown marker is on disk, treating read errors as none
     */
    async hasCooldown(): Promise<boolean> {
      try {
        return (await store.get(cooldownKey)) !== null;
      } catch (error) {
        console.warn(`State: could not check ${cooldownKey}:`, error);
        return false;
      }
    },
  };
}

/**
 * Type for the state manager
 */
export type StateManager = ReturnType<typeof createStateManager>;
