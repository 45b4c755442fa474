/**
 * Counter state entity - public API
 */
export {
  type PersistedState,
  type CooldownMarker,
  type KeyValueStore,
  INVALID_COUNTER,
} from './types';

export {
  createStateManager,
  parseState,
  serializeState,
  DEFAULT_COUNTER_KEY,
  DEFAULT_COOLDOWN_KEY,
  type StateManager,
  type StateManagerOptions,
} from './state-manager';

export { createFileStore } from './file-store';
