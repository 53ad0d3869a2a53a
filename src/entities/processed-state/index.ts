/**
 * Processed state entity - public API
 */
export { type ProcessedState, DEFAULT_STATE, parseProcessedState, parsePostRecord } from './types';

export {
  createStateManager,
  DEFAULT_MAX_RECORDS,
  type StateManager,
  type StateManagerOptions,
} from './state-manager';
