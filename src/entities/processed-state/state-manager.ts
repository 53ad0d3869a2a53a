/**
 * State manager for the idempotency log and run health
 *
 * Reads the state once per run into a cache for the membership checks made
 * while walking pages. Every mutation re-reads the stored document under the
 * store lock, applies the change and writes it back straight away, so nothing
 * is pending when the process stops and a second process sharing the data
 * directory is not overwritten.
 */

import type { KeyValueStore } from '../../shared/storage';
import type { PostRecord } from '../post-record';
import { DEFAULT_STATE, parseProcessedState, type ProcessedState } from './types';

/** Store key for the state document */
const STATE_KEY = 'processed-state';

/** Default number of post records to keep (to prevent unbounded growth) */
export const DEFAULT_MAX_RECORDS = 5000;

export interface StateManagerOptions {
  store: KeyValueStore;

  /** Maximum number of post records kept, oldest evicted first */
  maxRecords?: number;
}

/**
 * Create a state manager for interacting with the key-value store
 */
export function createStateManager(options: StateManagerOptions) {
  const { store, maxRecords = DEFAULT_MAX_RECORDS } = options;

  /** Cached state for membership checks */
  let cachedState: ProcessedState | null = null;

  /** Post IDs in the cached state */
  let cachedIds = new Set<string>();

  function setCache(state: ProcessedState): ProcessedState {
    cachedState = state;
    cachedIds = new Set(state.records.map((record) => record.postId));
    return state;
  }

  async function readStored(): Promise<ProcessedState> {
    return parseProcessedState(await store.get(STATE_KEY)) ?? structuredClone(DEFAULT_STATE);
  }

  /**
   * Read-modify-write under the store lock
   */
  async function update(mutate: (state: ProcessedState) => void): Promise<ProcessedState> {
    return store.withLock(STATE_KEY, async () => {
      const state = await readStored();
      mutate(state);
      state.lastUpdatedAt = new Date().toISOString();
      await store.put(STATE_KEY, state);
      return setCache(state);
    });
  }

  return {
    /**
     * Get the current state (from cache if already loaded)
     */
    async getState(): Promise<ProcessedState> {
      if (cachedState) {
        return cachedState;
      }
      return setCache(await readStored());
    },

    /**
     * Reload state from the store, replacing the cache
     */
    async loadState(): Promise<ProcessedState> {
      return setCache(await readStored());
    },

    /**
     * Check if a post has already reached a terminal state
     */
    async isProcessed(postId: string): Promise<boolean> {
      await this.getState();
      return cachedIds.has(postId);
    },

    /**
     * Persist a terminal post record
     */
    async recordPost(record: PostRecord): Promise<void> {
      await update((state) => {
        const others = state.records.filter((existing) => existing.postId !== record.postId);
        state.records = [record, ...others].slice(0, maxRecords);
      });
    },

    /**
     * Filter out already processed posts from a list (uses cached state)
     */
    async filterNewItems<T extends { postId: string }>(items: T[]): Promise<T[]> {
      await this.getState();

      console.log(`[state] Checking ${items.length} posts against ${cachedIds.size} processed IDs`);

      return items.filter((item) => {
        const isProcessed = cachedIds.has(item.postId);
        if (isProcessed) {
          console.log(`  - ${item.postId}: already processed`);
        } else {
          console.log(`  + ${item.postId}: NEW`);
        }
        return !isProcessed;
      });
    },

    /**
     * Record a failed run
     * Returns the new consecutive failure count
     */
    async recordFailure(): Promise<number> {
      const state = await update((current) => {
        current.consecutiveFailures += 1;
      });
      return state.consecutiveFailures;
    },

    /**
     * Reset the failure count after a successful run
     * Only writes if the count was actually non-zero
     */
    async resetFailures(): Promise<void> {
      const state = await this.getState();
      if (state.consecutiveFailures > 0) {
        await update((current) => {
          current.consecutiveFailures = 0;
        });
      }
    },
  };
}

/**
 * Type for the state manager
 */
export type StateManager = ReturnType<typeof createStateManager>;
