/**
 * In-process key-value store
 *
 * Values are stored serialised so callers never share object references with
 * the store, matching the file-backed behaviour.
 */

import { createKeyedMutex } from './mutex';
import type { KeyValueStore } from './types';

export function createMemoryStore(initial: Record<string, unknown> = {}): KeyValueStore {
  const entries = new Map<string, string>();
  const runExclusive = createKeyedMutex();

  for (const [key, value] of Object.entries(initial)) {
    entries.set(key, JSON.stringify(value));
  }

  return {
    async get(key) {
      const raw = entries.get(key);
      return raw === undefined ? null : JSON.parse(raw);
    },

    async put(key, value) {
      entries.set(key, JSON.stringify(value));
    },

    async delete(key) {
      entries.delete(key);
    },

    withLock(key, fn) {
      return runExclusive(key, fn);
    },
  };
}
