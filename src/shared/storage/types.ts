/**
 * Key-value storage contract
 *
 * Values are JSON-serialisable. Reads return `null` for missing keys and leave
 * shape validation to the caller.
 */
export interface KeyValueStore {
  get(key: string): Promise<unknown>;
  put(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;

  /**
   * Run `fn` with exclusive access to `key`
   */
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}
