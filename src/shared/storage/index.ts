/**
 * Shared storage - key-value documents with locking
 */
export type { KeyValueStore } from './types';
export { createFileStore, type FileStoreOptions } from './file-store';
export { createMemoryStore } from './memory-store';
