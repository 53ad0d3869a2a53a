/**
 * File-backed key-value store
 *
 * Each key is a JSON file under the data directory. Writes go to a temporary
 * file that is renamed over the target, so a reader sees either the old or the
 * new document. `withLock` combines an in-process mutex with an exclusive
 * `<key>.lock` file so separate processes sharing the directory also take
 * turns.
 */

import { mkdir, open, readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { sleep } from '../lib/delay';
import { createKeyedMutex } from './mutex';
import type { KeyValueStore } from './types';

/** Lock files older than this are considered abandoned */
const STALE_LOCK_MS = 30_000;

/** Poll interval while waiting for another process to release a lock */
const LOCK_RETRY_MS = 50;

/** Give up waiting for a lock after this long */
const LOCK_TIMEOUT_MS = 60_000;

export interface FileStoreOptions {
  /** Directory holding the JSON documents */
  dir: string;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Create a key-value store rooted at a directory
 */
export function createFileStore(options: FileStoreOptions): KeyValueStore {
  const { dir } = options;
  const runExclusive = createKeyedMutex();
  let ensured: Promise<string | undefined> | null = null;

  function ensureDir() {
    ensured ??= mkdir(dir, { recursive: true });
    return ensured;
  }

  function fileFor(key: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(key)) {
      throw new Error(`Invalid store key: ${key}`);
    }
    return path.join(dir, `${key}.json`);
  }

  async function acquireLockFile(lockPath: string): Promise<void> {
    const startedAt = Date.now();

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        await handle.writeFile(String(process.pid));
        await handle.close();
        return;
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) {
          throw error;
        }
      }

      try {
        const info = await stat(lockPath);
        if (Date.now() - info.mtimeMs > STALE_LOCK_MS) {
          console.warn(`[store] Removing stale lock ${lockPath}`);
          await rm(lockPath, { force: true });
          continue;
        }
      } catch (error) {
        // Released between open() and stat(); try again
        if (!isErrnoCode(error, 'ENOENT')) {
          throw error;
        }
        continue;
      }

      if (Date.now() - startedAt > LOCK_TIMEOUT_MS) {
        throw new Error(`Timed out waiting for lock ${lockPath}`);
      }
      await sleep(LOCK_RETRY_MS);
    }
  }

  return {
    async get(key) {
      try {
        const raw = await readFile(fileFor(key), 'utf8');
        return JSON.parse(raw);
      } catch (error) {
        if (isErrnoCode(error, 'ENOENT')) {
          return null;
        }
        throw error;
      }
    },

    async put(key, value) {
      await ensureDir();
      const target = fileFor(key);
      const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
      await writeFile(temp, JSON.stringify(value, null, 2), 'utf8');
      await rename(temp, target);
    },

    async delete(key) {
      await rm(fileFor(key), { force: true });
    },

    withLock(key, fn) {
      return runExclusive(key, async () => {
        await ensureDir();
        const lockPath = `${fileFor(key)}.lock`;
        await acquireLockFile(lockPath);
        try {
          return await fn();
        } finally {
          await unlink(lockPath).catch((error: unknown) => {
            console.warn(`[store] Failed to release lock ${lockPath}:`, error);
          });
        }
      });
    },
  };
}
