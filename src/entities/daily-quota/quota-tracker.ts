/**
 * Quota tracker - persisted daily counters with a single mutation point
 *
 * Every `tryConsume` runs read → compare → increment → write under the
 * store lock, and recomputes the date key from the clock, so a run that
 * crosses midnight starts counting the new day on its next call. Nothing is
 * held in memory between calls; the stored document is the source of truth.
 */

import { systemClock, toDateKey, type Clock } from '../../shared/lib';
import type { KeyValueStore } from '../../shared/storage';
import { emptyQuota, parseDailyQuota, QUOTA_FIELD, type DailyQuota, type QuotaKind, type QuotaLimits } from './types';

/** Store key for the quota document */
const QUOTA_KEY = 'daily-quota';

export interface QuotaTrackerOptions {
  store: KeyValueStore;
  limits: QuotaLimits;
  clock?: Clock;
}

/**
 * Create a quota tracker backed by a key-value store
 */
export function createQuotaTracker(options: QuotaTrackerOptions) {
  const { store, limits, clock = systemClock } = options;

  async function readToday(): Promise<DailyQuota> {
    const today = toDateKey(clock());
    const stored = parseDailyQuota(await store.get(QUOTA_KEY));

    if (!stored || stored.date !== today) {
      return emptyQuota(today);
    }
    return stored;
  }

  return {
    /**
     * Count one action if today's limit allows it
     *
     * Returns false, without changing anything, once the limit is reached.
     */
    async tryConsume(kind: QuotaKind): Promise<boolean> {
      return store.withLock(QUOTA_KEY, async () => {
        const quota = await readToday();
        const field = QUOTA_FIELD[kind];

        if (quota[field] >= limits[field]) {
          console.log(`[quota] ${kind} limit reached (${quota[field]}/${limits[field]} on ${quota.date})`);
          return false;
        }

        const next: DailyQuota = { ...quota };
        next[field] += 1;
        await store.put(QUOTA_KEY, next);
        return true;
      });
    },

    /**
     * Today's counters (zeroed if the stored day is over)
     */
    async snapshot(): Promise<DailyQuota> {
      return readToday();
    },

    /**
     * Actions of a kind still allowed today
     */
    async remaining(kind: QuotaKind): Promise<number> {
      const quota = await readToday();
      const field = QUOTA_FIELD[kind];
      return Math.max(0, limits[field] - quota[field]);
    },
  };
}

/**
 * Type for the quota tracker
 */
export type QuotaTracker = ReturnType<typeof createQuotaTracker>;
