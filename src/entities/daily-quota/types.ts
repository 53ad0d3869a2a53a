/**
 * Daily quota types
 */

/**
 * Action counted against a daily limit
 */
export type QuotaKind = 'processed' | 'commented';

/**
 * Counters for one calendar day
 */
export interface DailyQuota {
  /** Local date key (YYYY-MM-DD) */
  date: string;

  postsProcessed: number;
  commentsPosted: number;
}

/**
 * Configured daily maximums
 */
export interface QuotaLimits {
  postsProcessed: number;
  commentsPosted: number;
}

/**
 * Counter field for each quota kind
 */
export const QUOTA_FIELD = {
  processed: 'postsProcessed',
  commented: 'commentsPosted',
} as const satisfies Record<QuotaKind, keyof QuotaLimits>;

/**
 * Fresh counters for a day
 */
export function emptyQuota(date: string): DailyQuota {
  return { date, postsProcessed: 0, commentsPosted: 0 };
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a stored quota document
 */
export function parseDailyQuota(value: unknown): DailyQuota | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  if (!('date' in value) || typeof value.date !== 'string') {
    return null;
  }
  if (!('postsProcessed' in value) || !isCount(value.postsProcessed)) {
    return null;
  }
  if (!('commentsPosted' in value) || !isCount(value.commentsPosted)) {
    return null;
  }
  return {
    date: value.date,
    postsProcessed: value.postsProcessed,
    commentsPosted: value.commentsPosted,
  };
}
