/**
 * Daily quota entity - public API
 */
export { type QuotaKind, type DailyQuota, type QuotaLimits, emptyQuota, parseDailyQuota } from './types';

export { createQuotaTracker, type QuotaTracker, type QuotaTrackerOptions } from './quota-tracker';
