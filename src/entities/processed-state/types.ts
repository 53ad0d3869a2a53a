/**
 * Processed state types for the key-value store
 */

import type { PostRecord, PipelineStage, SkipReason, TerminalState } from '../post-record';

/**
 * Complete state stored under the `processed-state` key
 */
export interface ProcessedState {
  /** Terminal post records, newest first */
  records: PostRecord[];

  /** Timestamp of last state update */
  lastUpdatedAt: string;

  /** Count of consecutive runs that ended in a fatal error */
  consecutiveFailures: number;
}

/**
 * Default state for a fresh data directory
 */
export const DEFAULT_STATE: ProcessedState = {
  records: [],
  lastUpdatedAt: new Date(0).toISOString(),
  consecutiveFailures: 0,
};

const TERMINAL_STATES: readonly TerminalState[] = ['commented', 'skipped', 'failed'];

const SKIP_REASONS: readonly SkipReason[] = [
  'no_article',
  'no_article_text',
  'comments_disabled',
  'no_comment_text',
  'comment_quota_exhausted',
];

const STAGES: readonly PipelineStage[] = ['discover', 'extract', 'analyze', 'comment', 'record'];

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function pick<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

/**
 * Validate one stored record
 */
export function parsePostRecord(value: unknown): PostRecord | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const postId = 'postId' in value ? optionalString(value.postId) : undefined;
  const pageSlug = 'pageSlug' in value ? optionalString(value.pageSlug) : undefined;
  const discoveredAt = 'discoveredAt' in value ? optionalString(value.discoveredAt) : undefined;
  const completedAt = 'completedAt' in value ? optionalString(value.completedAt) : undefined;
  const state = 'state' in value ? pick(TERMINAL_STATES, value.state) : undefined;

  if (!postId || pageSlug === undefined || !discoveredAt || !completedAt || !state) {
    return null;
  }

  const record: PostRecord = { postId, pageSlug, discoveredAt, completedAt, state };

  const skipReason = 'skipReason' in value ? pick(SKIP_REASONS, value.skipReason) : undefined;
  const failedStage = 'failedStage' in value ? pick(STAGES, value.failedStage) : undefined;
  const failureReason = 'failureReason' in value ? optionalString(value.failureReason) : undefined;
  const articleUrl = 'articleUrl' in value ? optionalString(value.articleUrl) : undefined;

  if (skipReason) record.skipReason = skipReason;
  if (failedStage) record.failedStage = failedStage;
  if (failureReason !== undefined) record.failureReason = failureReason;
  if (articleUrl !== undefined) record.articleUrl = articleUrl;

  return record;
}

/**
 * Validate the stored state document, dropping unreadable records
 */
export function parseProcessedState(value: unknown): ProcessedState | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  if (!('records' in value) || !Array.isArray(value.records)) {
    return null;
  }

  const records: PostRecord[] = [];
  for (const entry of value.records) {
    const record = parsePostRecord(entry);
    if (record) {
      records.push(record);
    } else {
      console.warn('[state] Dropping unreadable post record:', JSON.stringify(entry));
    }
  }

  const lastUpdatedAt =
    'lastUpdatedAt' in value && typeof value.lastUpdatedAt === 'string'
      ? value.lastUpdatedAt
      : DEFAULT_STATE.lastUpdatedAt;

  const consecutiveFailures =
    'consecutiveFailures' in value &&
    typeof value.consecutiveFailures === 'number' &&
    Number.isInteger(value.consecutiveFailures) &&
    value.consecutiveFailures >= 0
      ? value.consecutiveFailures
      : 0;

  return { records, lastUpdatedAt, consecutiveFailures };
}
