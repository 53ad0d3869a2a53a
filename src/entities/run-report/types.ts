/**
 * Run report types - summary of one orchestrator pass
 */

import type { PipelineStage } from '../post-record';

/**
 * A contained per-post (or per-page) error
 */
export interface RunError {
  /** Post the error belongs to; null for page-level errors */
  postId: string | null;
  pageSlug: string;
  stage: PipelineStage;
  reason: string;
}

/**
 * Summary of one run
 */
export interface RunReport {
  startedAt: Date;
  finishedAt: Date | null;

  pagesVisited: number;

  /** Posts that consumed processed quota and reached a terminal state */
  postsProcessed: number;

  commentsPosted: number;
  postsSkipped: number;
  postsFailed: number;

  /** Candidates dropped because they were already terminal */
  duplicatesSkipped: number;

  /** The processed quota ran out during the run */
  quotaExhausted: boolean;

  /** The run stopped early because of a shutdown request */
  interrupted: boolean;

  /** Errors in the order they happened */
  errors: RunError[];
}

/**
 * Final classification of a run
 */
export type RunOutcome =
  | { status: 'succeeded'; report: RunReport }
  | { status: 'fatal_error'; report: RunReport; error: Error };
