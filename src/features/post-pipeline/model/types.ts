/**
 * Post pipeline types
 */

import type { AnalysisResult } from '../../../entities/analysis';
import type { PipelineStage, PostHandle, PostRecord, SkipReason } from '../../../entities/post-record';

interface StateBase {
  post: PostHandle;
  discoveredAt: string;
}

/**
 * Where a post is in the pipeline, with the data gathered so far
 */
export type PipelineState =
  | (StateBase & { status: 'discovered' })
  | (StateBase & { status: 'article_extracted'; articleUrl: string; articleText: string })
  | (StateBase & { status: 'analyzed'; articleUrl: string; analysis: AnalysisResult })
  | (StateBase & { status: 'commented'; articleUrl: string; analysis: AnalysisResult })
  | (StateBase & { status: 'skipped'; reason: SkipReason; articleUrl?: string })
  | (StateBase & { status: 'failed'; stage: PipelineStage; reason: string; articleUrl?: string });

export type TerminalPipelineState = Extract<PipelineState, { status: 'commented' | 'skipped' | 'failed' }>;

export type ActivePipelineState = Exclude<PipelineState, TerminalPipelineState>;

/**
 * Something that happened to a post
 */
export type PipelineEvent =
  | { type: 'article_found'; articleUrl: string; articleText: string }
  | { type: 'article_missing'; reason: Extract<SkipReason, 'no_article' | 'no_article_text'>; articleUrl?: string }
  | { type: 'analysis_succeeded'; analysis: AnalysisResult }
  | { type: 'analysis_failed'; reason: string }
  | { type: 'comment_posted' }
  | {
      type: 'comment_skipped';
      reason: Extract<SkipReason, 'comments_disabled' | 'no_comment_text' | 'comment_quota_exhausted'>;
    }
  | { type: 'stage_failed'; stage: PipelineStage; reason: string };

/**
 * Result of running one post through the pipeline
 */
export type PostOutcome =
  | { kind: 'duplicate'; postId: string }
  | { kind: 'quota_exhausted'; postId: string }
  | { kind: 'completed'; record: PostRecord };

/**
 * Runtime switches for the pipeline
 */
export interface PipelineOptions {
  enableComments: boolean;
}
