/**
 * Post record types - a discovered post and its processing state
 */

/**
 * Processing state of a post
 */
export type PostState =
  | 'discovered'
  | 'article_extracted'
  | 'analyzed'
  | 'commented'
  | 'skipped'
  | 'failed';

/**
 * States a post never leaves
 */
export type TerminalState = Extract<PostState, 'commented' | 'skipped' | 'failed'>;

/**
 * Pipeline stage where an error happened
 */
export type PipelineStage = 'discover' | 'extract' | 'analyze' | 'comment' | 'record';

/**
 * Why a post was skipped
 */
export type SkipReason =
  | 'no_article'
  | 'no_article_text'
  | 'comments_disabled'
  | 'no_comment_text'
  | 'comment_quota_exhausted';

/**
 * A post found on a monitored page, as returned by the browser session
 */
export interface PostHandle {
  /** Stable platform identifier */
  postId: string;

  /** Page the post belongs to */
  pageSlug: string;

  /** Permalink to the post */
  postUrl: string;

  /** Visible post text (may be empty) */
  text: string;
}

/**
 * Record of a post that reached a terminal state
 */
export interface PostRecord {
  postId: string;
  pageSlug: string;

  /** ISO timestamp of discovery */
  discoveredAt: string;

  /** ISO timestamp of the terminal transition */
  completedAt: string;

  state: TerminalState;
  skipReason?: SkipReason;
  failureReason?: string;
  failedStage?: PipelineStage;
  articleUrl?: string;
}
