/**
 * Pipeline state machine
 *
 * Pure and forward-only: a terminal state accepts no event, and an event a
 * state does not expect is an error rather than a no-op.
 */

import type { PostRecord } from '../../../entities/post-record';
import type { PipelineEvent, PipelineState, TerminalPipelineState } from '../model';

/**
 * Event not accepted in the current state
 */
export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: PipelineState['status'],
    public readonly event: PipelineEvent['type']
  ) {
    super(`Illegal transition: ${event} in state ${from}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Type guard for terminal pipeline states
 */
export function isTerminal(state: PipelineState): state is TerminalPipelineState {
  return state.status === 'commented' || state.status === 'skipped' || state.status === 'failed';
}

/**
 * Apply an event to a state
 */
export function transition(state: PipelineState, event: PipelineEvent): PipelineState {
  const { post, discoveredAt } = state;

  switch (state.status) {
    case 'discovered':
      switch (event.type) {
        case 'article_found':
          return {
            status: 'article_extracted',
            post,
            discoveredAt,
            articleUrl: event.articleUrl,
            articleText: event.articleText,
          };
        case 'article_missing':
          return { status: 'skipped', post, discoveredAt, reason: event.reason, articleUrl: event.articleUrl };
        case 'stage_failed':
          return { status: 'failed', post, discoveredAt, stage: event.stage, reason: event.reason };
        default:
          throw new IllegalTransitionError(state.status, event.type);
      }

    case 'article_extracted':
      switch (event.type) {
        case 'analysis_succeeded':
          return { status: 'analyzed', post, discoveredAt, articleUrl: state.articleUrl, analysis: event.analysis };
        case 'analysis_failed':
          return { status: 'failed', post, discoveredAt, stage: 'analyze', reason: event.reason, articleUrl: state.articleUrl };
        case 'stage_failed':
          return { status: 'failed', post, discoveredAt, stage: event.stage, reason: event.reason, articleUrl: state.articleUrl };
        default:
          throw new IllegalTransitionError(state.status, event.type);
      }

    case 'analyzed':
      switch (event.type) {
        case 'comment_posted':
          return { status: 'commented', post, discoveredAt, articleUrl: state.articleUrl, analysis: state.analysis };
        case 'comment_skipped':
          return { status: 'skipped', post, discoveredAt, reason: event.reason, articleUrl: state.articleUrl };
        case 'stage_failed':
          return { status: 'failed', post, discoveredAt, stage: event.stage, reason: event.reason, articleUrl: state.articleUrl };
        default:
          throw new IllegalTransitionError(state.status, event.type);
      }

    case 'commented':
    case 'skipped':
    case 'failed':
      throw new IllegalTransitionError(state.status, event.type);

    default: {
      const unreachable: never = state;
      throw new Error(`Unknown pipeline state: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Build the persisted record for a terminal state
 */
export function toPostRecord(state: TerminalPipelineState, completedAt: string): PostRecord {
  const base = {
    postId: state.post.postId,
    pageSlug: state.post.pageSlug,
    discoveredAt: state.discoveredAt,
    completedAt,
  };

  switch (state.status) {
    case 'commented':
      return { ...base, state: 'commented', articleUrl: state.articleUrl };
    case 'skipped':
      return {
        ...base,
        state: 'skipped',
        skipReason: state.reason,
        ...(state.articleUrl === undefined ? {} : { articleUrl: state.articleUrl }),
      };
    case 'failed':
      return {
        ...base,
        state: 'failed',
        failedStage: state.stage,
        failureReason: state.reason,
        ...(state.articleUrl === undefined ? {} : { articleUrl: state.articleUrl }),
      };
  }
}
