/**
 * Run one post through the pipeline
 *
 * The session, analyzer, quota and history are injected so the whole flow
 * runs against in-memory fakes in tests.
 */

import { describeAnalysisError, type ContentAnalyzer } from '../../../entities/analysis';
import type { QuotaTracker } from '../../../entities/daily-quota';
import type { PostHandle } from '../../../entities/post-record';
import type { StateManager } from '../../../entities/processed-state';
import type { BrowserSession } from '../../../entities/session';
import { InfrastructureError, errorMessage, preview, systemClock, type Clock } from '../../../shared/lib';
import type { ActivePipelineState, PipelineEvent, PipelineOptions, PipelineState, PostOutcome } from '../model';
import { isTerminal, toPostRecord, transition } from './transition';

export interface PipelineDeps {
  session: Pick<BrowserSession, 'extractArticleLink' | 'extractArticleText' | 'postComment'>;
  analyzer: ContentAnalyzer;
  quota: Pick<QuotaTracker, 'tryConsume'>;
  history: Pick<StateManager, 'isProcessed' | 'recordPost'>;
  clock?: Clock;
}

/**
 * Rethrow session loss; turn anything else into a failure event
 */
function containError(error: unknown, stage: 'extract' | 'analyze' | 'comment'): PipelineEvent {
  if (error instanceof InfrastructureError) {
    throw error;
  }
  return { type: 'stage_failed', stage, reason: errorMessage(error) };
}

async function nextEvent(
  deps: PipelineDeps,
  state: ActivePipelineState,
  options: PipelineOptions
): Promise<PipelineEvent> {
  const { session, analyzer, quota } = deps;
  const { post } = state;

  switch (state.status) {
    case 'discovered':
      try {
        const articleUrl = await session.extractArticleLink(post);
        if (!articleUrl) {
          return { type: 'article_missing', reason: 'no_article' };
        }

        const articleText = await session.extractArticleText(articleUrl);
        if (!articleText || articleText.trim() === '') {
          return { type: 'article_missing', reason: 'no_article_text', articleUrl };
        }

        return { type: 'article_found', articleUrl, articleText };
      } catch (error) {
        return containError(error, 'extract');
      }

    case 'article_extracted':
      try {
        const outcome = await analyzer.analyze(post.text, state.articleText);
        return outcome.ok
          ? { type: 'analysis_succeeded', analysis: outcome.value }
          : { type: 'analysis_failed', reason: describeAnalysisError(outcome.error) };
      } catch (error) {
        return containError(error, 'analyze');
      }

    case 'analyzed': {
      const { commentText } = state.analysis;

      if (!options.enableComments) {
        return { type: 'comment_skipped', reason: 'comments_disabled' };
      }
      if (!commentText) {
        return { type: 'comment_skipped', reason: 'no_comment_text' };
      }

      try {
        if (!(await quota.tryConsume('commented'))) {
          return { type: 'comment_skipped', reason: 'comment_quota_exhausted' };
        }

        const result = await session.postComment(post, commentText);
        return result.ok
          ? { type: 'comment_posted' }
          : { type: 'stage_failed', stage: 'comment', reason: `${result.error.kind}: ${result.error.detail}` };
      } catch (error) {
        return containError(error, 'comment');
      }
    }
  }
}

function describeOutcome(state: PipelineState): string {
  switch (state.status) {
    case 'commented':
      return '✓ commented';
    case 'skipped':
      return `- skipped (${state.reason})`;
    case 'failed':
      return `✗ failed at ${state.stage}: ${state.reason}`;
    default:
      return state.status;
  }
}

/**
 * Process a discovered post to a terminal state and persist its record
 *
 * Returns `duplicate` for posts already in history and `quota_exhausted`
 * when the daily processed limit is reached; neither persists anything.
 * Throws only for session loss and storage failures.
 */
export async function processPost(
  deps: PipelineDeps,
  post: PostHandle,
  options: PipelineOptions
): Promise<PostOutcome> {
  const { history, quota, clock = systemClock } = deps;

  if (await history.isProcessed(post.postId)) {
    console.log(`[pipeline] ${post.postId}: already processed`);
    return { kind: 'duplicate', postId: post.postId };
  }

  if (!(await quota.tryConsume('processed'))) {
    return { kind: 'quota_exhausted', postId: post.postId };
  }

  console.log(`[pipeline] Processing ${post.postId} on ${post.pageSlug}: "${preview(post.text, 80)}"`);

  let state: PipelineState = { status: 'discovered', post, discoveredAt: clock().toISOString() };
  while (!isTerminal(state)) {
    state = transition(state, await nextEvent(deps, state, options));
  }

  const record = toPostRecord(state, clock().toISOString());
  await history.recordPost(record);

  console.log(`[pipeline] ${post.postId}: ${describeOutcome(state)}`);
  return { kind: 'completed', record };
}
