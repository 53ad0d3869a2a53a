/**
 * Page walker - visits each configured page and feeds its new posts to the
 * pipeline in discovery order
 */

import type { PostHandle } from '../../../entities/post-record';
import type { StateManager } from '../../../entities/processed-state';
import { recordRunError, type RunReport } from '../../../entities/run-report';
import type { BrowserSession } from '../../../entities/session';
import { processPost, type PipelineDeps, type PostOutcome } from '../../../features/post-pipeline';
import {
  InfrastructureError,
  errorMessage,
  noopReporter,
  sleep as defaultSleep,
  waitRandom,
  type ErrorReporter,
  type Sleep,
} from '../../../shared/lib';

/** Inclusive range in seconds */
export interface DelayRange {
  min: number;
  max: number;
}

export interface WalkPagesDeps extends PipelineDeps {
  session: Pick<BrowserSession, 'listRecentPosts' | 'extractArticleLink' | 'extractArticleText' | 'postComment'>;
  history: Pick<StateManager, 'isProcessed' | 'recordPost' | 'filterNewItems'>;
  reporter?: ErrorReporter;
  sleep?: Sleep;
  random?: () => number;
}

export interface WalkPagesOptions {
  /** Page slugs in visiting order */
  pages: string[];
  maxPostsPerPage: number;
  enableComments: boolean;

  /** Pause between posts; each bound is doubled */
  postDelaySeconds: DelayRange;

  /** Pause between pages */
  pageDelaySeconds: DelayRange;

  signal?: AbortSignal;
}

/**
 * Add a post outcome to the run report
 */
function tally(report: RunReport, outcome: PostOutcome, reporter: ErrorReporter): void {
  switch (outcome.kind) {
    case 'duplicate':
      report.duplicatesSkipped++;
      return;
    case 'quota_exhausted':
      report.quotaExhausted = true;
      return;
    case 'completed': {
      const { record } = outcome;
      report.postsProcessed++;

      if (record.state === 'commented') {
        report.commentsPosted++;
      } else if (record.state === 'skipped') {
        report.postsSkipped++;
      } else {
        report.postsFailed++;
        const stage = record.failedStage ?? 'record';
        recordRunError(report, {
          postId: record.postId,
          pageSlug: record.pageSlug,
          stage,
          reason: record.failureReason ?? 'unknown error',
        });

        if (stage === 'comment') {
          reporter.captureMessage(`Failed to comment on post ${record.postId}`, {
            level: 'warning',
            tags: { source: 'comment', page: record.pageSlug },
            extra: { postId: record.postId, error: record.failureReason },
          });
        }
      }
    }
  }
}

/**
 * Walk every page, stopping early on shutdown or when the daily quota runs out
 *
 * Per-post and per-page errors are recorded in the report. Only a lost
 * session (InfrastructureError) is thrown.
 */
export async function walkPages(deps: WalkPagesDeps, options: WalkPagesOptions, report: RunReport): Promise<void> {
  const { session, history, reporter = noopReporter, sleep = defaultSleep, random } = deps;
  const { pages, maxPostsPerPage, enableComments, postDelaySeconds, pageDelaySeconds, signal } = options;

  const interrupted = (): boolean => {
    if (signal?.aborted) {
      report.interrupted = true;
      console.log('[walker] Shutdown requested; stopping before the next item');
      return true;
    }
    return false;
  };

  for (const [pageIndex, pageSlug] of pages.entries()) {
    if (interrupted()) return;

    if (pageIndex > 0) {
      await waitRandom(pageDelaySeconds.min, pageDelaySeconds.max, { sleep, signal, random });
      if (interrupted()) return;
    }

    console.log(`[walker] Page ${pageIndex + 1}/${pages.length}: ${pageSlug}`);

    let candidates: PostHandle[];
    try {
      // Ask for extra posts so history hits do not eat into the cap
      candidates = await session.listRecentPosts(pageSlug, maxPostsPerPage * 2);
    } catch (error) {
      if (error instanceof InfrastructureError) {
        throw error;
      }
      recordRunError(report, { postId: null, pageSlug, stage: 'discover', reason: errorMessage(error) });
      continue;
    }
    report.pagesVisited++;

    const fresh = await history.filterNewItems(candidates);
    report.duplicatesSkipped += candidates.length - fresh.length;
    const batch = fresh.slice(0, maxPostsPerPage);

    for (const [postIndex, post] of batch.entries()) {
      if (interrupted()) return;

      if (postIndex > 0) {
        await waitRandom(postDelaySeconds.min * 2, postDelaySeconds.max * 2, { sleep, signal, random });
        if (interrupted()) return;
      }

      let outcome: PostOutcome;
      try {
        outcome = await processPost(deps, post, { enableComments });
      } catch (error) {
        if (error instanceof InfrastructureError) {
          throw error;
        }
        recordRunError(report, { postId: post.postId, pageSlug, stage: 'record', reason: errorMessage(error) });
        continue;
      }

      tally(report, outcome, reporter);

      if (outcome.kind === 'quota_exhausted') {
        console.log('[walker] Daily processed quota reached; skipping remaining posts and pages');
        return;
      }
    }
  }
}
