import { describe, it, expect, vi } from 'vitest';
import type { AnalysisOutcome, ContentAnalyzer } from '../../../entities/analysis';
import { createQuotaTracker, type QuotaLimits } from '../../../entities/daily-quota';
import type { PostHandle } from '../../../entities/post-record';
import { createStateManager } from '../../../entities/processed-state';
import { createRunReport } from '../../../entities/run-report';
import type { BrowserSession } from '../../../entities/session';
import { InfrastructureError, type Sleep } from '../../../shared/lib';
import { createMemoryStore } from '../../../shared/storage';
import { walkPages, type WalkPagesOptions } from './walk-pages';

const okOutcome: AnalysisOutcome = {
  ok: true,
  value: { isClickbait: true, summary: 'Summary', commentText: 'Read past the headline.' },
};

function makePost(postId: string, pageSlug: string = 'localnews'): PostHandle {
  return {
    postId,
    pageSlug,
    postUrl: `https://www.facebook.com/${pageSlug}/posts/${postId}`,
    text: `Post ${postId}`,
  };
}

function fakeSession(postsByPage: Record<string, PostHandle[]>) {
  return {
    listRecentPosts: vi.fn<BrowserSession['listRecentPosts']>(async (pageSlug, max) =>
      (postsByPage[pageSlug] ?? []).slice(0, max)
    ),
    extractArticleLink: vi.fn<BrowserSession['extractArticleLink']>(
      async (post) => `https://news.example.com/${post.postId}`
    ),
    extractArticleText: vi.fn<BrowserSession['extractArticleText']>(async () => 'Article body'),
    postComment: vi.fn<BrowserSession['postComment']>(async () => ({ ok: true })),
  };
}

function setup(postsByPage: Record<string, PostHandle[]>, limits: Partial<QuotaLimits> = {}) {
  const store = createMemoryStore();
  const history = createStateManager({ store });
  const quota = createQuotaTracker({
    store,
    limits: { postsProcessed: 5, commentsPosted: 5, ...limits },
    clock: () => new Date(2026, 2, 10, 12, 0),
  });
  const session = fakeSession(postsByPage);
  const analyzer = { analyze: vi.fn<ContentAnalyzer['analyze']>(async () => okOutcome) };
  const sleep = vi.fn<Sleep>(async () => {});

  return {
    history,
    quota,
    session,
    analyzer,
    sleep,
    deps: { session, analyzer, quota, history, sleep, random: () => 0 },
  };
}

const baseOptions: WalkPagesOptions = {
  pages: ['localnews'],
  maxPostsPerPage: 2,
  enableComments: true,
  postDelaySeconds: { min: 1, max: 3 },
  pageDelaySeconds: { min: 5, max: 10 },
};

describe('walkPages', () => {
  it('processes only up to the per-page cap and leaves the rest untouched', async () => {
    const { deps, session, analyzer, history, quota } = setup({
      localnews: [makePost('a'), makePost('b'), makePost('c')],
    });
    const report = createRunReport();

    await walkPages(deps, baseOptions, report);

    expect(session.listRecentPosts).toHaveBeenCalledWith('localnews', 4);
    expect(analyzer.analyze).toHaveBeenCalledTimes(2);
    expect(report.postsProcessed).toBe(2);
    expect(report.commentsPosted).toBe(2);
    expect(await history.isProcessed('c')).toBe(false);
    expect((await quota.snapshot()).postsProcessed).toBe(2);
  });

  it('waits twice the post delay between posts', async () => {
    const { deps, sleep } = setup({ localnews: [makePost('a'), makePost('b')] });

    await walkPages(deps, baseOptions, createRunReport());

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000, undefined);
  });

  it('keeps going after a post fails', async () => {
    const { deps, analyzer } = setup({ localnews: [makePost('a'), makePost('b'), makePost('c')] });
    analyzer.analyze.mockResolvedValueOnce(okOutcome).mockResolvedValueOnce({ ok: false, error: { kind: 'timeout' } });
    const report = createRunReport();

    await walkPages(deps, { ...baseOptions, maxPostsPerPage: 3 }, report);

    expect(analyzer.analyze).toHaveBeenCalledTimes(3);
    expect(report.postsProcessed).toBe(3);
    expect(report.commentsPosted).toBe(2);
    expect(report.postsFailed).toBe(1);
    expect(report.errors).toEqual([
      { postId: 'b', pageSlug: 'localnews', stage: 'analyze', reason: 'analysis timed out' },
    ]);
  });

  it('stops every page once the processed quota runs out', async () => {
    const { deps, session } = setup(
      {
        one: [makePost('a', 'one'), makePost('b', 'one')],
        two: [makePost('c', 'two')],
      },
      { postsProcessed: 1 }
    );
    const report = createRunReport();

    await walkPages(deps, { ...baseOptions, pages: ['one', 'two'] }, report);

    expect(report.postsProcessed).toBe(1);
    expect(report.quotaExhausted).toBe(true);
    expect(report.pagesVisited).toBe(1);
    expect(session.listRecentPosts).toHaveBeenCalledTimes(1);
  });

  it('stops between posts when shutdown is requested', async () => {
    const controller = new AbortController();
    const { deps, analyzer, history } = setup({ localnews: [makePost('a'), makePost('b')] });
    analyzer.analyze.mockImplementation(async () => {
      controller.abort();
      return okOutcome;
    });
    const report = createRunReport();

    await walkPages(deps, { ...baseOptions, signal: controller.signal }, report);

    expect(report.interrupted).toBe(true);
    expect(report.postsProcessed).toBe(1);
    expect(await history.isProcessed('a')).toBe(true);
    expect(await history.isProcessed('b')).toBe(false);
  });

  it('records a page that cannot be listed and moves on', async () => {
    const { deps, session, sleep } = setup({ localnews: [makePost('a')] });
    session.listRecentPosts.mockRejectedValueOnce(new Error('page did not load'));
    const report = createRunReport();

    await walkPages(deps, { ...baseOptions, pages: ['broken', 'localnews'] }, report);

    expect(report.errors).toEqual([
      { postId: null, pageSlug: 'broken', stage: 'discover', reason: 'page did not load' },
    ]);
    expect(report.pagesVisited).toBe(1);
    expect(report.postsProcessed).toBe(1);
    expect(sleep).toHaveBeenCalledWith(5000, undefined);
  });

  it('counts posts already in history as duplicates', async () => {
    const { deps, history, analyzer } = setup({ localnews: [makePost('a'), makePost('b'), makePost('c')] });
    await history.recordPost({
      postId: 'a',
      pageSlug: 'localnews',
      discoveredAt: '2026-03-09T10:00:00.000Z',
      completedAt: '2026-03-09T10:01:00.000Z',
      state: 'skipped',
      skipReason: 'no_article',
    });
    const report = createRunReport();

    await walkPages(deps, baseOptions, report);

    expect(report.duplicatesSkipped).toBe(1);
    expect(report.postsProcessed).toBe(2);
    expect(analyzer.analyze).toHaveBeenCalledWith('Post b', 'Article body');
    expect(analyzer.analyze).toHaveBeenCalledWith('Post c', 'Article body');
  });

  it('rethrows a lost session', async () => {
    const { deps, session } = setup({ localnews: [makePost('a')] });
    session.listRecentPosts.mockRejectedValue(new InfrastructureError('browser disconnected'));

    await expect(walkPages(deps, baseOptions, createRunReport())).rejects.toBeInstanceOf(InfrastructureError);
  });
});
