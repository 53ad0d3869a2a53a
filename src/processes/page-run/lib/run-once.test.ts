import { describe, it, expect, vi } from 'vitest';
import type { Browser, BrowserContext, Keyboard, Mouse, Page } from 'playwright-core';
import type { AnalysisOutcome, ContentAnalyzer } from '../../../entities/analysis';
import { createQuotaTracker, type QuotaLimits } from '../../../entities/daily-quota';
import type { PostHandle } from '../../../entities/post-record';
import { createStateManager } from '../../../entities/processed-state';
import type { BrowserSession, LoginResult, SessionFactory } from '../../../entities/session';
import { createPlaywrightSession, type SessionHandles } from '../../../features/browser-session/api';
import { InfrastructureError, type Sleep } from '../../../shared/lib';
import { createMemoryStore } from '../../../shared/storage';
import { createRunOrchestrator, type RunOrchestratorOptions } from './run-once';

const okOutcome: AnalysisOutcome = {
  ok: true,
  value: { isClickbait: false, summary: 'Summary', commentText: 'Useful context.' },
};

const posts: PostHandle[] = ['a', 'b'].map((postId) => ({
  postId,
  pageSlug: 'localnews',
  postUrl: `https://www.facebook.com/localnews/posts/${postId}`,
  text: `Post ${postId}`,
}));

function fakeSession() {
  return {
    login: vi.fn<BrowserSession['login']>(async () => ({ ok: true })),
    listRecentPosts: vi.fn<BrowserSession['listRecentPosts']>(async () => posts),
    extractArticleLink: vi.fn<BrowserSession['extractArticleLink']>(async () => 'https://news.example.com/a'),
    extractArticleText: vi.fn<BrowserSession['extractArticleText']>(async () => 'Article body'),
    postComment: vi.fn<BrowserSession['postComment']>(async () => ({ ok: true })),
    close: vi.fn<BrowserSession['close']>(async () => {}),
  };
}

const options: RunOrchestratorOptions = {
  pages: ['localnews'],
  maxPostsPerPage: 5,
  enableComments: true,
  postDelaySeconds: { min: 0, max: 0 },
  pageDelaySeconds: { min: 0, max: 0 },
};

function setup(limits: Partial<QuotaLimits> = {}) {
  const store = createMemoryStore();
  const history = createStateManager({ store });
  const quota = createQuotaTracker({
    store,
    limits: { postsProcessed: 5, commentsPosted: 5, ...limits },
    clock: () => new Date(2026, 2, 10, 12, 0),
  });
  const session = fakeSession();
  const openSession = vi.fn<SessionFactory>(async () => session);
  const analyzer = { analyze: vi.fn<ContentAnalyzer['analyze']>(async () => okOutcome) };

  const orchestrator = createRunOrchestrator(
    {
      openSession,
      analyzer,
      quota,
      history,
      credentials: { email: 'bot@example.test', password: 'test-secret' },
      sleep: vi.fn<Sleep>(async () => {}),
    },
    options
  );

  return { orchestrator, session, openSession, quota, history };
}

describe('createRunOrchestrator', () => {
  it('logs in, walks the pages and closes the session', async () => {
    const { orchestrator, session } = setup();

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('succeeded');
    expect(outcome.report.postsProcessed).toBe(2);
    expect(outcome.report.commentsPosted).toBe(2);
    expect(outcome.report.finishedAt).toBeInstanceOf(Date);
    expect(session.login).toHaveBeenCalledWith({ email: 'bot@example.test', password: 'test-secret' });
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('is fatal on login failure and leaves the quota untouched', async () => {
    const { orchestrator, session, quota } = setup();
    session.login.mockResolvedValue({ ok: false, error: { kind: 'invalid_credentials', detail: 'rejected' } });

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('fatal_error');
    if (outcome.status === 'fatal_error') {
      expect(outcome.error).toBeInstanceOf(InfrastructureError);
      expect(outcome.error.message).toBe('Login failed (invalid_credentials): rejected');
    }
    expect(session.listRecentPosts).not.toHaveBeenCalled();
    expect(session.close).toHaveBeenCalledTimes(1);
    expect(await quota.snapshot()).toEqual({ date: '2026-03-10', postsProcessed: 0, commentsPosted: 0 });
  });

  it('is fatal when the browser cannot be opened', async () => {
    const { orchestrator, openSession } = setup();
    openSession.mockRejectedValue(new InfrastructureError('Browser driver unreachable: connect ECONNREFUSED'));

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('fatal_error');
  });

  it('is fatal when the session is lost mid-run and still closes it', async () => {
    const { orchestrator, session } = setup();
    session.extractArticleLink.mockRejectedValue(new InfrastructureError('browser disconnected'));

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('fatal_error');
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('skips the browser when the processed quota is already spent', async () => {
    const { orchestrator, openSession } = setup({ postsProcessed: 0 });

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('succeeded');
    expect(outcome.report.quotaExhausted).toBe(true);
    expect(openSession).not.toHaveBeenCalled();
  });

  it('contains per-post failures in a successful run', async () => {
    const { orchestrator, session } = setup();
    session.postComment.mockResolvedValue({ ok: false, error: { kind: 'submit_failed', detail: 'button gone' } });

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('succeeded');
    expect(outcome.report.postsFailed).toBe(2);
    expect(outcome.report.errors.map((error) => error.stage)).toEqual(['comment', 'comment']);
  });

  it('is fatal when the page reports a closed browser and records nothing', async () => {
    const { orchestrator, openSession, history, quota } = setup();
    const browser = {
      isConnected: vi.fn<Browser['isConnected']>(() => true),
      close: vi.fn<Browser['close']>(async () => {}),
    };
    const playwrightSession = createPlaywrightSession(
      {
        browser,
        context: {
          storageState: vi.fn<BrowserContext['storageState']>(),
          newPage: vi.fn<SessionHandles['context']['newPage']>(),
          close: vi.fn<BrowserContext['close']>(async () => {}),
        },
        page: {
          goto: vi.fn<Page['goto']>(async () => {
            throw new Error('page.goto: Target page, context or browser has been closed');
          }),
          url: vi.fn<Page['url']>(() => 'about:blank'),
          locator: vi.fn<Page['locator']>(),
          isClosed: vi.fn<Page['isClosed']>(() => false),
          waitForLoadState: vi.fn<Page['waitForLoadState']>(async () => {}),
          keyboard: { press: vi.fn<Keyboard['press']>(async () => {}) },
          mouse: { wheel: vi.fn<Mouse['wheel']>(async () => {}) },
        },
      },
      {
        baseUrl: 'https://www.facebook.com/',
        headless: true,
        pageLoadTimeoutMs: 1000,
        storageStatePath: 'unused/session-state.json',
        sleep: vi.fn<Sleep>(async () => {}),
      }
    );
    openSession.mockResolvedValue({
      ...playwrightSession,
      login: async (): Promise<LoginResult> => ({ ok: true }),
      listRecentPosts: async () => posts,
    });

    const outcome = await orchestrator.runOnce();

    expect(outcome.status).toBe('fatal_error');
    if (outcome.status === 'fatal_error') {
      expect(outcome.error).toBeInstanceOf(InfrastructureError);
      expect(outcome.error.message).toBe(
        'Browser session lost: page.goto: Target page, context or browser has been closed'
      );
    }
    expect((await history.getState()).records).toEqual([]);
    expect((await quota.snapshot()).postsProcessed).toBe(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
