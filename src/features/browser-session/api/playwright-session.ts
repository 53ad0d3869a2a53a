/**
 * Playwright-backed browser session
 *
 * Drives Chromium either over CDP (BROWSER_WS_ENDPOINT) or by launching a
 * local binary. Cookies are kept in a storage state file so later runs can
 * skip the login form.
 */

import { existsSync } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import {
  chromium,
  type Browser,
  type BrowserContext,
  type Keyboard,
  type Locator,
  type Mouse,
  type Page,
} from 'playwright-core';
import { ExtractionError, InfrastructureError, errorMessage, sleep as defaultSleep, waitRandom } from '../../../shared/lib';
import type { PostHandle } from '../../../entities/post-record';
import type { BrowserSession, CommentResult, Credentials, LoginResult, SessionFactory } from '../../../entities/session';
import { ARTICLE_PARAGRAPH_SELECTORS, SELECTORS, type PlaywrightSessionOptions } from '../model';
import {
  buildPageUrl,
  buildPostUrl,
  extractPostId,
  extractUrl,
  isSessionLostError,
  normalizeArticleUrl,
  pickArticleText,
} from '../lib';

/** Default scroll rounds while collecting posts */
const DEFAULT_MAX_SCROLLS = 5;

/** Wait for optional elements this long before giving up */
const PROBE_TIMEOUT_MS = 5000;

/** Typing delay per character when commenting */
const TYPING_DELAY_MS = 60;

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

async function isVisible(locator: Locator, timeout: number): Promise<boolean> {
  try {
    await locator.first().waitFor({ state: 'visible', timeout });
    return true;
  } catch {
    return false;
  }
}

async function openBrowser(options: PlaywrightSessionOptions): Promise<Browser> {
  try {
    if (options.wsEndpoint) {
      console.log(`[browser] Connecting to ${options.wsEndpoint}`);
      return await chromium.connectOverCDP(options.wsEndpoint, { timeout: options.pageLoadTimeoutMs });
    }

    console.log(`[browser] Launching Chromium (headless=${options.headless})`);
    return await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: ['--disable-blink-features=AutomationControlled', '--no-sandbox', '--window-size=1280,900'],
    });
  } catch (error) {
    throw new InfrastructureError(`Browser driver unreachable: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * The parts of the main tab the session drives
 */
export interface SessionPage {
  goto: Page['goto'];
  url: Page['url'];
  locator: Page['locator'];
  isClosed: Page['isClosed'];
  waitForLoadState: Page['waitForLoadState'];
  keyboard: Pick<Keyboard, 'press'>;
  mouse: Pick<Mouse, 'wheel'>;
}

/** Extra tab opened to read an article */
type ArticlePage = Pick<Page, 'goto' | 'locator' | 'close'>;

export interface SessionHandles {
  browser: Pick<Browser, 'isConnected' | 'close'>;
  context: Pick<BrowserContext, 'storageState' | 'close'> & { newPage(): Promise<ArticlePage> };
  page: SessionPage;
}

/**
 * Wrap an open browser page as a session
 */
export function createPlaywrightSession(handles: SessionHandles, options: PlaywrightSessionOptions): BrowserSession {
  const { browser, context, page } = handles;
  const { baseUrl, pageLoadTimeoutMs, storageStatePath, maxScrolls = DEFAULT_MAX_SCROLLS, sleep = defaultSleep } = options;

  /**
   * Throw InfrastructureError when the browser or the main tab is gone
   */
  function ensureAlive(cause?: unknown): void {
    if (cause instanceof InfrastructureError) {
      throw cause;
    }
    if (!browser.isConnected() || page.isClosed() || isSessionLostError(cause)) {
      const detail = cause === undefined ? 'browser disconnected' : errorMessage(cause);
      throw new InfrastructureError(`Browser session lost: ${detail}`, { cause });
    }
  }

  async function saveSession(): Promise<void> {
    await mkdir(path.dirname(storageStatePath), { recursive: true });
    await context.storageState({ path: storageStatePath });
    console.log(`[browser] Session cookies saved to ${storageStatePath}`);
  }

  async function forgetSession(): Promise<void> {
    await rm(storageStatePath, { force: true });
  }

  /**
   * Navigate to a post and return the element that contains it
   */
  async function openPost(post: PostHandle): Promise<Locator> {
    if (page.url() !== post.postUrl) {
      await page.goto(post.postUrl, { waitUntil: 'domcontentloaded' });
    }

    const dialog = page.locator(SELECTORS.postDialog);
    if (await isVisible(dialog, PROBE_TIMEOUT_MS)) {
      return dialog.first();
    }
    return page.locator(SELECTORS.postMain).first();
  }

  /**
   * Read the permalink and text of one timeline entry
   */
  async function readTimelinePost(post: Locator, pageSlug: string): Promise<PostHandle | null> {
    try {
      await post.scrollIntoViewIfNeeded();
      await post.locator(SELECTORS.postTimestampLink).first().hover({ timeout: PROBE_TIMEOUT_MS });
      await waitRandom(0.5, 1.5, { sleep });

      const href = await post.locator(SELECTORS.postPermalink).first().getAttribute('href', { timeout: PROBE_TIMEOUT_MS });
      const postId = href ? extractPostId(href) : null;
      if (!postId) {
        return null;
      }

      const message = post.locator(SELECTORS.postMessage).first();
      const text = (await message.count()) > 0 ? (await message.innerText()).trim() : '';

      return { postId, pageSlug, postUrl: buildPostUrl(baseUrl, pageSlug, postId), text };
    } catch (error) {
      ensureAlive(error);
      console.warn(`[browser] Could not read a post on ${pageSlug}: ${errorMessage(error)}`);
      return null;
    }
  }

  async function linkFromCard(scope: Locator): Promise<string | null> {
    const card = scope.locator(SELECTORS.articleCard).first();
    if (!(await isVisible(card, PROBE_TIMEOUT_MS))) {
      return null;
    }
    // Hovering swaps the tracking href for the real one
    await card.hover();
    await waitRandom(1.5, 2.5, { sleep });
    const href = await card.getAttribute('href');
    return href ? normalizeArticleUrl(href) : null;
  }

  async function linkFromComments(scope: Locator): Promise<string | null> {
    for (const link of await scope.locator(SELECTORS.commentLink).all()) {
      const labelled =
        (await link.getAttribute('aria-label')) !== null || (await link.getAttribute('aria-labelledby')) !== null;
      if (labelled) {
        continue;
      }

      const href = await link.getAttribute('href');
      const label = (await link.innerText()).trim();
      const url = href && label ? normalizeArticleUrl(href) : null;
      if (url) {
        return url;
      }
    }
    return null;
  }

  return {
    async login(credentials: Credentials): Promise<LoginResult> {
      try {
        await page.goto(baseUrl, { waitUntil: 'domcontentloaded' });
      } catch (error) {
        return { ok: false, error: { kind: 'unreachable', detail: errorMessage(error) } };
      }

      if (await isVisible(page.locator(SELECTORS.loggedIn), PROBE_TIMEOUT_MS)) {
        console.log('[browser] Logged in with stored session');
        return { ok: true };
      }

      console.log('[browser] Logging in with credentials');
      try {
        await page.locator(SELECTORS.emailField).fill(credentials.email);
        await page.locator(SELECTORS.passwordField).fill(credentials.password);
        await page.locator(SELECTORS.loginButton).first().click();
        await page.waitForLoadState('domcontentloaded');
      } catch (error) {
        return { ok: false, error: { kind: 'unreachable', detail: `Login form not usable: ${errorMessage(error)}` } };
      }

      const url = page.url();
      if (/two_step_verification|checkpoint/.test(url) || (await isVisible(page.locator(SELECTORS.verification), 3000))) {
        await forgetSession();
        return { ok: false, error: { kind: 'verification_required', detail: `Verification requested at ${url}` } };
      }

      if (await isVisible(page.locator(SELECTORS.loggedIn), pageLoadTimeoutMs)) {
        // Dismiss the "save password" prompt
        await page.keyboard.press('Escape');
        await saveSession();
        return { ok: true };
      }

      await forgetSession();
      return { ok: false, error: { kind: 'invalid_credentials', detail: 'No logged-in indicator after submitting the form' } };
    },

    async listRecentPosts(pageSlug: string, max: number): Promise<PostHandle[]> {
      const found = new Map<string, PostHandle>();

      try {
        await page.goto(buildPageUrl(baseUrl, pageSlug), { waitUntil: 'domcontentloaded' });
        let inspected = 0;

        for (let round = 0; round <= maxScrolls && found.size < max; round++) {
          const posts = page.locator(SELECTORS.timelinePost);
          const count = await posts.count();
          // The timeline is virtualized; start over if nodes were recycled
          const start = count < inspected ? 0 : inspected;

          for (let i = start; i < count && found.size < max; i++) {
            const handle = await readTimelinePost(posts.nth(i), pageSlug);
            if (handle && !found.has(handle.postId)) {
              found.set(handle.postId, handle);
            }
          }
          inspected = count;

          if (found.size < max) {
            await page.mouse.wheel(0, 2000);
            await sleep(1000);
          }
        }
      } catch (error) {
        ensureAlive(error);
        throw error;
      }

      if (found.size === 0) {
        ensureAlive();
      }
      console.log(`[browser] Found ${found.size} posts on ${pageSlug}`);
      return [...found.values()];
    },

    async extractArticleLink(post: PostHandle): Promise<string | null> {
      try {
        const scope = await openPost(post);

        const fromCard = await linkFromCard(scope);
        if (fromCard) {
          console.log(`[browser] Article link from preview card: ${fromCard}`);
          return fromCard;
        }

        const inText = extractUrl(post.text);
        const fromText = inText ? normalizeArticleUrl(inText) : null;
        if (fromText) {
          console.log(`[browser] Article link from post text: ${fromText}`);
          return fromText;
        }

        const fromComments = await linkFromComments(scope);
        if (fromComments) {
          console.log(`[browser] Article link from author comment: ${fromComments}`);
          return fromComments;
        }
      } catch (error) {
        ensureAlive(error);
        throw error;
      }

      // Probes time out quietly on a dead page
      ensureAlive();
      return null;
    },

    async extractArticleText(url: string): Promise<string | null> {
      let articlePage: ArticlePage;
      try {
        articlePage = await context.newPage();
      } catch (error) {
        ensureAlive(error);
        throw new ExtractionError(`Could not open a tab for ${url}: ${errorMessage(error)}`, { cause: error });
      }

      try {
        await articlePage.goto(url, { waitUntil: 'domcontentloaded' });
        await waitRandom(2, 3, { sleep });

        const groups: string[][] = [];
        for (const selector of ARTICLE_PARAGRAPH_SELECTORS) {
          groups.push(await articlePage.locator(selector).allInnerTexts());
        }

        const text = pickArticleText(groups);
        console.log(text ? `[browser] Article text: ${text.length} characters` : `[browser] No article text at ${url}`);
        return text;
      } catch (error) {
        ensureAlive(error);
        throw new ExtractionError(`Could not read article ${url}: ${errorMessage(error)}`, { cause: error });
      } finally {
        await articlePage.close().catch((error: unknown) => {
          console.warn(`[browser] Failed to close article tab: ${errorMessage(error)}`);
        });
      }
    },

    async postComment(post: PostHandle, text: string): Promise<CommentResult> {
      let box: Locator;
      try {
        box = (await openPost(post)).locator(SELECTORS.commentBox).first();
      } catch (error) {
        ensureAlive(error);
        return { ok: false, error: { kind: 'comment_box_missing', detail: errorMessage(error) } };
      }

      if (!(await isVisible(box, PROBE_TIMEOUT_MS))) {
        ensureAlive();
        return { ok: false, error: { kind: 'comment_box_missing', detail: `No comment box on ${post.postUrl}` } };
      }

      try {
        await box.scrollIntoViewIfNeeded();
        await waitRandom(0.5, 1.5, { sleep });
        await box.click();
        // Enter submits, so the comment goes in as a single line
        await box.pressSequentially(text.replace(/\s*\n\s*/g, ' '), { delay: TYPING_DELAY_MS });
        await waitRandom(0.5, 1.5, { sleep });
        await box.press('Enter');
        await waitRandom(1, 2, { sleep });
      } catch (error) {
        ensureAlive(error);
        return { ok: false, error: { kind: 'submit_failed', detail: errorMessage(error) } };
      }

      console.log(`[browser] Commented on ${post.postId}`);
      return { ok: true };
    },

    async close(): Promise<void> {
      try {
        await context.close();
      } finally {
        await browser.close();
      }
      console.log('[browser] Session closed');
    },
  };
}

/**
 * Create a factory that opens a fresh browser session per run
 */
export function createPlaywrightSessionFactory(options: PlaywrightSessionOptions): SessionFactory {
  return async () => {
    const browser = await openBrowser(options);

    try {
      const context = await browser.newContext({
        storageState: existsSync(options.storageStatePath) ? options.storageStatePath : undefined,
        viewport: { width: 1280, height: 900 },
        userAgent: USER_AGENT,
      });
      context.setDefaultTimeout(options.pageLoadTimeoutMs);
      context.setDefaultNavigationTimeout(options.pageLoadTimeoutMs);

      const page = await context.newPage();
      return createPlaywrightSession({ browser, context, page }, options);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        console.warn('[browser] Failed to close browser after setup error:', closeError);
      });
      throw new InfrastructureError(`Could not open a browser page: ${errorMessage(error)}`, { cause: error });
    }
  };
}
