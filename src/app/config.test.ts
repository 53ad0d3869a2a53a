import { describe, it, expect } from 'vitest';
import { ConfigError } from '../shared/lib';
import { MAX_RUN_INTERVAL_MINUTES, loadConfig, startupExitCode } from './config';

const baseEnv = {
  FB_EMAIL: 'bot@example.test',
  FB_PASSWORD: 'test-secret',
  FACEBOOK_PAGES: 'localnews, citypaper ,localnews',
  OPENROUTER_API_KEY: 'test-key',
};

describe('loadConfig', () => {
  it('applies the defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.pages).toEqual(['localnews', 'citypaper']);
    expect(config.credentials).toEqual({ email: 'bot@example.test', password: 'test-secret' });
    expect(config.llm).toEqual({
      apiKey: 'test-key',
      model: 'gpt-3.5-turbo',
      baseUrl: 'https://openrouter.ai/api/v1/',
      timeoutMs: 60_000,
      promptsFile: 'prompts.json',
      maxInputChars: 6000,
    });
    expect(config.browser).toMatchObject({
      headless: false,
      pageLoadTimeoutMs: 30_000,
      storageStatePath: 'data/session-state.json',
    });
    expect(config.runMode).toBe('scheduled');
    expect(config.runIntervalMinutes).toBe(60);
    expect(config.maxPostsPerPage).toBe(5);
    expect(config.enableComments).toBe(true);
    expect(config.limits).toEqual({ postsProcessed: 100, commentsPosted: 50 });
    expect(config.postDelaySeconds).toEqual({ min: 1, max: 3 });
    expect(config.pageDelaySeconds).toEqual({ min: 5, max: 10 });
    expect(config.postHistoryLimit).toBe(5000);
    expect(config.sentryDsn).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      RUN_MODE: 'Single',
      ENABLE_COMMENTS: 'no',
      HEADLESS_MODE: '1',
      DAILY_POST_LIMIT: '0',
      MIN_DELAY_SECONDS: '0.5',
      MAX_DELAY_SECONDS: '2',
      DATA_DIR: '/var/lib/commenter',
      LLM_BASE_URL: 'http://localhost:8080/v1',
      BROWSER_WS_ENDPOINT: 'ws://127.0.0.1:9222/devtools/browser/test',
    });

    expect(config.runMode).toBe('single');
    expect(config.enableComments).toBe(false);
    expect(config.browser.headless).toBe(true);
    expect(config.browser.wsEndpoint).toBe('ws://127.0.0.1:9222/devtools/browser/test');
    expect(config.browser.storageStatePath).toBe('/var/lib/commenter/session-state.json');
    expect(config.limits.postsProcessed).toBe(0);
    expect(config.postDelaySeconds).toEqual({ min: 0.5, max: 2 });
    expect(config.llm.baseUrl).toBe('http://localhost:8080/v1/');
  });

  it('reports every missing required variable', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration:\n' +
        '  - FB_EMAIL is required\n' +
        '  - FB_PASSWORD is required\n' +
        '  - FACEBOOK_PAGES is required\n' +
        '  - OPENROUTER_API_KEY is required'
    );
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ ...baseEnv, MAX_POSTS_PER_PAGE: 'abc' })).toThrow(
      'MAX_POSTS_PER_PAGE must be an integer >= 1 (got "abc")'
    );
    expect(() => loadConfig({ ...baseEnv, ENABLE_COMMENTS: 'maybe' })).toThrow(
      'ENABLE_COMMENTS must be true or false (got "maybe")'
    );
    expect(() => loadConfig({ ...baseEnv, RUN_MODE: 'hourly' })).toThrow(
      'RUN_MODE must be "single" or "scheduled" (got "hourly")'
    );
    expect(() => loadConfig({ ...baseEnv, PAGE_DELAY_MIN_SECONDS: '10', PAGE_DELAY_MAX_SECONDS: '5' })).toThrow(
      'PAGE_DELAY_MAX_SECONDS (5) must not be less than PAGE_DELAY_MIN_SECONDS (10)'
    );
    expect(() => loadConfig({ ...baseEnv, FACEBOOK_PAGES: ' , ' })).toThrow(
      'FACEBOOK_PAGES must list at least one page slug'
    );
  });

  it('caps the run interval at what a single timer can wait', () => {
    expect(MAX_RUN_INTERVAL_MINUTES).toBe(35791);
    expect(loadConfig({ ...baseEnv, RUN_INTERVAL_MINUTES: '35791' }).runIntervalMinutes).toBe(35791);
    expect(() => loadConfig({ ...baseEnv, RUN_INTERVAL_MINUTES: '40000' })).toThrow(
      'RUN_INTERVAL_MINUTES must be at most 35791 (got "40000")'
    );
  });
});

describe('startupExitCode', () => {
  it('uses 1 for single mode and 2 otherwise', () => {
    expect(startupExitCode({ RUN_MODE: 'single' })).toBe(1);
    expect(startupExitCode({ RUN_MODE: 'scheduled' })).toBe(2);
    expect(startupExitCode({})).toBe(2);
  });
});
