/**
 * Environment configuration for the commenter
 *
 * Read once at startup from process.env (a `.env` file is loaded first) and
 * validated into an immutable Config. Every problem is reported together.
 */

import path from 'node:path';
import type { QuotaLimits } from '../entities/daily-quota';
import type { Credentials } from '../entities/session';
import type { DelayRange } from '../processes/page-run';
import type { RunMode } from '../processes/scheduler';
import { ConfigError } from '../shared/lib';

/**
 * Base URL for the social platform
 */
export const PLATFORM_BASE_URL = 'https://www.facebook.com/';

export interface LlmConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  promptsFile: string;
  maxInputChars: number;
}

export interface BrowserConfig {
  baseUrl: string;
  headless: boolean;
  wsEndpoint?: string;
  executablePath?: string;
  pageLoadTimeoutMs: number;
  storageStatePath: string;
}

export interface Config {
  credentials: Credentials;

  /** Page slugs in visiting order */
  pages: string[];

  llm: LlmConfig;
  browser: BrowserConfig;

  maxPostsPerPage: number;
  enableComments: boolean;

  runMode: RunMode;
  runIntervalMinutes: number;

  limits: QuotaLimits;
  postDelaySeconds: DelayRange;
  pageDelaySeconds: DelayRange;

  /** Directory for persisted state */
  dataDir: string;

  /** Post records kept in history */
  postHistoryLimit: number;

  // Sentry (optional)
  sentryDsn?: string;
}

/** Longest interval a single timer can wait (2^31-1 ms) */
export const MAX_RUN_INTERVAL_MINUTES = Math.floor((2 ** 31 - 1) / 60_000);

type Env = Record<string, string | undefined>;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Reads typed values from the environment, collecting problems
 */
function createReader(env: Env) {
  const problems: string[] = [];

  function raw(name: string): string | undefined {
    const value = env[name]?.trim();
    return value === '' ? undefined : value;
  }

  return {
    problems,

    optional(name: string): string | undefined {
      return raw(name);
    },

    required(name: string): string {
      const value = raw(name);
      if (value === undefined) {
        problems.push(`${name} is required`);
        return '';
      }
      return value;
    },

    string(name: string, fallback: string): string {
      return raw(name) ?? fallback;
    },

    number(name: string, fallback: number, options: { min?: number; max?: number; integer?: boolean } = {}): number {
      const value = raw(name);
      if (value === undefined) {
        return fallback;
      }

      const parsed = Number(value);
      const { min = 0, max, integer = true } = options;
      if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed)) || parsed < min) {
        problems.push(`${name} must be ${integer ? 'an integer' : 'a number'} >= ${min} (got "${value}")`);
        return fallback;
      }
      if (max !== undefined && parsed > max) {
        problems.push(`${name} must be at most ${max} (got "${value}")`);
        return fallback;
      }
      return parsed;
    },

    boolean(name: string, fallback: boolean): boolean {
      const value = raw(name)?.toLowerCase();
      if (value === undefined) {
        return fallback;
      }
      if (TRUE_VALUES.has(value)) return true;
      if (FALSE_VALUES.has(value)) return false;
      problems.push(`${name} must be true or false (got "${value}")`);
      return fallback;
    },

    range(minName: string, maxName: string, fallback: DelayRange): DelayRange {
      const min = this.number(minName, fallback.min, { integer: false });
      const max = this.number(maxName, fallback.max, { integer: false });
      if (max < min) {
        problems.push(`${maxName} (${max}) must not be less than ${minName} (${min})`);
      }
      return { min, max };
    },
  };
}

function parseRunMode(value: string, problems: string[]): RunMode {
  const mode = value.toLowerCase();
  if (mode === 'single' || mode === 'scheduled') {
    return mode;
  }
  problems.push(`RUN_MODE must be "single" or "scheduled" (got "${value}")`);
  return 'scheduled';
}

function parsePages(value: string, problems: string[]): string[] {
  const pages = [...new Set(value.split(',').map((page) => page.trim()).filter((page) => page !== ''))];
  if (value !== '' && pages.length === 0) {
    problems.push('FACEBOOK_PAGES must list at least one page slug');
  }
  return pages;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Build and validate the configuration
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const read = createReader(env);
  const { problems } = read;

  const dataDir = read.string('DATA_DIR', 'data');

  const config: Config = {
    credentials: {
      email: read.required('FB_EMAIL'),
      password: read.required('FB_PASSWORD'),
    },
    pages: parsePages(read.required('FACEBOOK_PAGES'), problems),

    llm: {
      apiKey: read.required('OPENROUTER_API_KEY'),
      model: read.string('OPENROUTER_MODEL', 'gpt-3.5-turbo'),
      baseUrl: read.string('LLM_BASE_URL', 'https://openrouter.ai/api/v1/'),
      timeoutMs: read.number('LLM_TIMEOUT_MS', 60_000, { min: 1 }),
      promptsFile: read.string('PROMPTS_FILE', 'prompts.json'),
      maxInputChars: read.number('ANALYSIS_MAX_INPUT_CHARS', 6000, { min: 100 }),
    },

    browser: {
      baseUrl: PLATFORM_BASE_URL,
      headless: read.boolean('HEADLESS_MODE', false),
      wsEndpoint: read.optional('BROWSER_WS_ENDPOINT'),
      executablePath: read.optional('BROWSER_EXECUTABLE_PATH'),
      pageLoadTimeoutMs: read.number('PAGE_LOAD_TIMEOUT', 30, { min: 1 }) * 1000,
      storageStatePath: read.string('SESSION_STATE_FILE', path.join(dataDir, 'session-state.json')),
    },

    maxPostsPerPage: read.number('MAX_POSTS_PER_PAGE', 5, { min: 1 }),
    enableComments: read.boolean('ENABLE_COMMENTS', true),

    runMode: parseRunMode(read.string('RUN_MODE', 'scheduled'), problems),
    runIntervalMinutes: read.number('RUN_INTERVAL_MINUTES', 60, {
      min: 1,
      max: MAX_RUN_INTERVAL_MINUTES,
      integer: false,
    }),

    limits: {
      postsProcessed: read.number('DAILY_POST_LIMIT', 100),
      commentsPosted: read.number('DAILY_COMMENT_LIMIT', 50),
    },
    postDelaySeconds: read.range('MIN_DELAY_SECONDS', 'MAX_DELAY_SECONDS', { min: 1, max: 3 }),
    pageDelaySeconds: read.range('PAGE_DELAY_MIN_SECONDS', 'PAGE_DELAY_MAX_SECONDS', { min: 5, max: 10 }),

    dataDir,
    postHistoryLimit: read.number('POST_HISTORY_LIMIT', 5000, { min: 1 }),

    sentryDsn: read.optional('SENTRY_DSN'),
  };

  const baseUrl = config.llm.baseUrl;
  if (!isHttpUrl(baseUrl)) {
    problems.push(`LLM_BASE_URL must be a URL (got "${baseUrl}")`);
  } else if (!baseUrl.endsWith('/')) {
    // Relative paths resolve against the last segment otherwise
    config.llm.baseUrl = `${baseUrl}/`;
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }

  return Object.freeze(config);
}

/**
 * Exit code for a startup failure in the requested mode
 */
export function startupExitCode(env: Env = process.env): number {
  return env.RUN_MODE?.trim().toLowerCase() === 'single' ? 1 : 2;
}
