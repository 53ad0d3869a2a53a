/**
 * Browser Session feature - public API
 *
 * Logs in, lists posts, extracts article links and text, and posts comments
 */

// API client
export { createPlaywrightSessionFactory } from './api';

// Types
export type { PlaywrightSessionOptions } from './model';

// URL and text helpers
export { extractUrl, extractPostId, buildPostUrl, normalizeArticleUrl, pickArticleText } from './lib';
