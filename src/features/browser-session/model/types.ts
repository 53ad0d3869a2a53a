/**
 * Browser session types
 */

import type { Sleep } from '../../../shared/lib';

/**
 * Options for the Playwright-backed session factory
 */
export interface PlaywrightSessionOptions {
  /** Platform root, e.g. https://www.facebook.com/ */
  baseUrl: string;

  headless: boolean;

  /** Connect to a running Chromium over CDP instead of launching one */
  wsEndpoint?: string;

  /** Chromium binary to launch when no endpoint is given */
  executablePath?: string;

  /** Navigation and element timeout in milliseconds */
  pageLoadTimeoutMs: number;

  /** File holding cookies between runs */
  storageStatePath: string;

  /** Scroll rounds while collecting posts from a page */
  maxScrolls?: number;

  /** Injectable for tests */
  sleep?: Sleep;
}
