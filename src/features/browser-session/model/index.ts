/**
 * Browser session model exports
 */
export type { PlaywrightSessionOptions } from './types';
export { SELECTORS, ARTICLE_PARAGRAPH_SELECTORS } from './selectors';
