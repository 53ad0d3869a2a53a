/**
 * Browser session library exports
 */
export { extractUrl, extractPostId, buildPostUrl, buildPageUrl, normalizeArticleUrl } from './url-utils';
export { joinParagraphs, pickArticleText, MIN_ARTICLE_CHARS } from './article-text';
export { isSessionLostError } from './session-lost';
