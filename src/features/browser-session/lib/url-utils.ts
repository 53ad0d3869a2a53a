/**
 * URL helpers for post permalinks and outbound article links
 */

/** First URL-looking token, with or without a scheme */
const URL_PATTERN = /(https?:\/\/\S+|www\.\S+|[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}(?:\/\S*)?)/;

/** Post identifier segment of a permalink */
const POST_ID_PATTERN = /\/posts\/(pfbid\w+)/;

/** Punctuation that ends a sentence rather than a URL */
const TRAILING_PUNCTUATION = /[)\].,;:!?'"]+$/;

/** Tracking parameters the platform appends to outbound links */
const TRACKING_PARAMS = ['fbclid'];

/**
 * Extract the first URL from free text
 */
export function extractUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const url = match[0].replace(TRAILING_PUNCTUATION, '');
  return url === '' ? null : url;
}

/**
 * Extract the post ID from a post permalink
 */
export function extractPostId(postLink: string): string | null {
  const match = POST_ID_PATTERN.exec(postLink);
  return match ? match[1] : null;
}

/**
 * Build the permalink of a post on a page
 */
export function buildPostUrl(baseUrl: string, pageSlug: string, postId: string): string {
  return new URL(`${encodeURIComponent(pageSlug)}/posts/${postId}`, baseUrl).toString();
}

/**
 * Build the URL of a page
 */
export function buildPageUrl(baseUrl: string, pageSlug: string): string {
  return new URL(encodeURIComponent(pageSlug), baseUrl).toString();
}

/**
 * Add a scheme to bare links and follow the platform's outbound redirect
 *
 * Returns null when the value cannot be parsed as an http(s) URL.
 */
export function normalizeArticleUrl(raw: string): string | null {
  const trimmed = raw.trim().replace(TRAILING_PUNCTUATION, '');
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }

  const isRedirect = /(^|\.)facebook\.com$/i.test(url.hostname) && url.pathname === '/l.php';
  const target = isRedirect ? url.searchParams.get('u') : null;
  if (target) {
    return normalizeArticleUrl(target);
  }

  for (const param of TRACKING_PARAMS) {
    url.searchParams.delete(param);
  }
  return url.toString();
}
