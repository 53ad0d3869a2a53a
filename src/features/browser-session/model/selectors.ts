/**
 * Platform UI selectors, kept in one place for maintenance
 */
export const SELECTORS = {
  /** Login form */
  emailField: 'input#email',
  passwordField: 'input#pass',
  loginButton: 'button[name="login"]',

  /** Any of these means the session is logged in */
  loggedIn: 'div[aria-label="Facebook"][role="navigation"], div[role="feed"], input[aria-label="Search Facebook"]',

  /** Human verification or security check heading */
  verification: 'h2:text-matches("verify|challenge|human", "i")',

  /** One post in a page timeline */
  timelinePost: 'div[data-virtualized]',

  /** Timestamp link that reveals the permalink on hover */
  postTimestampLink: 'span > a[target="_blank"][role="link"]',

  /** Permalink anchor, once revealed */
  postPermalink: 'a[href*="/posts/"][role="link"]',

  /** Post message body */
  postMessage: 'div[data-ad-comet-preview="message"]',

  /** Post opened as an overlay */
  postDialog: 'div[aria-labelledby][role="dialog"]',

  /** Post opened on its own page */
  postMain: 'div[role="main"]',

  /** Link preview card */
  articleCard: 'a[aria-label][attributionsrc][href][tabindex="0"][role="link"][target="_blank"]',

  /** Outbound links posted in the comment section */
  commentLink: 'a[attributionsrc][rel="nofollow noreferrer"][role="link"][tabindex="0"][target="_blank"]',

  /** Comment composer */
  commentBox: 'div[role="textbox"][contenteditable="true"]',
} as const;

/**
 * Article body containers, most specific first
 */
export const ARTICLE_PARAGRAPH_SELECTORS = ['article p', 'main p', '[role="main"] p', 'p'] as const;
