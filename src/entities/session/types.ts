/**
 * Browser session contract
 *
 * Every call is network-bound and may fail. Implementations do not retry;
 * retry policy belongs to the caller.
 */

import type { PostHandle } from '../post-record';

/**
 * Platform login credentials
 */
export interface Credentials {
  email: string;
  password: string;
}

/**
 * Why a login attempt failed
 */
export interface LoginError {
  kind: 'invalid_credentials' | 'verification_required' | 'unreachable';
  detail: string;
}

/**
 * Why a comment could not be published
 */
export interface CommentError {
  kind: 'comment_box_missing' | 'submit_failed';
  detail: string;
}

export type LoginResult = { ok: true } | { ok: false; error: LoginError };

export type CommentResult = { ok: true } | { ok: false; error: CommentError };

/**
 * One logged-in browser session, shared by every stage of a run
 */
export interface BrowserSession {
  login(credentials: Credentials): Promise<LoginResult>;

  /** Most recent posts on a page, newest first, at most `max` */
  listRecentPosts(pageSlug: string, max: number): Promise<PostHandle[]>;

  /** URL of the external article a post links to, if any */
  extractArticleLink(post: PostHandle): Promise<string | null>;

  /** Readable text of an article, if any */
  extractArticleText(url: string): Promise<string | null>;

  postComment(post: PostHandle, text: string): Promise<CommentResult>;

  close(): Promise<void>;
}

/**
 * Opens a new browser session; throws when the driver is unreachable
 */
export type SessionFactory = () => Promise<BrowserSession>;
