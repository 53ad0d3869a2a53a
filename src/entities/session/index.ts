/**
 * Session entity - public API
 */
export type {
  Credentials,
  LoginError,
  CommentError,
  LoginResult,
  CommentResult,
  BrowserSession,
  SessionFactory,
} from './types';
