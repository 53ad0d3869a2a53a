/**
 * Shared API utilities
 */
export {
  createHttpClient,
  HttpError,
  isTimeoutError,
  type HttpClientOptions,
  type RequestOptions,
} from './http-client';
