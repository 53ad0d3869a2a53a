/**
 * HTTP client utilities for making API requests
 */

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  /** Abort each request after this many milliseconds */
  timeout?: number;
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

export interface RequestOptions extends RequestInit {
  params?: Record<string, string | number | boolean | undefined>;
}

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, path: string, params?: RequestOptions['params']): string {
  const url = new URL(path, baseUrl);

  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    });
  }

  return url.toString();
}

/**
 * Create an HTTP client with default options
 */
export function createHttpClient(options: HttpClientOptions = {}) {
  const { baseUrl = '', headers: defaultHeaders = {}, timeout, fetch: fetchImpl = fetch } = options;

  function timeoutSignal(signal?: RequestInit['signal']): AbortSignal | undefined {
    if (timeout === undefined) {
      return signal ?? undefined;
    }
    const timer = AbortSignal.timeout(timeout);
    return signal ? AbortSignal.any([signal, timer]) : timer;
  }

  return {
    /**
     * Make a POST request
     */
    async post(path: string, body?: unknown, requestOptions: RequestOptions = {}): Promise<unknown> {
      const { params, headers, signal, ...fetchOptions } = requestOptions;
      const url = buildUrl(baseUrl, path, params);

      const response = await fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...defaultHeaders,
          ...headers,
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: timeoutSignal(signal),
        ...fetchOptions,
      });

      if (!response.ok) {
        throw new HttpError(response.status, response.statusText, await response.text());
      }

      return response.json();
    },
  };
}

/**
 * HTTP error with status code and response body
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = 'HttpError';
  }

  /**
   * Check if the request may succeed when repeated (rate limit or 5xx)
   */
  isRetryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

/**
 * Check if a request was aborted by the client timeout
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
