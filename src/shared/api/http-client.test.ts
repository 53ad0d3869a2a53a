import { describe, it, expect, vi } from 'vitest';
import { createHttpClient, HttpError, isTimeoutError } from './http-client';

describe('createHttpClient', () => {
  it('posts JSON to the resolved URL with default headers', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('{"ok":true}', { status: 200 }));
    const http = createHttpClient({
      baseUrl: 'https://api.example.test/v1/',
      headers: { Authorization: 'Bearer test-secret' },
      fetch: fetchMock,
    });

    expect(await http.post('items', { name: 'a' }, { params: { dryRun: true, skip: undefined } })).toEqual({ ok: true });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.test/v1/items?dryRun=true');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"name":"a"}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
  });

  it('throws HttpError with the response body', async () => {
    const http = createHttpClient({
      baseUrl: 'https://api.example.test/',
      fetch: async () => new Response('slow down', { status: 429, statusText: 'Too Many Requests' }),
    });

    const error = await http.post('items').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 429, body: 'slow down', message: 'HTTP 429 Too Many Requests: slow down' });
  });
});

describe('HttpError', () => {
  it('treats rate limits and server errors as retryable', () => {
    expect(new HttpError(429, 'Too Many Requests', '').isRetryable()).toBe(true);
    expect(new HttpError(503, 'Service Unavailable', '').isRetryable()).toBe(true);
    expect(new HttpError(400, 'Bad Request', '').isRetryable()).toBe(false);
    expect(new HttpError(402, 'Payment Required', '').isRetryable()).toBe(false);
  });
});

describe('isTimeoutError', () => {
  it('matches aborted and timed out requests only', () => {
    expect(isTimeoutError(new DOMException('timed out', 'TimeoutError'))).toBe(true);
    expect(isTimeoutError(new DOMException('aborted', 'AbortError'))).toBe(true);
    expect(isTimeoutError(new TypeError('fetch failed'))).toBe(false);
  });
});
