/**
 * LLM analyzer client
 *
 * Sends the post text and article text to an OpenAI-compatible chat
 * completions endpoint (OpenRouter by default) and asks for a JSON object
 * back. Failures come back as values, never as exceptions, so a bad reply
 * only fails the one post.
 */

import { createHttpClient, HttpError, isTimeoutError } from '../../../shared/api';
import { errorMessage, preview, truncateText } from '../../../shared/lib';
import type { AnalysisOutcome, ContentAnalyzer } from '../../../entities/analysis';
import type { AnalyzerClientOptions, ChatCompletionRequest } from '../model';
import { parseAnalysisContent, renderPrompt } from '../lib';

/** Default cap on each input text sent to the model */
export const DEFAULT_MAX_INPUT_CHARS = 6000;

/**
 * Pull the assistant message out of a chat completions response
 *
 * Some providers answer 200 with an `error` object instead of choices.
 */
function readCompletion(body: unknown): { content: string } | { error: string; code: number | null } {
  if (typeof body !== 'object' || body === null) {
    return { error: 'response body is not an object', code: null };
  }

  if ('error' in body && typeof body.error === 'object' && body.error !== null) {
    const code = 'code' in body.error && typeof body.error.code === 'number' ? body.error.code : null;
    const message = 'message' in body.error && typeof body.error.message === 'string' ? body.error.message : 'unknown error';
    return { error: message, code };
  }

  const choices = 'choices' in body ? body.choices : undefined;
  if (!Array.isArray(choices) || choices.length === 0) {
    return { error: 'response has no choices', code: null };
  }

  const first: unknown = choices[0];
  const message = typeof first === 'object' && first !== null && 'message' in first ? first.message : undefined;
  const content =
    typeof message === 'object' && message !== null && 'content' in message ? message.content : undefined;

  if (typeof content !== 'string') {
    return { error: 'response message has no content', code: null };
  }
  return { content };
}

/**
 * Create a content analyzer backed by a chat completions API
 */
export function createAnalyzerClient(options: AnalyzerClientOptions) {
  const { apiKey, model, baseUrl, timeoutMs, prompts, maxInputChars = DEFAULT_MAX_INPUT_CHARS } = options;

  const http = createHttpClient({
    baseUrl,
    timeout: timeoutMs,
    fetch: options.fetch,
    headers: {
      Authorization: `Bearer ${apiKey}`,
    },
  });

  return {
    /**
     * Analyse a post and the article it links to
     */
    async analyze(postText: string, articleText: string): Promise<AnalysisOutcome> {
      const request: ChatCompletionRequest = {
        model,
        messages: [
          { role: 'system', content: prompts.systemPrompt },
          {
            role: 'user',
            content: renderPrompt(prompts.userPrompt, {
              post_text: truncateText(postText, maxInputChars),
              article_text: truncateText(articleText, maxInputChars),
            }),
          },
        ],
        response_format: { type: 'json_object' },
      };

      let body: unknown;
      try {
        body = await http.post('chat/completions', request);
      } catch (error) {
        if (isTimeoutError(error)) {
          console.warn(`[analyzer] Request timed out after ${timeoutMs}ms`);
          return { ok: false, error: { kind: 'timeout' } };
        }
        if (error instanceof HttpError) {
          const retryable = error.isRetryable() ? ' (retryable)' : '';
          console.warn(`[analyzer] Provider returned HTTP ${error.status}${retryable}`);
          return {
            ok: false,
            error: { kind: 'provider_error', code: error.status, detail: preview(error.body || error.statusText, 200) },
          };
        }
        if (error instanceof SyntaxError) {
          return { ok: false, error: { kind: 'malformed_response', detail: 'response body is not JSON' } };
        }
        console.warn('[analyzer] Request failed:', errorMessage(error));
        return { ok: false, error: { kind: 'provider_error', code: null, detail: errorMessage(error) } };
      }

      const completion = readCompletion(body);
      if ('error' in completion) {
        if (completion.code !== null) {
          return { ok: false, error: { kind: 'provider_error', code: completion.code, detail: completion.error } };
        }
        return { ok: false, error: { kind: 'malformed_response', detail: completion.error } };
      }

      const outcome = parseAnalysisContent(completion.content);
      if (outcome.ok) {
        console.log(
          `[analyzer] Clickbait: ${outcome.value.isClickbait ? 'yes' : 'no'}, comment: ${outcome.value.commentText ? 'yes' : 'no'}`
        );
      } else {
        console.warn(`[analyzer] Could not parse reply: ${preview(completion.content)}`);
      }
      return outcome;
    },
  } satisfies ContentAnalyzer;
}

/**
 * Type for the analyzer client
 */
export type AnalyzerClient = ReturnType<typeof createAnalyzerClient>;
