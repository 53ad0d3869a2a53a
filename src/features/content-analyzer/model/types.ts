/**
 * Content analyzer types
 */

/**
 * System and user prompt pair loaded from the prompts file
 *
 * The user prompt may contain `{post_text}` and `{article_text}` placeholders.
 */
export interface PromptTemplates {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Chat message sent to the provider
 */
export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Request body for an OpenAI-compatible chat completions endpoint
 */
export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  response_format?: { type: 'json_object' };
}

/**
 * Options for creating the analyzer client
 */
export interface AnalyzerClientOptions {
  apiKey: string;
  model: string;

  /** Endpoint base, e.g. https://openrouter.ai/api/v1/ */
  baseUrl: string;

  /** Abort a request after this many milliseconds */
  timeoutMs: number;

  prompts: PromptTemplates;

  /** Truncate each input text to this many characters */
  maxInputChars?: number;

  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}
