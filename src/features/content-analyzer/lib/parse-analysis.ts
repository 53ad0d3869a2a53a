/**
 * Parse the model's reply into an analysis result
 *
 * Models often wrap JSON in markdown fences or add a sentence around it, and
 * different prompts name the fields differently, so parsing is tolerant of
 * both. Anything that is not a JSON object is a malformed response.
 */

import type { AnalysisOutcome } from '../../../entities/analysis';

/**
 * Remove a surrounding ```json fence if present
 */
export function stripCodeFences(content: string): string {
  return content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

function parseJsonObject(content: string): unknown {
  const cleaned = stripCodeFences(content);
  try {
    return JSON.parse(cleaned);
  } catch {
    // Fall back to the outermost braces when the model added prose
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return undefined;
    }
    try {
      return JSON.parse(cleaned.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFlag(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return null;
}

function firstText(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Turn the raw message content into an analysis outcome
 */
export function parseAnalysisContent(content: string): AnalysisOutcome {
  if (content.trim() === '') {
    return { ok: false, error: { kind: 'malformed_response', detail: 'empty response' } };
  }

  const parsed = parseJsonObject(content);
  if (parsed === undefined) {
    return { ok: false, error: { kind: 'malformed_response', detail: 'response is not valid JSON' } };
  }
  if (!isRecord(parsed)) {
    return { ok: false, error: { kind: 'malformed_response', detail: 'expected a JSON object' } };
  }

  const isClickbait = readFlag(parsed.is_clickbait ?? parsed.isClickbait) ?? false;
  const summary = firstText(parsed, ['summary']) ?? '';
  const commentText = firstText(parsed, ['comment_text', 'commentText', 'comment']);

  return {
    ok: true,
    value: commentText === undefined ? { isClickbait, summary } : { isClickbait, summary, commentText },
  };
}
