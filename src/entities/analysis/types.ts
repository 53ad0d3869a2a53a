/**
 * Content analysis contract
 */

/**
 * Structured result of analysing a post and its linked article
 */
export interface AnalysisResult {
  /** Whether the post headline misrepresents the article */
  isClickbait: boolean;

  /** Short summary of the article */
  summary: string;

  /** Comment to publish; absent means "do not comment" */
  commentText?: string;
}

/**
 * Why an analysis request failed
 */
export type AnalysisError =
  | { kind: 'timeout' }
  | { kind: 'malformed_response'; detail: string }
  | { kind: 'provider_error'; code: number | null; detail: string };

/**
 * Outcome of an analysis request - never thrown
 */
export type AnalysisOutcome =
  | { ok: true; value: AnalysisResult }
  | { ok: false; error: AnalysisError };

/**
 * Anything that can analyse a post/article pair
 */
export interface ContentAnalyzer {
  analyze(postText: string, articleText: string): Promise<AnalysisOutcome>;
}

/**
 * Describe an analysis error for logs and run reports
 */
export function describeAnalysisError(error: AnalysisError): string {
  switch (error.kind) {
    case 'timeout':
      return 'analysis timed out';
    case 'malformed_response':
      return `malformed analysis response: ${error.detail}`;
    case 'provider_error':
      return `provider error${error.code === null ? '' : ` ${error.code}`}: ${error.detail}`;
  }
}
