/**
 * Error reporting seam - Sentry in the app, a no-op elsewhere
 */

export interface ReportContext {
  level?: 'fatal' | 'error' | 'warning' | 'info';
  tags?: Record<string, string>;
  extra?: Record<string, unknown>;
}

export interface ErrorReporter {
  captureException(error: unknown, context?: ReportContext): void;
  captureMessage(message: string, context?: ReportContext): void;
}

/**
 * Reporter that drops everything (used when no DSN is configured)
 */
export const noopReporter: ErrorReporter = {
  captureException() {},
  captureMessage() {},
};
