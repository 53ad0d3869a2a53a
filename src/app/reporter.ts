/**
 * Sentry-backed error reporter
 *
 * If SENTRY_DSN is not configured, reports are dropped.
 */

import * as Sentry from '@sentry/node';
import { noopReporter, type ErrorReporter } from '../shared/lib';

export interface AppReporter extends ErrorReporter {
  /** Wait for queued events to be sent before the process exits */
  flush(): Promise<void>;
}

/**
 * Initialise Sentry when a DSN is given and return a reporter
 */
export function createAppReporter(dsn: string | undefined): AppReporter {
  if (!dsn) {
    return { ...noopReporter, flush: async () => {} };
  }

  Sentry.init({
    dsn,
    tracesSampleRate: 1.0,
  });
  console.log('[app] Sentry error reporting enabled');

  return {
    captureException(error, context) {
      Sentry.captureException(error, context);
    },
    captureMessage(message, context) {
      Sentry.captureMessage(message, context);
    },
    async flush() {
      await Sentry.flush(2000);
    },
  };
}
