/**
 * Recognise driver errors that mean the browser itself is gone
 */

const SESSION_LOST_PATTERN =
  /Target page, context or browser has been closed|Target closed|Browser has been closed|browser has disconnected|Connection closed|ECONNREFUSED|WebSocket is not open/i;

/**
 * Check whether an error comes from a closed page, context or browser, or a
 * dropped driver connection
 */
export function isSessionLostError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'TargetClosedError' || SESSION_LOST_PATTERN.test(error.message);
}
