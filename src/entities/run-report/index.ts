/**
 * Run report entity - public API
 */
export type { RunError, RunReport, RunOutcome } from './types';

export { createRunReport, recordRunError, formatRunReport } from './report';
