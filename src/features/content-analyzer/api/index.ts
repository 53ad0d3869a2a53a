/**
 * Content analyzer API exports
 */
export { createAnalyzerClient, DEFAULT_MAX_INPUT_CHARS, type AnalyzerClient } from './analyzer-client';
