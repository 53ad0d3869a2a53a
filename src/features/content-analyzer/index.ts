/**
 * Content Analyzer feature - public API
 *
 * Asks an LLM whether a post is clickbait and what to comment
 */

// API client
export { createAnalyzerClient, DEFAULT_MAX_INPUT_CHARS, type AnalyzerClient } from './api';

// Types
export type { PromptTemplates, AnalyzerClientOptions } from './model';

// Prompt and reply handling
export { loadPromptTemplates, renderPrompt, parseAnalysisContent } from './lib';
