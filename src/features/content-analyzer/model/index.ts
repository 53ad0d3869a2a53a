/**
 * Content analyzer model exports
 */
export type { PromptTemplates, ChatMessage, ChatCompletionRequest, AnalyzerClientOptions } from './types';
