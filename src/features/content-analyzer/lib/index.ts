/**
 * Content analyzer library exports
 */
export { loadPromptTemplates, parsePromptTemplates, renderPrompt, type PromptVariables } from './prompt-template';
export { parseAnalysisContent, stripCodeFences } from './parse-analysis';
