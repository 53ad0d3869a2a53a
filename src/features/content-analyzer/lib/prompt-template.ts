/**
 * Prompt templates - loaded from an external JSON file, never hardcoded
 */

import { readFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '../../../shared/lib';
import type { PromptTemplates } from '../model';

/**
 * Values substituted into the user prompt
 */
export interface PromptVariables {
  post_text: string;
  article_text: string;
}

const PLACEHOLDER = /\{(post_text|article_text)\}/g;

/**
 * Substitute `{post_text}` and `{article_text}` in a template
 *
 * Substitution is a single pass, so placeholder-like text inside the values is
 * left alone. Unknown placeholders are kept verbatim.
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  return template.replace(PLACEHOLDER, (_match, name: keyof PromptVariables) => variables[name]);
}

/**
 * Validate the parsed prompts document
 */
export function parsePromptTemplates(value: unknown, source: string): PromptTemplates {
  if (typeof value !== 'object' || value === null) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }

  const systemPrompt = 'system_prompt' in value ? value.system_prompt : undefined;
  const userPrompt = 'user_prompt' in value ? value.user_prompt : undefined;

  if (typeof systemPrompt !== 'string' || systemPrompt.trim() === '') {
    throw new ConfigError(`Missing key "system_prompt" in ${source}`);
  }
  if (typeof userPrompt !== 'string' || userPrompt.trim() === '') {
    throw new ConfigError(`Missing key "user_prompt" in ${source}`);
  }

  return { systemPrompt, userPrompt };
}

/**
 * Load the prompt pair from a JSON file
 */
export async function loadPromptTemplates(filePath: string): Promise<PromptTemplates> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Could not read prompts file ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`The file ${filePath} is not valid JSON`);
  }

  return parsePromptTemplates(parsed, filePath);
}
