/**
 * LLM implementations
 */

import type { AppConfig } from '../../config/app.config';
import type { TextGenerator } from '../base/llm';
import OpenAILLM from './openai';

export { default as OpenAILLM, DEFAULT_SYSTEM_PROMPT } from './openai';
export type { OpenAILLMConfig } from './openai';

/**
 * The SDK client is created on first use, so flight search runs without an API key;
 * a missing key surfaces as ConfigurationError from the first policy answer.
 */
export function createTextGenerator(config: AppConfig): TextGenerator {
  let llm: OpenAILLM | null = null;
  return {
    async generate(prompt: string): Promise<string> {
      llm ??= new OpenAILLM({
        model: config.llm.model,
        apiKey: config.openaiApiKey,
        baseURL: config.llm.baseURL,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
      });
      return llm.generate(prompt);
    },
  };
}
