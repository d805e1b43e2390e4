/**
 * OpenAILLM: chat-completions implementation of BaseLLM.
 * `baseURL` points the SDK at any OpenAI-compatible endpoint (Groq, a local gateway).
 */

import OpenAI from 'openai';
import BaseLLM from '../base/llm';
import { ConfigurationError, UpstreamError } from '../../utils/errors';

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful travel assistant specializing in international flight bookings and travel policies.
Be friendly, professional and concise. If you don't know something, say so honestly.`;

/**
 * Configuration for OpenAI LLM
 */
export interface OpenAILLMConfig {
  model?: string; // e.g., 'gpt-4o-mini', 'llama-3.3-70b-versatile' behind a compatible baseURL
  apiKey?: string; // falls back to OPENAI_API_KEY
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

/** The slice of the SDK client this model calls; an `OpenAI` instance satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'system' | 'user'; content: string }>;
        temperature: number;
        max_tokens: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

type ResolvedConfig = Required<Omit<OpenAILLMConfig, 'apiKey' | 'baseURL'>>;

class OpenAILLM extends BaseLLM<ResolvedConfig> {
  private client: ChatCompletionsClient;

  constructor(config: OpenAILLMConfig = {}, client?: ChatCompletionsClient) {
    super({
      model: config.model || 'gpt-4o-mini',
      temperature: config.temperature ?? 0,
      maxTokens: config.maxTokens ?? 2048,
      systemPrompt: config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    });

    if (client) {
      this.client = client;
    } else {
      const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigurationError('required for text generation', 'OPENAI_API_KEY');
      }
      this.client = new OpenAI({ apiKey, baseURL: config.baseURL });
    }
  }

  async generate(prompt: string): Promise<string> {
    try {
      const res = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: this.config.systemPrompt },
          { role: 'user', content: prompt },
        ],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      });
      return res.choices[0]?.message.content ?? '';
    } catch (err) {
      throw UpstreamError.wrap('generation', err);
    }
  }
}

export default OpenAILLM;
