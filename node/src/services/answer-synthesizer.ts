// src/services/answer-synthesizer.ts — grounded answer from retrieved passages
import type { TextGenerator } from '@/models/base/llm';
import type { RetrievalResult } from '@/types/policy';
import { ConfigurationError, UpstreamError } from '@/utils/errors';
import { buildGroundedPrompt } from './prompt-templates';
import { logger } from './logger';

export class AnswerSynthesizer {
  constructor(private readonly generator: TextGenerator) {}

  /**
   * One generation call per question; its output is returned as-is. Failures surface as
   * UpstreamError('generation') and are not retried here.
   */
  async synthesize(query: string, retrieved: RetrievalResult): Promise<string> {
    const prompt = buildGroundedPrompt(query, retrieved);
    try {
      return await this.generator.generate(prompt);
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      const upstream = UpstreamError.wrap('generation', err);
      logger.warn('answer generation failed', { passages: retrieved.length, err: upstream.message });
      throw upstream;
    }
  }
}
