/**
 * Embedding implementations
 */

import type { AppConfig } from '../../config/app.config';
import type { Embedder } from '../../services/providers/retrieval-vector-utils';
import HashingEmbedding from './hashing';
import OpenAIEmbedding from './openai';

export { default as HashingEmbedding } from './hashing';
export type { HashingEmbeddingConfig } from './hashing';
export { default as OpenAIEmbedding } from './openai';
export type { OpenAIEmbeddingConfig } from './openai';

export function createEmbedding(config: AppConfig): Embedder {
  if (config.embedding.provider === 'openai') {
    return new OpenAIEmbedding({ model: config.embedding.model, apiKey: config.openaiApiKey });
  }
  return new HashingEmbedding({ dimensions: config.embedding.dimensions });
}
