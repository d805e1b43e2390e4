/**
 * OpenAIEmbedding: OpenAI implementation of BaseEmbedding
 */

import OpenAI from 'openai';
import BaseEmbedding from '../base/embedding';
import type { Embedding } from '../../services/providers/retrieval-vector-utils';
import { ConfigurationError, UpstreamError } from '../../utils/errors';

/**
 * Configuration for OpenAI embedding model
 */
export interface OpenAIEmbeddingConfig {
  model?: string; // e.g., 'text-embedding-3-small', 'text-embedding-3-large'
  apiKey?: string; // falls back to OPENAI_API_KEY
  /** Inputs per request. */
  batchSize?: number;
}

/** The slice of the SDK client this model calls; an `OpenAI` instance satisfies it. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
    }>;
  };
}

class OpenAIEmbedding extends BaseEmbedding<Required<Omit<OpenAIEmbeddingConfig, 'apiKey'>>> {
  readonly id: string;
  private client: EmbeddingsClient;

  constructor(config: OpenAIEmbeddingConfig = {}, client?: EmbeddingsClient) {
    super({
      model: config.model || 'text-embedding-3-small',
      batchSize: config.batchSize ?? 64,
    });
    this.id = `openai:${this.config.model}`;

    if (client) {
      this.client = client;
    } else {
      const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigurationError('required when EMBEDDING_PROVIDER=openai', 'OPENAI_API_KEY');
      }
      this.client = new OpenAI({ apiKey });
    }
  }

  async embed(text: string): Promise<Embedding> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  /**
   * Embed in batches of `batchSize`; the API returns items tagged with their input index.
   */
  async embedMany(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) return [];

    const out: Embedding[] = [];
    for (let offset = 0; offset < texts.length; offset += this.config.batchSize) {
      const batch = texts.slice(offset, offset + this.config.batchSize);
      try {
        const response = await this.client.embeddings.create({ model: this.config.model, input: batch });
        if (response.data.length !== batch.length) {
          throw new UpstreamError(
            'embedding',
            `expected ${batch.length} vectors, received ${response.data.length}`,
          );
        }
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        for (const item of ordered) out.push(item.embedding);
      } catch (err) {
        throw UpstreamError.wrap('embedding', err);
      }
    }
    return out;
  }
}

export default OpenAIEmbedding;
