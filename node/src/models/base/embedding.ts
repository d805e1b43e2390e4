/**
 * BaseEmbedding: abstract base class for embedding models.
 * Every policy passage and every query goes through the same instance, so
 * implementations must be deterministic for identical input.
 */

import type { Embedder, Embedding } from '../../services/providers/retrieval-vector-utils';

abstract class BaseEmbedding<CONFIG> implements Embedder {
  constructor(protected config: CONFIG) {}

  abstract readonly id: string;

  /**
   * Embed a single text.
   */
  abstract embed(text: string): Promise<Embedding>;

  /**
   * Embed several texts, in input order. Providers with a batch endpoint override this.
   */
  async embedMany(texts: string[]): Promise<Embedding[]> {
    const out: Embedding[] = [];
    for (const text of texts) {
      out.push(await this.embed(text));
    }
    return out;
  }
}

export default BaseEmbedding;
