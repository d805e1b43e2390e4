/**
 * HashingEmbedding: deterministic bag-of-words vectors (feature hashing, L2-normalised).
 * Needs no network, so it is the default provider and the one tests run against.
 */

import BaseEmbedding from '../base/embedding';
import { tokenize, type Embedding } from '../../services/providers/retrieval-vector-utils';

/** Tokens skipped before hashing. */
const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from', 'has', 'have',
  'how', 'i', 'in', 'is', 'it', 'of', 'on', 'or', 'the', 'to', 'what', 'with', 'need', 'needs',
]);

export interface HashingEmbeddingConfig {
  dimensions?: number;
}

class HashingEmbedding extends BaseEmbedding<Required<HashingEmbeddingConfig>> {
  readonly id: string;

  constructor(config: HashingEmbeddingConfig = {}) {
    super({ dimensions: config.dimensions ?? 256 });
    this.id = `hashing:${this.config.dimensions}`;
  }

  async embed(text: string): Promise<Embedding> {
    const dim = this.config.dimensions;
    const vec: number[] = new Array(dim).fill(0);

    for (const token of tokenize(text)) {
      if (STOP_WORDS.has(token)) continue;
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}

export default HashingEmbedding;
