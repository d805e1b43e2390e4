// src/services/embedding-index.ts
// Policy passages and their vectors, built once and read-only afterwards. Rebuilding is wholesale.
import { z } from 'zod';
import type { Embedder, Embedding } from './providers/retrieval-vector-utils';
import { cosineSimilarity } from './providers/retrieval-vector-utils';
import type { IndexedChunk, PolicyChunk, RetrievalResult, ScoredChunk } from '@/types/policy';
import { DataError, InvalidArgumentError, UpstreamError } from '@/utils/errors';
import { logger } from './logger';

export const DEFAULT_TOP_K = 3;

const snapshotSchema = z.object({
  version: z.literal(1),
  embedderId: z.string(),
  fingerprint: z.string(),
  dimensions: z.number().int().nonnegative(),
  chunks: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      source: z.string(),
      text: z.string(),
      start: z.number().int().nonnegative(),
      end: z.number().int().nonnegative(),
      embedding: z.array(z.number().finite()),
    }),
  ),
});

/** Serialisable form of the index; treat as opaque outside this module. */
export type IndexSnapshot = z.infer<typeof snapshotSchema>;

async function embedAll(embedder: Embedder, texts: string[]): Promise<Embedding[]> {
  try {
    if (embedder.embedMany) return await embedder.embedMany(texts);
    const out: Embedding[] = [];
    for (const text of texts) out.push(await embedder.embed(text));
    return out;
  } catch (err) {
    throw UpstreamError.wrap('embedding', err);
  }
}

export class EmbeddingIndex {
  private constructor(
    private readonly embedder: Embedder,
    private readonly entries: readonly IndexedChunk[],
    readonly dimensions: number,
    /** Identifies the source documents + chunking the index was built from; see index-store. */
    readonly fingerprint: string,
  ) {}

  /**
   * Embed every chunk. All vectors must share one dimension.
   */
  static async build(
    chunks: readonly PolicyChunk[],
    embedder: Embedder,
    fingerprint = '',
  ): Promise<EmbeddingIndex> {
    const vectors = await embedAll(embedder, chunks.map((c) => c.text));
    if (vectors.length !== chunks.length) {
      throw new UpstreamError('embedding', `expected ${chunks.length} vectors, received ${vectors.length}`);
    }

    const dimensions = vectors[0]?.length ?? 0;
    const entries = chunks.map((chunk, i): IndexedChunk => {
      if (vectors[i].length !== dimensions) {
        throw new UpstreamError(
          'embedding',
          `chunk ${chunk.index} has dimension ${vectors[i].length}, expected ${dimensions}`,
        );
      }
      return Object.freeze({ ...chunk, embedding: Object.freeze([...vectors[i]]) });
    });

    logger.debug('embedding index built', { chunks: entries.length, dimensions, embedder: embedder.id });
    return new EmbeddingIndex(embedder, Object.freeze(entries), dimensions, fingerprint);
  }

  /** Restore from a snapshot written by {@link toSnapshot}. Throws DataError when malformed. */
  static fromSnapshot(snapshot: unknown, embedder: Embedder): EmbeddingIndex {
    const parsed = snapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DataError(issue.message, 'index snapshot', issue.path.join('.') || undefined);
    }
    const data = parsed.data;
    if (data.embedderId !== embedder.id) {
      throw new DataError(
        `built with embedder ${data.embedderId}, current embedder is ${embedder.id}`,
        'index snapshot',
        'embedderId',
      );
    }
    data.chunks.forEach((c, i) => {
      if (c.embedding.length !== data.dimensions) {
        throw new DataError(
          `dimension ${c.embedding.length}, expected ${data.dimensions}`,
          'index snapshot',
          `chunks.${i}.embedding`,
        );
      }
    });
    const entries = data.chunks.map((c) => Object.freeze({ ...c }));
    return new EmbeddingIndex(embedder, Object.freeze(entries), data.dimensions, data.fingerprint);
  }

  get size(): number {
    return this.entries.length;
  }

  get embedderId(): string {
    return this.embedder.id;
  }

  chunks(): PolicyChunk[] {
    return this.entries.map(({ embedding: _embedding, ...chunk }) => chunk);
  }

  /**
   * The k passages most similar to `query`, by cosine similarity; ties keep chunk order.
   * Passages whose similarity is undefined are left out.
   */
  async retrieve(query: string, k: number = DEFAULT_TOP_K): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
    }
    if (this.entries.length === 0) return [];

    let queryVector: Embedding;
    try {
      queryVector = await this.embedder.embed(query);
    } catch (err) {
      throw UpstreamError.wrap('embedding', err);
    }

    const scored: ScoredChunk[] = [];
    for (const entry of this.entries) {
      const score = cosineSimilarity(queryVector, entry.embedding);
      if (score === null) continue;
      const { embedding: _embedding, ...chunk } = entry;
      scored.push({ chunk, score });
    }
    scored.sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index);
    return scored.slice(0, k);
  }

  toSnapshot(): IndexSnapshot {
    return {
      version: 1,
      embedderId: this.embedder.id,
      fingerprint: this.fingerprint,
      dimensions: this.dimensions,
      chunks: this.entries.map((e) => ({ ...e, embedding: [...e.embedding] })),
    };
  }
}
