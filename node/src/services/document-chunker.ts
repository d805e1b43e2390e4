// src/services/document-chunker.ts
// Split policy documents into overlapping passages. A chunk never exceeds `width`; its end moves
// back by at most `slack` units to land on a natural boundary, and the next chunk starts exactly
// `overlap` units before that end.
import type { ChunkingOptions, PolicyChunk, PolicyDocument } from '@/types/policy';
import { ConfigurationError } from '@/utils/errors';

/** Boundaries from strongest to weakest; a chunk ends right after the separator. */
const SEPARATORS = ['\n\n', '\n', '. ', '! ', '? ', '; ', ', ', ' '] as const;

export interface ResolvedChunking {
  width: number;
  overlap: number;
  slack: number;
}

export function defaultSlack(width: number, overlap: number): number {
  return Math.max(0, Math.min(Math.floor(width / 5), width - overlap - 1));
}

/** Validate chunking parameters; throws ConfigurationError. */
export function resolveChunking(options: ChunkingOptions): ResolvedChunking {
  const { width, overlap } = options;
  if (!Number.isInteger(width) || width < 1) {
    throw new ConfigurationError(`must be a positive integer, got ${width}`, 'width');
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`must be a non-negative integer, got ${overlap}`, 'overlap');
  }
  if (overlap >= width) {
    throw new ConfigurationError(`must be smaller than width (${width}), got ${overlap}`, 'overlap');
  }
  const slack = options.slack ?? defaultSlack(width, overlap);
  if (!Number.isInteger(slack) || slack < 0 || slack >= width - overlap) {
    throw new ConfigurationError(
      `must be a non-negative integer smaller than width - overlap (${width - overlap}), got ${slack}`,
      'slack',
    );
  }
  return { width, overlap, slack };
}

/** End of the strongest boundary ending within [minEnd, maxEnd], or maxEnd for a hard cut. */
function findChunkEnd(text: string, minEnd: number, maxEnd: number): number {
  for (const sep of SEPARATORS) {
    let from = maxEnd - sep.length;
    while (from >= 0) {
      const at = text.lastIndexOf(sep, from);
      if (at < 0) break;
      const end = at + sep.length;
      if (end < minEnd) break;
      if (end <= maxEnd) return end;
      from = at - 1;
    }
  }
  return maxEnd;
}

/**
 * Chunk one document. Chunk indexes start at `firstIndex` so several documents can share one
 * sequence.
 */
export function chunkText(
  text: string,
  options: ChunkingOptions,
  source = 'document',
  firstIndex = 0,
): PolicyChunk[] {
  const { width, overlap, slack } = resolveChunking(options);
  const chunks: PolicyChunk[] = [];
  if (text.length === 0) return chunks;

  let start = 0;
  for (;;) {
    const hardEnd = start + width;
    const end = hardEnd >= text.length ? text.length : findChunkEnd(text, hardEnd - slack, hardEnd);
    chunks.push(
      Object.freeze({ index: firstIndex + chunks.length, source, text: text.slice(start, end), start, end }),
    );
    if (end >= text.length) break;
    start = end - overlap;
  }
  return chunks;
}

/** Chunk documents in order with one continuous index sequence. */
export function chunkDocuments(documents: readonly PolicyDocument[], options: ChunkingOptions): PolicyChunk[] {
  resolveChunking(options);
  const chunks: PolicyChunk[] = [];
  for (const doc of documents) {
    chunks.push(...chunkText(doc.text, options, doc.name, chunks.length));
  }
  return chunks;
}
