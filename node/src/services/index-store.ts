// src/services/index-store.ts — persist the policy index as a JSON snapshot and reuse it while its
// sources, chunking and embedder are unchanged.
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type { Embedder } from './providers/retrieval-vector-utils';
import type { ChunkingOptions, PolicyDocument } from '@/types/policy';
import { chunkDocuments, resolveChunking } from './document-chunker';
import { EmbeddingIndex } from './embedding-index';
import { DataError } from '@/utils/errors';
import { logger } from './logger';

/** Hash of everything the index content depends on. */
export function indexFingerprint(
  documents: readonly PolicyDocument[],
  chunking: ChunkingOptions,
  embedderId: string,
): string {
  const { width, overlap, slack } = resolveChunking(chunking);
  const hash = crypto.createHash('sha256');
  hash.update(JSON.stringify({ width, overlap, slack, embedderId }));
  for (const doc of documents) {
    hash.update('\0').update(doc.name).update('\0').update(doc.text);
  }
  return hash.digest('hex');
}

export function saveIndex(index: EmbeddingIndex, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(index.toSnapshot()), 'utf-8');
}

/** Load a snapshot; DataError when the file is unreadable or malformed. */
export function loadIndex(filePath: string, embedder: Embedder): EmbeddingIndex {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new DataError(`cannot read index snapshot ${filePath}`, undefined, undefined, { cause: err });
  }
  return EmbeddingIndex.fromSnapshot(json, embedder);
}

export function readPolicyDocuments(files: readonly string[]): PolicyDocument[] {
  return files.map((file) => {
    try {
      return { name: path.basename(file), text: fs.readFileSync(file, 'utf-8') };
    } catch (err) {
      throw new DataError(`cannot read policy document ${file}`, undefined, undefined, { cause: err });
    }
  });
}

export interface BuildOrLoadOptions {
  documents: readonly PolicyDocument[];
  chunking: ChunkingOptions;
  embedder: Embedder;
  /** Snapshot location; omit to always build in memory. */
  storePath?: string;
  /** Ignore an existing snapshot. */
  rebuild?: boolean;
}

/**
 * Reuse the snapshot at `storePath` when its fingerprint matches; otherwise chunk, embed and save.
 * A stale or unreadable snapshot is replaced, not fatal.
 */
export async function buildOrLoadIndex(options: BuildOrLoadOptions): Promise<EmbeddingIndex> {
  const { documents, chunking, embedder, storePath, rebuild = false } = options;
  const fingerprint = indexFingerprint(documents, chunking, embedder.id);

  if (storePath && !rebuild && fs.existsSync(storePath)) {
    try {
      const existing = loadIndex(storePath, embedder);
      if (existing.fingerprint === fingerprint) {
        logger.info('loaded existing vector store', { path: storePath, chunks: existing.size });
        return existing;
      }
      logger.info('vector store is stale, rebuilding', { path: storePath });
    } catch (err) {
      logger.warn('could not load vector store, rebuilding', {
        path: storePath,
        err: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const chunks = chunkDocuments(documents, chunking);
  const index = await EmbeddingIndex.build(chunks, embedder, fingerprint);
  logger.info('created vector store', { chunks: index.size, dimensions: index.dimensions, embedder: embedder.id });

  if (storePath) {
    saveIndex(index, storePath);
    logger.info('saved vector store', { path: storePath });
  }
  return index;
}
