// src/types/policy.ts

/** A bounded span of a policy document; offsets are UTF-16 code units into the source. */
export interface PolicyChunk {
  readonly index: number;
  readonly source: string;
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

export interface IndexedChunk extends PolicyChunk {
  readonly embedding: readonly number[];
}

export interface PolicyDocument {
  name: string;
  text: string;
}

export interface ChunkingOptions {
  width: number;
  overlap: number;
  /** How far before the hard limit a natural boundary may end a chunk. Defaults to width / 5. */
  slack?: number;
}

export interface ScoredChunk {
  chunk: PolicyChunk;
  score: number;
}

/** Descending score; ties keep ascending chunk index. */
export type RetrievalResult = ScoredChunk[];

export interface PolicyAnswer {
  answer: string;
  passages: RetrievalResult;
}
