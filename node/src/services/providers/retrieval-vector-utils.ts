// node/src/services/providers/retrieval-vector-utils.ts — vector helpers shared by embedders and the policy index

export type Embedding = number[];

export interface Embedder {
  /** Stable identity (provider + model + dimension); part of the persisted index fingerprint. */
  readonly id: string;
  embed(text: string): Promise<Embedding>;
  /** Optional batch form; results are in input order. */
  embedMany?(texts: string[]): Promise<Embedding[]>;
}

/**
 * Cosine similarity, or null when it is undefined (length mismatch, empty or zero-norm vector).
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
  if (a.length !== b.length || a.length === 0) return null;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return null;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}
