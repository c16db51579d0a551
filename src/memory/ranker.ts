import type { MemoryRecord, RankedMemory } from './types.js';

export const DEFAULT_RANK_LIMIT = 5;

/**
 * Orders candidate memories by relevance to a query vector. Implementations
 * may index; the contract is only the ordering and the limit.
 */
export interface Ranker {
  readonly name: string;
  rank(query: Float32Array, candidates: readonly MemoryRecord[], limit?: number): RankedMemory[];
}

/**
 * Cosine similarity. Zero-norm vectors, mismatched lengths and any
 * non-finite intermediate all yield 0 rather than NaN.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }

  const similarity = dotProduct / denominator;
  return Number.isFinite(similarity) ? similarity : 0;
}

// Similarity desc, then most recent first, then highest id
export function compareRanked(a: RankedMemory, b: RankedMemory): number {
  return (
    b.similarity - a.similarity ||
    b.memory.createdAt.getTime() - a.memory.createdAt.getTime() ||
    b.memory.id - a.memory.id
  );
}

// Brute-force scan over every candidate. Fine for a personal memory set.
export class LinearRanker implements Ranker {
  readonly name = 'linear';

  rank(
    query: Float32Array,
    candidates: readonly MemoryRecord[],
    limit: number = DEFAULT_RANK_LIMIT
  ): RankedMemory[] {
    if (limit <= 0 || candidates.length === 0) {
      return [];
    }

    return candidates
      .map((memory) => ({
        memory,
        similarity: memory.embedding ? cosineSimilarity(query, memory.embedding) : 0,
      }))
      .sort(compareRanked)
      .slice(0, limit);
  }
}
