// src/services/retriever.ts
// What: Top-k retrieval of chunks for a free-text query.
// How: Embeds the query with the same model the index was built with (a different model's vectors are not
//      comparable, so a mismatch is rejected) and runs a cosine nearest-neighbour search on the index.

import { EmbeddingModelMismatchError } from '../errors.js';
import type { Embedder } from './embeddings.js';
import type { SearchHit, VectorIndex } from './vectorIndex.js';

export type RetrievedChunk = SearchHit;

export async function embedQuery(embedder: Embedder, index: VectorIndex, query: string): Promise<number[]> {
  if (embedder.model !== index.model) {
    throw new EmbeddingModelMismatchError(index.model, embedder.model);
  }
  return embedder.embed(query);
}

export function searchIndex(index: VectorIndex, vector: number[], k: number): RetrievedChunk[] {
  return index.search(vector, k);
}

/**
 * Returns at most `k` chunks ordered by descending similarity. An empty result means nothing relevant
 * was found; an empty index returns [] without embedding the query.
 */
export async function retrieve(index: VectorIndex, query: string, k: number, embedder: Embedder): Promise<RetrievedChunk[]> {
  if (index.size === 0 || k <= 0) return [];
  const vector = await embedQuery(embedder, index, query);
  return searchIndex(index, vector, k);
}
