// src/services/embeddings.ts
// What: Embedding provider contract and its OpenAI implementation.
// How: The pipeline only sees the Embedder interface, so tests and alternative models plug in without touching
//      the index builder or retriever. OpenAIEmbedder calls the embeddings endpoint with OPENAI_EMBED_MODEL and
//      converts SDK errors and malformed responses into EmbeddingFailureError.

import OpenAI from 'openai';
import { EmbeddingFailureError, errorMessage } from '../errors.js';

export interface Embedder {
  /** Identifies the embedding space; stored with the index and checked at query time. */
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

// The slice of the OpenAI client this module uses.
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string | string[] }): PromiseLike<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbedderOptions {
  model: string;
  apiKey?: string;
  timeoutMs?: number;
  client?: EmbeddingsClient;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private client: EmbeddingsClient;

  constructor(opts: OpenAIEmbedderOptions) {
    this.model = opts.model;
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs ?? 30_000, maxRetries: 2 });
  }

  async embed(text: string): Promise<number[]> {
    const [vec] = await this.request(text, 1);
    return vec;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.request(texts, texts.length);
  }

  private async request(input: string | string[], expected: number): Promise<number[][]> {
    let data: Array<{ embedding: number[]; index: number }>;
    try {
      const res = await this.client.embeddings.create({ model: this.model, input });
      data = res.data;
    } catch (err: unknown) {
      throw new EmbeddingFailureError(`Embedding request failed: ${errorMessage(err)}`, err);
    }

    if (!Array.isArray(data) || data.length !== expected) {
      throw new EmbeddingFailureError(`Expected ${expected} embeddings, got ${Array.isArray(data) ? data.length : 'none'}`);
    }

    // The API may return items out of order; `index` refers to the input position.
    const vectors = [...data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    return assertConsistentDimensions(vectors);
  }
}

export function assertConsistentDimensions(vectors: number[][]): number[][] {
  const dims = vectors[0]?.length ?? 0;
  for (const v of vectors) {
    if (!Array.isArray(v) || v.length === 0 || v.length !== dims) {
      throw new EmbeddingFailureError(
        `Unexpected embedding size; expected ${dims}, got ${Array.isArray(v) ? v.length : 'unknown'}`,
      );
    }
  }
  return vectors;
}
