// src/services/vectorIndex.ts
// What: In-memory vector index over (chunk text, embedding) pairs with exact cosine-similarity search.
// How: Vectors are L2-normalised once on construction so a search is a dot product against every entry,
//      sorted by descending score (ties keep corpus order). The raw vectors are what gets serialized, and
//      fromJSON validates the persisted shape with zod before rebuilding the index.

import { z } from 'zod';
import { IndexCorruptError } from '../errors.js';

export const INDEX_FORMAT_VERSION = 1;

export interface IndexEntry {
  content: string;
  embedding: number[];
}

export interface IndexMetadata {
  model: string;
  dimensions: number;
  createdAt: string; // ISO
}

export interface SearchHit {
  content: string;
  score: number; // cosine similarity in [-1, 1]
  position: number; // chunk order in the source corpus
}

const serializedSchema = z
  .object({
    version: z.literal(INDEX_FORMAT_VERSION),
    model: z.string().min(1),
    dimensions: z.number().int().nonnegative(),
    created_at: z.string(),
    chunks: z.array(
      z.object({
        content: z.string(),
        embedding: z.array(z.number()),
      }),
    ),
  })
  .refine((v) => v.chunks.every((c) => c.embedding.length === v.dimensions), {
    message: 'every embedding must have `dimensions` components',
    path: ['chunks'],
  });

export type SerializedIndex = z.infer<typeof serializedSchema>;

export class VectorIndex {
  readonly model: string;
  readonly dimensions: number;
  readonly createdAt: string;
  private readonly entries: IndexEntry[];
  private readonly unit: Float64Array[];

  constructor(entries: IndexEntry[], meta: { model: string; createdAt?: string }) {
    const dimensions = entries[0]?.embedding.length ?? 0;
    for (const e of entries) {
      if (e.embedding.length !== dimensions) {
        throw new RangeError(`Inconsistent embedding dimensions: expected ${dimensions}, got ${e.embedding.length}`);
      }
    }
    this.model = meta.model;
    this.dimensions = dimensions;
    this.createdAt = meta.createdAt ?? new Date().toISOString();
    this.entries = entries.map((e) => ({ content: e.content, embedding: [...e.embedding] }));
    this.unit = this.entries.map((e) => normalize(e.embedding));
  }

  get size(): number {
    return this.entries.length;
  }

  get metadata(): IndexMetadata {
    return { model: this.model, dimensions: this.dimensions, createdAt: this.createdAt };
  }

  search(vector: number[], k: number): SearchHit[] {
    if (this.entries.length === 0 || k <= 0) return [];
    if (vector.length !== this.dimensions) {
      throw new RangeError(`Query vector has ${vector.length} dimensions, index has ${this.dimensions}`);
    }

    const q = normalize(vector);
    const scored = this.unit.map((u, position) => ({ position, score: dot(u, q) }));
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, Math.floor(k)).map(({ position, score }) => ({
      content: this.entries[position].content,
      score,
      position,
    }));
  }

  toJSON(): SerializedIndex {
    return {
      version: INDEX_FORMAT_VERSION,
      model: this.model,
      dimensions: this.dimensions,
      created_at: this.createdAt,
      chunks: this.entries.map((e) => ({ content: e.content, embedding: e.embedding })),
    };
  }

  static fromJSON(value: unknown, source = '<memory>'): VectorIndex {
    const parsed = serializedSchema.safeParse(value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new IndexCorruptError(source, `Invalid index at ${source}: ${issues}`);
    }
    const { model, created_at, chunks } = parsed.data;
    return new VectorIndex(chunks, { model, createdAt: created_at });
  }
}

function normalize(v: number[]): Float64Array {
  let norm = 0;
  for (const x of v) norm += x * x;
  norm = Math.sqrt(norm);
  const out = new Float64Array(v.length);
  // A zero vector stays zero and scores 0 against everything.
  if (norm === 0) return out;
  for (let i = 0; i < v.length; i++) out[i] = v[i] / norm;
  return out;
}

function dot(a: Float64Array, b: Float64Array): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}
