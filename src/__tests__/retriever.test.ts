import { describe, expect, it } from 'vitest';
import { EmbeddingModelMismatchError } from '../errors.js';
import { retrieve } from '../services/retriever.js';
import { VectorIndex } from '../services/vectorIndex.js';
import { KeywordEmbedder } from './helpers.js';

const VOCAB = ['admissions', 'hostel', 'library'];

async function buildSample(embedder: KeywordEmbedder): Promise<VectorIndex> {
  const texts = [
    'Admissions open in June.',
    'The hostel has 300 rooms.',
    'The library opens at 8am.',
    'Hostel and library passes are issued together.',
  ];
  const vectors = await embedder.embedMany(texts);
  return new VectorIndex(
    texts.map((content, i) => ({ content, embedding: vectors[i] })),
    { model: embedder.model },
  );
}

describe('retrieve', () => {
  it('returns the most similar chunks first', async () => {
    const embedder = new KeywordEmbedder(VOCAB);
    const index = await buildSample(embedder);

    const hits = await retrieve(index, 'Where is the hostel?', 2, embedder);
    expect(hits.map((h) => h.content)).toEqual(['The hostel has 300 rooms.', 'Hostel and library passes are issued together.']);
    expect(hits[0].score).toBeCloseTo(1, 10);
    expect(hits[1].score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('returns every chunk when k exceeds the index size', async () => {
    const embedder = new KeywordEmbedder(VOCAB);
    const index = await buildSample(embedder);
    const hits = await retrieve(index, 'library', 10, embedder);
    expect(hits).toHaveLength(4);
    expect(hits[0].content).toBe('The library opens at 8am.');
  });

  it('does not embed the query for an empty index or k of zero', async () => {
    const embedder = new KeywordEmbedder(VOCAB);
    const empty = new VectorIndex([], { model: embedder.model });
    expect(await retrieve(empty, 'hostel', 3, embedder)).toEqual([]);

    const index = await buildSample(embedder);
    const before = embedder.totalCalls;
    expect(await retrieve(index, 'hostel', 0, embedder)).toEqual([]);
    expect(embedder.totalCalls).toBe(before);
  });

  it('rejects a query embedder of a different model', async () => {
    const index = await buildSample(new KeywordEmbedder(VOCAB, 'model-a'));
    const other = new KeywordEmbedder(VOCAB, 'model-b');

    await expect(retrieve(index, 'hostel', 3, other)).rejects.toBeInstanceOf(EmbeddingModelMismatchError);
    expect(other.embedCalls).toBe(0);
  });
});
