import { describe, expect, it } from 'vitest';
import { IndexCorruptError } from '../errors.js';
import { VectorIndex } from '../services/vectorIndex.js';

function sampleIndex(): VectorIndex {
  return new VectorIndex(
    [
      { content: 'east', embedding: [1, 0] },
      { content: 'north-east', embedding: [0.8, 0.6] },
      { content: 'north', embedding: [0, 1] },
    ],
    { model: 'stub', createdAt: '2026-01-01T00:00:00.000Z' },
  );
}

describe('VectorIndex', () => {
  it('orders hits by descending cosine similarity', () => {
    const hits = sampleIndex().search([2, 0], 3);
    expect(hits.map((h) => h.content)).toEqual(['east', 'north-east', 'north']);
    expect(hits[0].score).toBeCloseTo(1, 10);
    expect(hits[1].score).toBeCloseTo(0.8, 10);
    expect(hits[2].score).toBeCloseTo(0, 10);
  });

  it('returns at most k hits', () => {
    expect(sampleIndex().search([0, 1], 2).map((h) => h.content)).toEqual(['north', 'north-east']);
  });

  it('returns every chunk when k exceeds the index size', () => {
    const hits = sampleIndex().search([0, 1], 10);
    expect(hits.map((h) => h.position)).toEqual([2, 1, 0]);
  });

  it('breaks ties by corpus position', () => {
    const index = new VectorIndex(
      [
        { content: 'first', embedding: [1, 1] },
        { content: 'second', embedding: [2, 2] },
      ],
      { model: 'stub' },
    );
    expect(index.search([1, 1], 2).map((h) => h.content)).toEqual(['first', 'second']);
  });

  it('returns nothing for an empty index or a non-positive k', () => {
    const empty = new VectorIndex([], { model: 'stub' });
    expect(empty.size).toBe(0);
    expect(empty.dimensions).toBe(0);
    expect(empty.search([1, 2, 3], 4)).toEqual([]);
    expect(sampleIndex().search([1, 0], 0)).toEqual([]);
  });

  it('rejects a query vector of the wrong dimension', () => {
    expect(() => sampleIndex().search([1, 0, 0], 1)).toThrow(RangeError);
  });

  it('rejects entries with inconsistent dimensions', () => {
    expect(
      () =>
        new VectorIndex(
          [
            { content: 'a', embedding: [1, 0] },
            { content: 'b', embedding: [1, 0, 0] },
          ],
          { model: 'stub' },
        ),
    ).toThrow(RangeError);
  });

  it('answers identically after a JSON round trip', () => {
    const original = sampleIndex();
    const restored = VectorIndex.fromJSON(JSON.parse(JSON.stringify(original.toJSON())));
    expect(restored.metadata).toEqual(original.metadata);
    for (const q of [
      [1, 0],
      [0.3, 0.7],
      [-1, 0.2],
    ]) {
      expect(restored.search(q, 2)).toEqual(original.search(q, 2));
    }
  });

  it('throws IndexCorruptError for a malformed serialized index', () => {
    expect(() => VectorIndex.fromJSON({ version: 1, model: 'stub', chunks: 'nope' }, '/tmp/x/index.json')).toThrow(
      IndexCorruptError,
    );
    expect(() =>
      VectorIndex.fromJSON({
        version: 1,
        model: 'stub',
        dimensions: 3,
        created_at: '2026-01-01T00:00:00.000Z',
        chunks: [{ content: 'a', embedding: [1, 2] }],
      }),
    ).toThrow(/dimensions/);
  });
});
