// src/services/chunking.ts
// What: Recursive character chunking with a fixed-size overlap between neighbouring chunks.
// How: Cuts the corpus into pieces at the highest-priority separator present (paragraph break, line break,
//      sentence end, space); pieces still longer than chunkSize are cut again with the remaining separators.
//      Pieces are then packed greedily into chunks of at most chunkSize characters, and every new chunk starts
//      `overlap` characters before the end of the previous one. Works on offsets, so every chunk is an exact
//      substring of the corpus and nothing is trimmed.

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '.', ' '];

export interface SplitOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  /**
   * Tried in order. A separator stays attached to the end of the piece it terminates.
   * An empty string means a hard cut every `chunkSize` characters.
   */
  separators?: readonly string[];
}

export interface ChunkSpan {
  text: string;
  start: number; // inclusive offset into the corpus
  end: number; // exclusive
}

interface Piece {
  start: number;
  end: number;
}

export function splitText(corpus: string, opts: SplitOptions = {}): string[] {
  return splitTextWithSpans(corpus, opts).map((c) => c.text);
}

export function splitTextWithSpans(corpus: string, opts: SplitOptions = {}): ChunkSpan[] {
  const chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = opts.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  const separators = opts.separators ?? DEFAULT_SEPARATORS;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`);
  }

  if (corpus.trim().length === 0) return [];

  const pieces = toPieces(corpus, 0, corpus.length, separators, chunkSize);
  return pack(pieces, chunkSize, chunkOverlap).map((p) => ({
    text: corpus.slice(p.start, p.end),
    start: p.start,
    end: p.end,
  }));
}

function toPieces(text: string, start: number, end: number, separators: readonly string[], size: number): Piece[] {
  if (end - start <= size) return [{ start, end }];

  for (let i = 0; i < separators.length; i++) {
    const sep = separators[i];
    if (sep === '') return hardCut(start, end, size);

    const parts = splitAt(text, start, end, sep);
    if (parts.length < 2) continue;

    const rest = separators.slice(i + 1);
    const out: Piece[] = [];
    for (const p of parts) {
      if (p.end - p.start <= size) {
        out.push(p);
      } else {
        out.push(...toPieces(text, p.start, p.end, rest, size));
      }
    }
    return out;
  }

  // No separator left: an atomic unit longer than chunkSize is kept whole.
  return [{ start, end }];
}

function splitAt(text: string, start: number, end: number, sep: string): Piece[] {
  const out: Piece[] = [];
  let cursor = start;
  let idx = text.indexOf(sep, cursor);
  while (idx !== -1 && idx + sep.length <= end) {
    out.push({ start: cursor, end: idx + sep.length });
    cursor = idx + sep.length;
    idx = text.indexOf(sep, cursor);
  }
  if (cursor < end) out.push({ start: cursor, end });
  return out;
}

function hardCut(start: number, end: number, size: number): Piece[] {
  const out: Piece[] = [];
  for (let s = start; s < end; s += size) {
    out.push({ start: s, end: Math.min(s + size, end) });
  }
  return out;
}

// Pieces are contiguous, so a chunk is fully described by its first and last offsets.
function pack(pieces: Piece[], size: number, overlap: number): Piece[] {
  const chunks: Piece[] = [];
  let cur: Piece | null = null;

  for (const p of pieces) {
    if (cur === null) {
      cur = { start: p.start, end: p.end };
      continue;
    }
    if (p.end - cur.start <= size) {
      cur.end = p.end;
      continue;
    }
    chunks.push(cur);
    const carried = Math.max(0, Math.min(overlap, cur.end - cur.start, size - (p.end - p.start)));
    cur = { start: cur.end - carried, end: p.end };
  }

  if (cur !== null) chunks.push(cur);
  return chunks;
}
