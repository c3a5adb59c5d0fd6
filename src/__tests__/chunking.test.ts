import { describe, expect, it } from 'vitest';
import { splitText, splitTextWithSpans, type ChunkSpan } from '../services/chunking.js';

const WORDS = ['campus', 'library', 'hostel', 'placement', 'department', 'admission', 'faculty', 'club', 'sports', 'canteen'];

// Park-Miller generator keeps the corpora deterministic.
function* pseudoRandom(seed: number): Generator<number> {
  let x = seed;
  for (;;) {
    x = (x * 48271) % 2147483647;
    yield x;
  }
}

function wordCorpus(count: number, seed = 7): string {
  const rnd = pseudoRandom(seed);
  const out: string[] = [];
  for (let i = 0; i < count; i++) out.push(WORDS[rnd.next().value % WORDS.length]);
  return out.join(' ');
}

function proseCorpus(paragraphs: number, seed = 11): string {
  const rnd = pseudoRandom(seed);
  const paras: string[] = [];
  for (let p = 0; p < paragraphs; p++) {
    const sentences: string[] = [];
    const sentenceCount = 2 + (rnd.next().value % 6);
    for (let s = 0; s < sentenceCount; s++) {
      const len = 4 + (rnd.next().value % 14);
      const words: string[] = [];
      for (let w = 0; w < len; w++) words.push(WORDS[rnd.next().value % WORDS.length]);
      sentences.push(words.join(' ') + '.');
    }
    // Mix single line breaks into some paragraphs.
    paras.push(sentences.join(p % 3 === 0 ? '\n' : ' '));
  }
  return paras.join('\n\n');
}

function reconstruct(spans: ChunkSpan[]): string {
  let out = spans[0]?.text ?? '';
  for (let i = 1; i < spans.length; i++) {
    const overlap = spans[i - 1].end - spans[i].start;
    out += spans[i].text.slice(overlap);
  }
  return out;
}

describe('splitText', () => {
  it('returns no chunks for an empty or whitespace-only corpus', () => {
    expect(splitText('')).toEqual([]);
    expect(splitText('  \n\n \t')).toEqual([]);
  });

  it('returns a corpus shorter than the chunk size as a single chunk', () => {
    const corpus = 'Admissions open from June 1 to June 30. Contact admissions@anits.edu for details.';
    expect(splitText(corpus)).toEqual([corpus]);
  });

  it('packs words greedily and carries the overlap into the next chunk', () => {
    const chunks = splitText('aaaa bbbb cccc dddd eeee', { chunkSize: 20, chunkOverlap: 5 });
    expect(chunks).toEqual(['aaaa bbbb cccc dddd ', 'dddd eeee']);
  });

  it('prefers paragraph breaks, then line breaks', () => {
    const corpus = 'First para line one.\nline two.\n\nSecond para.';
    const chunks = splitText(corpus, { chunkSize: 25, chunkOverlap: 0 });
    expect(chunks).toEqual(['First para line one.\n', 'line two.\n\nSecond para.']);
  });

  it('keeps an atomic unit longer than the chunk size whole', () => {
    const long = 'x'.repeat(30);
    const chunks = splitText(`short ${long} tail`, { chunkSize: 10, chunkOverlap: 2 });
    expect(chunks).toEqual(['short ', `${long} `, 'x tail']);
    expect(chunks[1].length).toBe(31);
  });

  it('hard-cuts at the chunk size when the empty separator is reached', () => {
    const chunks = splitText('abcdefghij', { chunkSize: 4, chunkOverlap: 1, separators: [' ', ''] });
    expect(chunks).toEqual(['abcd', 'efgh', 'hij']);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => splitText('anything', { chunkSize: 50, chunkOverlap: 50 })).toThrow(RangeError);
    expect(() => splitText('anything', { chunkSize: 0, chunkOverlap: 0 })).toThrow(RangeError);
  });
});

describe('splitTextWithSpans', () => {
  const corpus = wordCorpus(600);
  const spans = splitTextWithSpans(corpus, { chunkSize: 500, chunkOverlap: 50 });

  it('produces several chunks for a multi-kilobyte corpus', () => {
    expect(corpus.length).toBeGreaterThan(3000);
    expect(spans.length).toBeGreaterThan(5);
  });

  it('never exceeds the chunk size when every word fits', () => {
    for (const s of spans) expect(s.text.length).toBeLessThanOrEqual(500);
  });

  it('returns exact substrings in corpus order', () => {
    for (let i = 0; i < spans.length; i++) {
      expect(spans[i].text).toBe(corpus.slice(spans[i].start, spans[i].end));
      if (i > 0) expect(spans[i].start).toBeGreaterThan(spans[i - 1].start);
    }
    expect(spans[0].start).toBe(0);
    expect(spans[spans.length - 1].end).toBe(corpus.length);
  });

  it('shares exactly the configured overlap between neighbours', () => {
    for (let i = 1; i < spans.length; i++) {
      const overlap = spans[i - 1].end - spans[i].start;
      expect(overlap).toBe(50);
      expect(spans[i].text.slice(0, overlap)).toBe(spans[i - 1].text.slice(-overlap));
    }
  });

  it('reconstructs the corpus once the overlap is removed', () => {
    expect(reconstruct(spans)).toBe(corpus);
  });

  it('reconstructs prose with paragraphs, line breaks and sentences', () => {
    const prose = proseCorpus(40);
    const proseSpans = splitTextWithSpans(prose, { chunkSize: 500, chunkOverlap: 50 });
    expect(proseSpans.length).toBeGreaterThan(1);
    for (const s of proseSpans) expect(s.text.length).toBeLessThanOrEqual(500);
    for (let i = 1; i < proseSpans.length; i++) {
      const overlap = proseSpans[i - 1].end - proseSpans[i].start;
      expect(overlap).toBeGreaterThanOrEqual(0);
      expect(overlap).toBeLessThanOrEqual(50);
    }
    expect(reconstruct(proseSpans)).toBe(prose);
  });
});
