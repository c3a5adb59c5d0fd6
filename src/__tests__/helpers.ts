/**
 * Test helpers: deterministic stand-ins for the embedding provider and the language model,
 * temporary directories, and a logger whose records can be inspected.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import pino from 'pino';
import type { Logger } from '../logging.js';
import type { Embedder } from '../services/embeddings.js';
import type { Generator } from '../services/generator.js';

/**
 * Bag-of-words embedder: one dimension per vocabulary word, valued by how often the word occurs.
 */
export class KeywordEmbedder implements Embedder {
  readonly model: string;
  readonly vocabulary: string[];
  embedCalls = 0;
  embedManyCalls = 0;

  constructor(vocabulary: string[], model = 'stub-embed-v1') {
    this.vocabulary = vocabulary;
    this.model = model;
  }

  vectorFor(text: string): number[] {
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/);
    return this.vocabulary.map((w) => tokens.filter((t) => t === w).length);
  }

  async embed(text: string): Promise<number[]> {
    this.embedCalls += 1;
    return this.vectorFor(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    this.embedManyCalls += 1;
    return texts.map((t) => this.vectorFor(t));
  }

  get totalCalls(): number {
    return this.embedCalls + this.embedManyCalls;
  }
}

export class StubGenerator implements Generator {
  readonly prompts: string[] = [];
  private readonly reply: (prompt: string) => Promise<string>;

  constructor(reply: string | ((prompt: string) => Promise<string>)) {
    this.reply = typeof reply === 'string' ? async () => reply : reply;
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

export async function makeTempDir(prefix = 'campus-assistant-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface LogRecord {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        const record: LogRecord = JSON.parse(line);
        records.push(record);
      },
    },
  );
  return { logger, records };
}
