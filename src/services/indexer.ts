// src/services/indexer.ts
// What: Orchestrates the offline content → chunk → embed → index → persist pipeline.
// How: Loads the corpus from the content store, chunks it, embeds the chunks in batches (concurrency via p-limit,
//      order preserved by batch offset) and writes the index to INDEX_DIR. Any embedding failure aborts the build
//      before anything is written; the previous index on disk is replaced only by a complete new one.

import { randomBytes } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import baseLogger from '../logging.js';
import { loadCorpus, type CorpusSource } from './contentStore.js';
import { splitText, type SplitOptions } from './chunking.js';
import type { Embedder } from './embeddings.js';
import { VectorIndex } from './vectorIndex.js';
import { pathExists } from '../util/files.js';
import { EmbeddingFailureError, errorMessage } from '../errors.js';

const logger = baseLogger.child({ module: 'indexer' });

export const INDEX_FILE = 'index.json';

export interface BuildOptions {
  batchSize?: number; // default 64
  concurrency?: number; // default 2
}

export async function buildIndex(chunks: string[], embedder: Embedder, opts: BuildOptions = {}): Promise<VectorIndex> {
  const texts = chunks.filter((c) => c.trim().length > 0);
  if (texts.length < chunks.length) {
    logger.debug({ dropped: chunks.length - texts.length }, 'Dropped whitespace-only chunks');
  }

  const batchSize = Math.max(1, Math.floor(opts.batchSize ?? 64));
  const limit = pLimit(Math.max(1, Math.floor(opts.concurrency ?? 2)));

  const offsets: number[] = [];
  for (let offset = 0; offset < texts.length; offset += batchSize) offsets.push(offset);

  const batches = await Promise.all(
    offsets.map((offset) =>
      limit(async () => {
        const batch = texts.slice(offset, offset + batchSize);
        let vectors: number[][];
        try {
          vectors = await embedder.embedMany(batch);
        } catch (err: unknown) {
          if (err instanceof EmbeddingFailureError) throw err;
          throw new EmbeddingFailureError(`Embedding failed for chunks ${offset}-${offset + batch.length - 1}: ${errorMessage(err)}`, err);
        }
        if (vectors.length !== batch.length) {
          throw new EmbeddingFailureError(`Embedder returned ${vectors.length} vectors for ${batch.length} chunks`);
        }
        logger.debug({ offset, size: batch.length }, 'Embedded batch');
        return vectors;
      }),
    ),
  );

  const vectors = batches.flat();
  return new VectorIndex(
    texts.map((content, i) => ({ content, embedding: vectors[i] })),
    { model: embedder.model },
  );
}

/**
 * Write the index to `dir`, replacing whatever was there. The file is written to a staging directory
 * beside `dir`; the old directory is moved aside, the staging one renamed into place, and the old one
 * deleted only after that. On failure the old directory is moved back, so `dir` holds either the old
 * index or the complete new one.
 */
export async function persistIndex(index: VectorIndex, dir: string): Promise<void> {
  const target = path.resolve(dir);
  const parent = path.dirname(target);
  await fs.mkdir(parent, { recursive: true });

  const suffix = randomBytes(4).toString('hex');
  const staging = `${target}.tmp-${suffix}`;
  const backup = `${target}.old-${suffix}`;
  let movedAside = false;

  await fs.mkdir(staging, { recursive: true });
  try {
    await fs.writeFile(path.join(staging, INDEX_FILE), JSON.stringify(index.toJSON()), 'utf8');
    if (await pathExists(target)) {
      await fs.rename(target, backup);
      movedAside = true;
    }
    await fs.rename(staging, target);
  } catch (err) {
    if (movedAside) {
      await fs.rename(backup, target);
      logger.warn({ dir: target }, 'Index swap failed; previous index restored');
    }
    await fs.rm(staging, { recursive: true, force: true });
    throw err;
  }

  if (movedAside) {
    await fs.rm(backup, { recursive: true, force: true });
  }
  logger.info({ dir: target, chunks: index.size, dimensions: index.dimensions }, 'Index persisted');
}

export interface IndexBuildOptions extends BuildOptions, SplitOptions {
  contentDir: string;
  indexDir: string;
  embedder: Embedder;
  correlationId?: string;
}

export interface IndexBuildResult {
  correlation_id: string;
  sources: CorpusSource[];
  corpus_chars: number;
  chunks_count: number;
  dimensions: number;
  model: string;
  index_dir: string;
  duration_ms: number;
}

export async function runIndexBuild(opts: IndexBuildOptions): Promise<IndexBuildResult> {
  const start = Date.now();
  const correlationId = opts.correlationId ?? newCorrelationId();
  logger.info({ correlationId, contentDir: opts.contentDir, indexDir: opts.indexDir }, 'Index build starting');

  const corpus = await loadCorpus(opts.contentDir);
  if (corpus.text.length === 0) {
    logger.warn({ correlationId, contentDir: opts.contentDir }, 'Corpus is empty; writing an empty index');
  }

  const chunks = splitText(corpus.text, {
    chunkSize: opts.chunkSize,
    chunkOverlap: opts.chunkOverlap,
    separators: opts.separators,
  });
  logger.info({ correlationId, chunks: chunks.length }, 'Corpus chunked');

  const index = await buildIndex(chunks, opts.embedder, {
    batchSize: opts.batchSize,
    concurrency: opts.concurrency,
  });
  await persistIndex(index, opts.indexDir);

  const result: IndexBuildResult = {
    correlation_id: correlationId,
    sources: corpus.sources,
    corpus_chars: corpus.text.length,
    chunks_count: index.size,
    dimensions: index.dimensions,
    model: index.model,
    index_dir: path.resolve(opts.indexDir),
    duration_ms: Date.now() - start,
  };
  logger.info({ correlationId, result }, 'Index build finished');
  return result;
}

// Helper to create correlation IDs for build runs
export function newCorrelationId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, '');
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}
