// src/services/indexLoader.ts
// What: Loads a persisted index from INDEX_DIR, and a process-wide cache around that load.
// How: A missing directory or index file is reported as { status: 'not_found' } rather than thrown, so callers
//      can answer "knowledge base not ready". IndexCache shares one in-flight load between concurrent callers,
//      keeps a found index for the life of the process and retries the disk on the next call otherwise.

import fs from 'fs/promises';
import path from 'path';
import baseLogger from '../logging.js';
import { IndexCorruptError, errorMessage } from '../errors.js';
import { isNotFound } from '../util/files.js';
import { INDEX_FILE } from './indexer.js';
import { VectorIndex } from './vectorIndex.js';

const logger = baseLogger.child({ module: 'index-loader' });

export type IndexLoadResult =
  | { status: 'found'; index: VectorIndex; path: string }
  | { status: 'not_found'; path: string };

export async function loadIndex(dir: string): Promise<IndexLoadResult> {
  const target = path.resolve(dir);
  const file = path.join(target, INDEX_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err: unknown) {
    if (isNotFound(err)) {
      logger.info({ dir: target }, 'No index found');
      return { status: 'not_found', path: target };
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new IndexCorruptError(file, `Index at ${file} is not valid JSON: ${errorMessage(err)}`, err);
  }

  const index = VectorIndex.fromJSON(json, file);
  logger.info({ dir: target, chunks: index.size, model: index.model }, 'Index loaded');
  return { status: 'found', index, path: target };
}

export class IndexCache {
  readonly dir: string;
  private loaded: VectorIndex | null = null;
  private pending: Promise<IndexLoadResult> | null = null;
  private generation = 0;
  private readonly loader: (dir: string) => Promise<IndexLoadResult>;

  constructor(dir: string, loader: (dir: string) => Promise<IndexLoadResult> = loadIndex) {
    this.dir = path.resolve(dir);
    this.loader = loader;
  }

  async get(): Promise<IndexLoadResult> {
    if (this.loaded) return { status: 'found', index: this.loaded, path: this.dir };
    if (!this.pending) {
      // A reset() while this load is in flight bumps the generation; the stale result is then not kept.
      const generation = this.generation;
      const pending: Promise<IndexLoadResult> = this.loader(this.dir)
        .then((result) => {
          if (result.status === 'found' && generation === this.generation) this.loaded = result.index;
          return result;
        })
        .finally(() => {
          if (this.pending === pending) this.pending = null;
        });
      this.pending = pending;
    }
    return this.pending;
  }

  /** The cached index, if one has been loaded. Never touches the disk. */
  peek(): VectorIndex | null {
    return this.loaded;
  }

  /** Forget the cached index (after a rebuild); the next get() reloads from disk. */
  reset(): void {
    this.generation += 1;
    this.loaded = null;
    this.pending = null;
  }
}
