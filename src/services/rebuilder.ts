// src/services/rebuilder.ts
// What: Runs full index rebuilds on request from the HTTP API, one at a time.
// How: A rebuild is only launched when none is running. When it finishes, the serving cache is reset so the next
//      question loads the new index from disk; a failed rebuild leaves the old index (and cache) in place.
//      Keeps status of the last run for GET /index/status.

import baseLogger from '../logging.js';
import { errorMessage } from '../errors.js';
import type { IndexCache } from './indexLoader.js';
import { newCorrelationId, runIndexBuild, type IndexBuildOptions, type IndexBuildResult } from './indexer.js';

const logger = baseLogger.child({ module: 'rebuilder' });

export interface RebuildStatus {
  is_running: boolean;
  runs_completed: number;
  last_correlation_id?: string;
  last_run_start?: string; // ISO
  last_run_end?: string; // ISO
  last_error?: string;
  last_result?: IndexBuildResult;
}

export class IndexRebuilder {
  private readonly options: Omit<IndexBuildOptions, 'correlationId'>;
  private readonly cache: IndexCache;
  private readonly build: (opts: IndexBuildOptions) => Promise<IndexBuildResult>;

  private running: Promise<void> | null = null;
  private runsCompleted = 0;
  private lastCorrelationId: string | undefined;
  private lastRunStart: number | undefined;
  private lastRunEnd: number | undefined;
  private lastError: string | undefined;
  private lastResult: IndexBuildResult | undefined;

  constructor(
    options: Omit<IndexBuildOptions, 'correlationId'>,
    cache: IndexCache,
    build: (opts: IndexBuildOptions) => Promise<IndexBuildResult> = runIndexBuild,
  ) {
    this.options = options;
    this.cache = cache;
    this.build = build;
  }

  /**
   * Start a rebuild unless one is running. Returns the correlation id of the started run, or null.
   */
  start(): string | null {
    if (this.running) return null;

    const correlationId = newCorrelationId();
    this.lastCorrelationId = correlationId;
    this.lastRunStart = Date.now();
    this.lastError = undefined;
    logger.info({ correlationId }, 'Index rebuild starting');

    this.running = this.build({ ...this.options, correlationId })
      .then((result) => {
        this.lastResult = result;
        this.cache.reset();
        logger.info({ correlationId, chunks: result.chunks_count }, 'Index rebuild finished');
      })
      .catch((err: unknown) => {
        this.lastError = errorMessage(err);
        logger.error({ err, correlationId }, 'Index rebuild failed');
      })
      .finally(() => {
        this.lastRunEnd = Date.now();
        this.runsCompleted += 1;
        this.running = null;
      });

    return correlationId;
  }

  /** Resolves when the current rebuild (if any) has settled. */
  async idle(): Promise<void> {
    if (this.running) await this.running;
  }

  status(): RebuildStatus {
    return {
      is_running: this.running !== null,
      runs_completed: this.runsCompleted,
      last_correlation_id: this.lastCorrelationId,
      last_run_start: this.lastRunStart ? new Date(this.lastRunStart).toISOString() : undefined,
      last_run_end: this.lastRunEnd ? new Date(this.lastRunEnd).toISOString() : undefined,
      last_error: this.lastError,
      last_result: this.lastResult,
    };
  }
}
