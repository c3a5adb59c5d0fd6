// scripts/build-index.ts
// What: Offline index builder: content → chunks → embeddings → persisted index.
// How: Loads .env and validates config, runs the full build into INDEX_DIR (replacing any previous index) and
//      prints a summary. Any failure, including a single embedding error, exits non-zero with nothing written.

import { getConfig } from '../src/config/env.js';
import logger from '../src/logging.js';
import { errorMessage } from '../src/errors.js';
import { OpenAIEmbedder } from '../src/services/embeddings.js';
import { runIndexBuild } from '../src/services/indexer.js';

async function main(): Promise<void> {
  const config = getConfig();

  const embedder = new OpenAIEmbedder({
    apiKey: config.OPENAI_API_KEY,
    model: config.OPENAI_EMBED_MODEL,
    timeoutMs: config.EMBED_TIMEOUT_MS,
  });

  const result = await runIndexBuild({
    contentDir: config.CONTENT_DIR,
    indexDir: config.INDEX_DIR,
    embedder,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    batchSize: config.EMBED_BATCH_SIZE,
    concurrency: config.INDEX_CONCURRENCY,
  });

  if (result.chunks_count === 0) {
    logger.warn({ contentDir: config.CONTENT_DIR }, 'No content found; the index is empty');
  }
  logger.info(
    {
      sources: result.sources.map((s) => s.filename),
      chunks: result.chunks_count,
      dimensions: result.dimensions,
      index_dir: result.index_dir,
      duration_ms: result.duration_ms,
    },
    'Index build complete',
  );
}

main().catch((err: unknown) => {
  const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
  logger.fatal({ err, code }, `Index build failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
