// src/server.ts
// What: HTTP server entrypoint.
// How: Validates configuration (fatal if incomplete), wires the OpenAI embedder/generator, the process-wide index
//      cache, the assistant and session store into the Express app, warms the index cache once at boot and
//      listens on the configured port.

import { getConfig, type AppConfig } from './config/env.js';
import { createApp } from './app.js';
import logger from './logging.js';
import { ConfigurationMissingError } from './errors.js';
import { CampusAssistant } from './services/assistant.js';
import { OpenAIEmbedder } from './services/embeddings.js';
import { OpenAIGenerator } from './services/generator.js';
import { IndexCache } from './services/indexLoader.js';
import { defaultInstructions } from './services/prompt.js';
import { IndexRebuilder } from './services/rebuilder.js';
import { SessionStore } from './services/sessions.js';

function readConfig(): AppConfig {
  try {
    return getConfig();
  } catch (err) {
    if (err instanceof ConfigurationMissingError) {
      logger.fatal({ variables: err.variables }, err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const embedder = new OpenAIEmbedder({
  apiKey: config.OPENAI_API_KEY,
  model: config.OPENAI_EMBED_MODEL,
  timeoutMs: config.EMBED_TIMEOUT_MS,
});
const generator = new OpenAIGenerator({
  apiKey: config.OPENAI_API_KEY,
  model: config.OPENAI_CHAT_MODEL,
  temperature: config.CHAT_TEMPERATURE,
  timeoutMs: config.GENERATION_TIMEOUT_MS,
});
const cache = new IndexCache(config.INDEX_DIR);

const assistant = new CampusAssistant({
  index: cache,
  embedder,
  generator,
  topK: config.TOP_K,
  instructions: defaultInstructions(config.INSTITUTION_NAME),
});

const rebuilder = new IndexRebuilder(
  {
    contentDir: config.CONTENT_DIR,
    indexDir: config.INDEX_DIR,
    embedder,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    batchSize: config.EMBED_BATCH_SIZE,
    concurrency: config.INDEX_CONCURRENCY,
  },
  cache,
);

const app = createApp({ config, assistant, embedder, cache, sessions: new SessionStore(), rebuilder });

// Load the index once at boot; requests arriving before it resolves share the same load.
cache
  .get()
  .then((result) => {
    if (result.status === 'not_found') {
      logger.warn({ path: result.path }, 'No index yet; run `npm run index:build` or POST /index/rebuild');
    }
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'Failed to load index at startup');
  });

const port = config.PORT;
app.listen(port, () => {
  logger.info({ port, index_dir: config.INDEX_DIR, model: config.OPENAI_CHAT_MODEL }, 'Server listening');
});
