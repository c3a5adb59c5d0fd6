// src/app.ts
// What: Express application factory.
// How: Creates the app with a JSON body limit, mounts the routes over the injected services, and installs the
//      centralized error handler returning { error: { message, code? } }. Kept apart from server.ts so the
//      wiring can be built without listening on a port.

import express, { type NextFunction, type Request, type Response } from 'express';
import type { AppConfig } from './config/env.js';
import logger from './logging.js';
import { AssistantError } from './errors.js';
import { createRouter } from './routes/index.js';
import type { CampusAssistant } from './services/assistant.js';
import type { Embedder } from './services/embeddings.js';
import type { IndexCache } from './services/indexLoader.js';
import type { IndexRebuilder } from './services/rebuilder.js';
import type { SessionStore } from './services/sessions.js';

export interface AppDeps {
  config: Pick<AppConfig, 'TOP_K' | 'CONTENT_DIR' | 'UPLOAD_MAX_BYTES'>;
  assistant: CampusAssistant;
  embedder: Embedder;
  cache: IndexCache;
  sessions: SessionStore;
  rebuilder: IndexRebuilder;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(deps));

  // Centralized error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusFor(err);
    const code = err instanceof AssistantError ? err.code : undefined;
    const message = err instanceof Error ? err.message : 'Internal Server Error';
    logger.error({ err, status, code }, 'Unhandled error');
    res.status(status).json({ error: { message, code } });
  });

  return app;
}

function httpStatusFor(err: unknown): number {
  if (err instanceof AssistantError) {
    switch (err.code) {
      case 'EMBEDDING_FAILED':
      case 'REQUEST_FAILED':
      case 'EMPTY_RESPONSE':
        return 502;
      case 'TIMEOUT':
        return 504;
      default:
        return 500;
    }
  }
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}
