// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health, GET /index/status (index presence and metadata plus rebuild status) and POST /index/rebuild
//      (starts a full rebuild unless one is running), and mounts /chat, /search and /content.

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { AppDeps } from '../app.js';
import { createChatRouter } from './chat.js';
import { createSearchRouter } from './search.js';
import { createContentRouter } from './content.js';

export function createRouter(deps: AppDeps): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.get('/index/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const loaded = await deps.cache.get();
      const index = loaded.status === 'found' ? loaded.index : null;
      res.json({
        ready: index !== null,
        path: loaded.path,
        chunks: index?.size ?? 0,
        model: index?.model,
        dimensions: index?.dimensions,
        created_at: index?.createdAt,
        rebuild: deps.rebuilder.status(),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/index/rebuild', (_req: Request, res: Response) => {
    const correlationId = deps.rebuilder.start();
    if (!correlationId) {
      res.status(409).json({ error: { message: 'An index rebuild is already running', code: 'REBUILD_RUNNING' } });
      return;
    }
    res.status(202).json({ correlation_id: correlationId, rebuild: deps.rebuilder.status() });
  });

  router.use('/chat', createChatRouter(deps));
  router.use('/search', createSearchRouter(deps));
  router.use('/content', createContentRouter(deps));

  return router;
}
