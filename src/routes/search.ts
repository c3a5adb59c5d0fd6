// src/routes/search.ts
// What: /search route for semantic search over the chunk index, without answer generation.
// How: Validates input with zod, loads the cached index (503 while none has been built), embeds the query and
//      returns the top-k chunks with their cosine similarity.

import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { AppDeps } from '../app.js';
import { INDEX_NOT_READY_MESSAGE } from '../services/assistant.js';
import { retrieve } from '../services/retriever.js';

export function createSearchRouter({ cache, embedder, config }: Pick<AppDeps, 'cache' | 'embedder' | 'config'>): Router {
  const schema = z.object({
    // Cap query length to avoid oversized embedding requests
    query: z.string().trim().min(1).max(2000),
    topK: z.number().int().positive().max(50).optional().default(config.TOP_K),
  });

  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const { query: q, topK } = parsed.data;

      const loaded = await cache.get();
      if (loaded.status === 'not_found') {
        res.status(503).json({ error: { message: INDEX_NOT_READY_MESSAGE, code: 'INDEX_NOT_FOUND' } });
        return;
      }

      const hits = await retrieve(loaded.index, q, topK, embedder);
      const matches = hits.map((h) => ({ position: h.position, score: h.score, content: h.content }));
      res.json({ query: q, topK, matches });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
