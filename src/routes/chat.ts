// src/routes/chat.ts
// What: /chat route: one question in, one grounded answer out, with per-session history.
// How: Validates input with zod, opens (or creates) the caller's session, asks the assistant and records both
//      turns. The assistant never throws for a bad turn, so failures come back as a 200 with status 'failed'
//      and the apology text; only malformed requests get a 4xx.

import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { AppDeps } from '../app.js';

const PREVIEW_CHARS = 200;

const schema = z.object({
  // Blank questions are accepted here and answered by the assistant with a prompt for input.
  question: z.string().max(2000),
  session_id: z.string().optional(),
});

export function createChatRouter({ assistant, sessions }: Pick<AppDeps, 'assistant' | 'sessions'>): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message } });
        return;
      }
      const { question, session_id } = parsed.data;
      const session = sessions.open(session_id);

      const reply = await assistant.ask(question);
      if (reply.status !== 'empty_query') {
        session.append('user', question);
        session.append('assistant', reply.answer);
      }

      res.json({
        answer: reply.answer,
        status: reply.status,
        session_id: session.id,
        sources: reply.sources.map((s) => ({
          position: s.position,
          score: s.score,
          preview: s.content.slice(0, PREVIEW_CHARS),
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:sessionId/history', (req: Request, res: Response) => {
    const session = sessions.get(String(req.params.sessionId));
    if (!session) {
      res.status(404).json({ error: { message: 'session_not_found' } });
      return;
    }
    res.json({ session_id: session.id, turns: session.turns() });
  });

  return router;
}
