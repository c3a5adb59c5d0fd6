// src/routes/content.ts
// What: HTTP endpoint for adding plain-text corpus files (scraped pages, document excerpts).
// How: Uses multer for multipart/form-data with in-memory storage, accepts only .txt files up to UPLOAD_MAX_BYTES,
//      and stores them in CONTENT_DIR. New content is picked up by the next full index rebuild.

import { Router, type Request, type Response, type NextFunction } from 'express';
import multer from 'multer';
import type { AppDeps } from '../app.js';
import logger from '../logging.js';
import { saveContentFile } from '../services/contentStore.js';

const NOT_TEXT = 'Only .txt files are allowed';

export function createContentRouter({ config }: Pick<AppDeps, 'config'>): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.UPLOAD_MAX_BYTES },
    fileFilter: (_req, file, cb) => {
      if (file.originalname.toLowerCase().endsWith('.txt')) {
        cb(null, true);
      } else {
        cb(new Error(NOT_TEXT));
      }
    },
  });
  const single = upload.single('file');

  // POST /content - store a corpus file
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    single(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
        res.status(413).json({ error: { message: `File too large. Maximum size is ${config.UPLOAD_MAX_BYTES} bytes.` } });
        return;
      }
      if (err instanceof Error && err.message === NOT_TEXT) {
        res.status(415).json({ error: { message: NOT_TEXT } });
        return;
      }
      if (err) {
        next(err);
        return;
      }
      if (!req.file) {
        res.status(400).json({ error: { message: 'No file provided' } });
        return;
      }

      const { buffer, originalname } = req.file;
      logger.info({ filename: originalname, size: buffer.length }, 'Content upload received');

      saveContentFile(config.CONTENT_DIR, originalname, buffer)
        .then((saved) => {
          res.status(201).json({ filename: saved.filename, bytes: saved.bytes, replaced: saved.replaced });
        })
        .catch(next);
    });
  });

  return router;
}
