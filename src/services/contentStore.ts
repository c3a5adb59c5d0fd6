// src/services/contentStore.ts
// What: Reads the collected plain-text corpus (scraped pages, document excerpts) from CONTENT_DIR.
// How: Recursively walks the content directory for .txt files, reads each as UTF-8 and joins the non-empty
//      ones with a blank line. A missing directory is an empty corpus, not an error. Also stores uploaded
//      corpus files under a sanitized name for the next index rebuild.

import fs from 'fs/promises';
import path from 'path';
import baseLogger from '../logging.js';
import { isNotFound, pathExists } from '../util/files.js';

const logger = baseLogger.child({ module: 'content-store' });

export const CORPUS_SEPARATOR = '\n\n';

export interface ContentFile {
  filename: string; // relative to the content directory, forward slashes
  path: string; // absolute path
}

export interface CorpusSource {
  filename: string;
  chars: number;
}

export interface Corpus {
  text: string;
  sources: CorpusSource[];
}

export async function scanContent(root: string): Promise<ContentFile[]> {
  const out: ContentFile[] = [];
  try {
    await walk(root, root, out);
  } catch (err: unknown) {
    if (isNotFound(err)) {
      logger.warn({ dir: root }, 'Content directory not found; corpus is empty');
      return [];
    }
    throw err;
  }
  return out.sort((a, b) => a.filename.localeCompare(b.filename));
}

async function walk(root: string, dir: string, acc: ContentFile[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      await walk(root, full, acc);
    } else if (e.isFile() && e.name.toLowerCase().endsWith('.txt')) {
      acc.push({ filename: path.relative(root, full).split(path.sep).join('/'), path: full });
    }
  }
}

export async function loadCorpus(root: string): Promise<Corpus> {
  const files = await scanContent(root);
  const parts: string[] = [];
  const sources: CorpusSource[] = [];

  for (const f of files) {
    const content = await fs.readFile(f.path, 'utf8');
    if (content.trim().length === 0) {
      logger.debug({ file: f.filename }, 'Skipping empty content file');
      continue;
    }
    parts.push(content);
    sources.push({ filename: f.filename, chars: content.length });
    logger.info({ file: f.filename, chars: content.length }, 'Loaded content file');
  }

  const text = parts.join(CORPUS_SEPARATOR);
  logger.info({ files: sources.length, chars: text.length }, 'Corpus loaded');
  return { text, sources };
}

// Base name only, no reserved or control characters, at most 200 characters with the extension kept.
export function sanitizeFilename(name: string): string {
  let sanitized = path.basename(name.replace(/\\/g, '/'));

  sanitized = sanitized.replace(/[<>:"|?*\x00-\x1f]/g, '_');

  // Limit length (preserve extension)
  const ext = path.extname(sanitized);
  const base = path.basename(sanitized, ext);
  const maxBaseLen = 200 - ext.length;

  if (base.length > maxBaseLen) {
    sanitized = base.substring(0, maxBaseLen) + ext;
  }

  return sanitized;
}

export interface SavedContentFile {
  filename: string;
  path: string;
  bytes: number;
  replaced: boolean;
}

/**
 * Store a corpus file in the content directory, replacing any file of the same name.
 * The file takes part in the next index build; the live index is not touched.
 */
export async function saveContentFile(root: string, originalName: string, data: Buffer): Promise<SavedContentFile> {
  const filename = sanitizeFilename(originalName);
  if (!filename.toLowerCase().endsWith('.txt') || filename === '.txt') {
    throw new Error('Only .txt files are allowed');
  }

  await fs.mkdir(root, { recursive: true });
  const target = path.join(root, filename);

  const replaced = await pathExists(target);

  await fs.writeFile(target, data);
  logger.info({ filename, path: target, bytes: data.length, replaced }, 'Saved content file');
  return { filename, path: target, bytes: data.length, replaced };
}
