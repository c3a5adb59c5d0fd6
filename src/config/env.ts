/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: Loads .env via dotenv, validates with zod and resolves the content/index directories against
 *      process.cwd(). Validation failures become a ConfigurationMissingError naming every offending
 *      variable, so the server and the build script can fail once at startup.
 *      getConfig() memoizes the result for the process; loadConfig() takes an explicit env for tests.
 */

import 'dotenv/config';
import { z } from 'zod';
import path from 'path';
import { ConfigurationMissingError } from '../errors.js';

// `KEY=` in .env arrives as an empty string; treat it as unset so the default applies.
const toNumber = (v: unknown) => {
  if (typeof v !== 'string') return v;
  return v.trim() === '' ? undefined : Number(v);
};

const intWithDefault = (def: number) => z.preprocess(toNumber, z.number().int().positive().default(def));

const floatWithDefault = (def: number, min: number, max: number) =>
  z.preprocess(toNumber, z.number().min(min).max(max).default(def));

const schema = z
  .object({
    OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
    OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    CHAT_TEMPERATURE: floatWithDefault(0.3, 0, 2),
    CHUNK_SIZE: intWithDefault(500),
    CHUNK_OVERLAP: z.preprocess(toNumber, z.number().int().min(0).default(50)),
    TOP_K: intWithDefault(3),
    CONTENT_DIR: z.string().min(1).default('data/scraped'),
    INDEX_DIR: z.string().min(1).default('data/vector_store'),
    EMBED_BATCH_SIZE: intWithDefault(64),
    INDEX_CONCURRENCY: intWithDefault(2),
    EMBED_TIMEOUT_MS: intWithDefault(30_000),
    GENERATION_TIMEOUT_MS: intWithDefault(30_000),
    INSTITUTION_NAME: z.string().min(1).default('the college'),
    UPLOAD_MAX_BYTES: intWithDefault(5 * 1024 * 1024),
    PORT: intWithDefault(3000),
    NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
  })
  .refine((c) => c.CHUNK_OVERLAP < c.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export interface AppConfig {
  OPENAI_API_KEY: string;
  OPENAI_EMBED_MODEL: string;
  OPENAI_CHAT_MODEL: string;
  CHAT_TEMPERATURE: number;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  CONTENT_DIR: string; // absolute
  INDEX_DIR: string; // absolute
  EMBED_BATCH_SIZE: number;
  INDEX_CONCURRENCY: number;
  EMBED_TIMEOUT_MS: number;
  GENERATION_TIMEOUT_MS: number;
  INSTITUTION_NAME: string;
  UPLOAD_MAX_BYTES: number;
  PORT: number;
  NODE_ENV: 'production' | 'development' | 'test';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((e) => e.path.join('.')))];
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationMissingError(variables, `Invalid environment configuration: ${issues}`);
  }
  const base = parsed.data;
  return {
    ...base,
    CONTENT_DIR: path.resolve(cwd, base.CONTENT_DIR),
    INDEX_DIR: path.resolve(cwd, base.INDEX_DIR),
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
