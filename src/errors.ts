// src/errors.ts
// What: Typed errors raised by the retrieval pipeline.
// How: Each error carries a string code so callers (routes, the assistant, the build script) can branch on it
//      without string matching. A missing index is not an error: see IndexLoadResult in indexLoader.ts.

export type AssistantErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'EMBEDDING_FAILED'
  | 'EMBEDDING_MODEL_MISMATCH'
  | 'INDEX_CORRUPT'
  | GenerationFailureCode;

export type GenerationFailureCode = 'TIMEOUT' | 'REQUEST_FAILED' | 'EMPTY_RESPONSE';

export class AssistantError extends Error {
  code: AssistantErrorCode;
  constructor(code: AssistantErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssistantError';
    this.code = code;
  }
}

export class ConfigurationMissingError extends AssistantError {
  readonly variables: string[];
  constructor(variables: string[], message: string) {
    super('CONFIGURATION_MISSING', message);
    this.name = 'ConfigurationMissingError';
    this.variables = variables;
  }
}

export class EmbeddingFailureError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super('EMBEDDING_FAILED', message, { cause });
    this.name = 'EmbeddingFailureError';
  }
}

export class EmbeddingModelMismatchError extends AssistantError {
  constructor(indexModel: string, queryModel: string) {
    super(
      'EMBEDDING_MODEL_MISMATCH',
      `Index was built with embedding model "${indexModel}" but queries use "${queryModel}"`,
    );
    this.name = 'EmbeddingModelMismatchError';
  }
}

export class IndexCorruptError extends AssistantError {
  readonly path: string;
  constructor(path: string, message: string, cause?: unknown) {
    super('INDEX_CORRUPT', message, { cause });
    this.name = 'IndexCorruptError';
    this.path = path;
  }
}

export class GenerationFailureError extends AssistantError {
  constructor(code: GenerationFailureCode, message: string, cause?: unknown) {
    super(code, message, { cause });
    this.name = 'GenerationFailureError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
