export type SupportErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'INDEX_BUSY'
  | 'INDEX_CORRUPT'
  | 'EMBEDDING_FAILED'
  | 'GENERATION_FAILED'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_RATE_LIMITED'
  | 'REQUEST_TIMEOUT';

/**
 * Base class for every error the support pipeline raises on purpose.
 * `code` is stable and is what callers (and the HTTP filter) switch on.
 */
export abstract class SupportError extends Error {
  abstract readonly code: SupportErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends SupportError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
  }
}

export type NotFoundEntity = 'conversation' | 'ticket' | 'chunk';

export class NotFoundError extends SupportError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: NotFoundEntity,
    readonly id: string,
  ) {
    super(`${entity} "${id}" not found`);
  }
}

export class IndexBusyError extends SupportError {
  readonly code = 'INDEX_BUSY';

  constructor(operation: 'ingest' | 'clear') {
    super(`Cannot ${operation} while an ingest is in progress`);
  }
}

export class IndexCorruptError extends SupportError {
  readonly code = 'INDEX_CORRUPT';
}

export class EmbeddingError extends SupportError {
  readonly code = 'EMBEDDING_FAILED';
}

export class GenerationError extends SupportError {
  readonly code: SupportErrorCode = 'GENERATION_FAILED';
}

export class GenerationTimeoutError extends GenerationError {
  override readonly code = 'GENERATION_TIMEOUT';
}

export class GenerationRateLimitError extends GenerationError {
  override readonly code = 'GENERATION_RATE_LIMITED';
}

export class RequestTimeoutError extends SupportError {
  readonly code = 'REQUEST_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Request did not complete within ${timeoutMs}ms`);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
