/**
 * Errors surfaced to API callers.
 *
 * Each carries the HTTP status the error handler responds with, and keeps
 * the failure it wraps as `cause` so the detail reaches the caller and logs.
 */
export class SearchApiError extends Error {
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, options: { cause?: unknown; details?: unknown } = {}) {
    super(message, { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'SearchApiError';
    this.statusCode = statusCode;
    this.details = options.details;
  }
}

/** Rejected request: bad mode, empty query, limit out of range. Never reaches a collaborator. */
export class ValidationError extends SearchApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, { details });
    this.name = 'ValidationError';
  }
}

export class EmbeddingProviderError extends SearchApiError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, { cause });
    this.name = 'EmbeddingProviderError';
  }
}

export class BackendQueryError extends SearchApiError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, { cause });
    this.name = 'BackendQueryError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
