/**
 * Base class for every error raised by the cache layer. Transport errors
 * from `fetch` are never wrapped in one of these.
 */
export class HttpCacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpCacheError';
  }
}

/** A cache manager could not read, write or delete an entry. */
export class StorageError extends HttpCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** A stored record could not be decoded. */
export class SerializationError extends HttpCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

/** A freshness-relevant header could not be interpreted. */
export class PolicyError extends HttpCacheError {
  readonly header: string;

  constructor(header: string, message: string) {
    super(message);
    this.name = 'PolicyError';
    this.header = header;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
