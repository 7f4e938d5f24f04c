/**
 * ListingSync: Errors
 */

export type ListingSyncErrorCode =
  | 'CONFIG_INVALID'
  | 'UNKNOWN_CATEGORY'
  | 'CACHE_WRITE_FAILED';

export class ListingSyncError extends Error {
  readonly code: ListingSyncErrorCode;

  constructor(code: ListingSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ListingSyncError';
    this.code = code;
  }
}

export class ConfigError extends ListingSyncError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

export class CachePersistenceError extends ListingSyncError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('CACHE_WRITE_FAILED', `Failed to write ${path}: ${detail}`, { cause });
    this.name = 'CachePersistenceError';
    this.path = path;
  }
}
