/**
 * Store-level errors. Each carries the HTTP status the relay answers with,
 * so route handlers can rethrow them untouched.
 */

export class ValidationError extends Error {
  readonly status = 400 as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Wraps any failure of the storage layer. The original error is kept as `cause`
 * for the server log; callers only ever see a generic message.
 */
export class InternalError extends Error {
  readonly status = 500 as const;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'InternalError';
  }
}
