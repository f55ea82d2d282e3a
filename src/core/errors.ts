/**
 * Error classes for the boardroom data layer.
 *
 * All errors extend {@link BoardroomError} which provides:
 * - A machine-readable `code` for programmatic handling
 * - An HTTP-compatible `statusCode` for whatever layer presents the failure
 *
 * Recoverable failures (validation, stale rows, constraint violations on a
 * single statement) are returned inside a {@link Result}. Failures inside a
 * transaction are thrown so the transaction rolls back.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * const res = boards.createBoard(attrs);
 * if (!res.ok && res.error instanceof ValidationError) {
 *   console.log(res.error.fields); // { fact: ["can't be blank"] }
 * }
 * ```
 */

/**
 * Base error class for all boardroom errors.
 */
export class BoardroomError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code for programmatic handling
   * @param statusCode - HTTP status code (default: 500)
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'BoardroomError';
  }
}

/**
 * Error for a lookup that found nothing.
 *
 * @example
 * ```typescript
 * throw new NotFoundError('Board', boardId);
 * // message: "Board not found: abc123"
 * ```
 */
export class NotFoundError extends BoardroomError {
  /**
   * @param resource - The type of resource (e.g., 'Board', 'JoinRequest')
   * @param id - The identifier that was not found
   */
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for an operation that conflicts with existing state.
 *
 * Common scenarios:
 * - A user is already a member of the board
 * - A second pending join request for the same board
 * - A second judge on a board
 */
export class ConflictError extends BoardroomError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
  }
}

/** Per-field validation messages, keyed by attribute name. */
export type FieldErrors = Record<string, string[]>;

/**
 * Error for attributes that failed validation.
 *
 * `fields` lists the messages for every failing attribute, so a caller can
 * render them next to the matching input.
 */
export class ValidationError extends BoardroomError {
  constructor(
    message: string,
    public readonly fields: FieldErrors = {}
  ) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }

  static fromFields(fields: FieldErrors): ValidationError {
    const summary = Object.entries(fields)
      .map(([field, messages]) => `${field} ${messages.join(', ')}`)
      .join('; ');
    return new ValidationError(`Validation failed: ${summary}`, fields);
  }
}

/** Errors a repository hands back instead of throwing. */
export type RepositoryError = ValidationError | NotFoundError | ConflictError;

export type Result<T> = { ok: true; data: T } | { ok: false; error: RepositoryError };

export function ok<T>(data: T): Result<T> {
  return { ok: true, data };
}

export function fail<T>(error: RepositoryError): Result<T> {
  return { ok: false, error };
}

/**
 * Turn a SQLite constraint failure into a {@link ConflictError}.
 * Returns `null` for anything else so the caller can rethrow it.
 */
export function toConflict(err: unknown, what: string): ConflictError | null {
  if (!(err instanceof Error) || !('code' in err) || typeof err.code !== 'string') return null;
  if (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return new ConflictError(`${what} already exists`);
  }
  if (err.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new ConflictError(`${what} references a missing record`);
  }
  return null;
}
