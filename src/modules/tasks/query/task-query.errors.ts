export type QueryField =
  | 'status'
  | 'priority'
  | 'assigneeId'
  | 'dueDateFrom'
  | 'dueDateTo'
  | 'q'
  | 'sort'
  | 'limit'
  | 'cursor';

export type QueryValidationCode =
  | 'INVALID_ENUM'
  | 'INVALID_FORMAT'
  | 'INVALID_RANGE'
  | 'CONSTRAINT_VIOLATION'
  | 'INCOMPATIBLE_WITH_CURSOR';

export type CursorErrorCode =
  | 'INVALID_FORMAT'
  | 'INVALID_SIGNATURE'
  | 'EXPIRED'
  | 'QUERY_MISMATCH';

/**
 * Input the caller can correct: a bad enum token, a malformed value or a
 * combination of options that cannot be honored together.
 */
export class QueryValidationError extends Error {
  readonly kind = 'validation' as const;

  constructor(
    readonly field: QueryField,
    readonly code: QueryValidationCode,
    readonly rejectedValue?: string,
  ) {
    super(
      rejectedValue === undefined
        ? `${field}: ${code}`
        : `${field}: ${code} (rejected: ${rejectedValue})`,
    );
    this.name = 'QueryValidationError';
  }
}

/**
 * A pagination cursor that cannot be used. Every code tells the client to
 * restart from the first page; the distinction only matters for diagnostics.
 */
export class CursorError extends Error {
  readonly kind = 'cursor' as const;
  readonly field = 'cursor' as const;

  constructor(readonly code: CursorErrorCode) {
    super(`cursor: ${code}`);
    this.name = 'CursorError';
  }
}

export type TaskQueryError = QueryValidationError | CursorError;

export function isTaskQueryError(error: unknown): error is TaskQueryError {
  return error instanceof QueryValidationError || error instanceof CursorError;
}
