export type QueryErrorCode =
  | 'UnknownEntity'
  | 'UnknownField'
  | 'TypeMismatch'
  | 'DuplicateEntity'
  | 'AmbiguousJoin'
  | 'EmptyAggregate'
  | 'PlanValidationError'
  | 'SourceError'
  | 'TimeoutError'
  | 'UnsupportedOperation'
  | 'Cancelled';

/** Build-time errors can be fixed by the caller and retried; execute-time errors fail a cursor. */
export type QueryErrorPhase = 'build' | 'execute';

export abstract class QueryError extends Error {
  abstract readonly code: QueryErrorCode;
  abstract readonly phase: QueryErrorPhase;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownEntityError extends QueryError {
  override readonly name = 'UnknownEntityError';
  readonly code = 'UnknownEntity';
  readonly phase = 'build';

  constructor(readonly entity: string) {
    super(`Unknown entity "${entity}"`);
  }
}

export class UnknownFieldError extends QueryError {
  override readonly name = 'UnknownFieldError';
  readonly code = 'UnknownField';
  readonly phase = 'build';

  constructor(
    readonly owner: string,
    readonly path: string,
  ) {
    super(`Unknown field "${path}" on ${owner}`);
  }
}

export class TypeMismatchError extends QueryError {
  override readonly name = 'TypeMismatchError';
  readonly code = 'TypeMismatch';
  readonly phase = 'build';
}

export class DuplicateEntityError extends QueryError {
  override readonly name = 'DuplicateEntityError';
  readonly code = 'DuplicateEntity';
  readonly phase = 'build';

  constructor(readonly entity: string) {
    super(`Entity "${entity}" is already registered`);
  }
}

export class AmbiguousJoinError extends QueryError {
  override readonly name = 'AmbiguousJoinError';
  readonly code = 'AmbiguousJoin';
  readonly phase = 'build';
}

export class PlanValidationError extends QueryError {
  override readonly name = 'PlanValidationError';
  readonly code = 'PlanValidationError';
  readonly phase = 'build';

  constructor(readonly errors: readonly QueryError[]) {
    super(
      `Query failed validation with ${errors.length} error(s):\n` +
        errors.map((e) => `  - ${e.message}`).join('\n'),
    );
  }
}

export class EmptyAggregateError extends QueryError {
  override readonly name = 'EmptyAggregateError';
  readonly code = 'EmptyAggregate';
  readonly phase = 'execute';

  constructor(readonly fn: string) {
    super(`Cannot compute ${fn} of an empty sequence`);
  }
}

export class SourceError extends QueryError {
  override readonly name = 'SourceError';
  readonly code = 'SourceError';
  readonly phase = 'execute';
}

export class TimeoutError extends QueryError {
  override readonly name = 'TimeoutError';
  readonly code = 'TimeoutError';
  readonly phase = 'execute';

  constructor(readonly timeoutMs: number) {
    super(`Query did not produce a row within ${timeoutMs}ms`);
  }
}

export class UnsupportedOperationError extends QueryError {
  override readonly name = 'UnsupportedOperationError';
  readonly code = 'UnsupportedOperation';
  readonly phase = 'execute';

  constructor(
    readonly backend: string,
    readonly operation: string,
  ) {
    super(`${backend} cannot express ${operation}`);
  }
}

export class CancelledError extends QueryError {
  override readonly name = 'CancelledError';
  readonly code = 'Cancelled';
  readonly phase = 'execute';

  constructor(reason?: unknown) {
    super('Query was cancelled', reason);
  }
}
