export class ValidationError extends Error {
  constructor(message: string, public statusCode: number = 400) {
    super(message);
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends Error {
  constructor(message: string, public statusCode: number = 404) {
    super(message);
    this.name = 'NotFoundError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A write of the ID lists, metadata or collections did not complete.
 * The in-memory state is still the pre-operation state, so the caller may retry.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public operation: string,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'PersistenceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class FetchError extends Error {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class PageParseError extends Error {
  constructor(message: string, public url: string) {
    super(message);
    this.name = 'PageParseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class OperationCancelledError extends Error {
  constructor(public operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'OperationCancelledError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// Thrown when a collection record would end up with `added` outside `items`.
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
