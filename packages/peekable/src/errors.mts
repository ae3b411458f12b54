/**
 * Custom error classes for the peekable adapter
 */

const reasonOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Base error class for all peekable errors
 */
export class PeekableError extends Error {
  constructor(message: string, public readonly code: string, public readonly context?: unknown) {
    super(message);
    this.name = 'PeekableError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when construction options are invalid
 */
export class InvalidPeekableConfigError extends PeekableError {
  constructor(message: string, public readonly field: string, public readonly value: unknown) {
    super(message, 'INVALID_PEEKABLE_CONFIG', { field, value });
    this.name = 'InvalidPeekableConfigError';
  }
}

/**
 * Error thrown when the clone function fails while recording history.
 * The item has already been advanced past; it is carried here.
 */
export class CloneError<T = unknown> extends PeekableError {
  constructor(
    public readonly originalError: unknown,
    public readonly item: T
  ) {
    super(`Failed to clone item into history: ${reasonOf(originalError)}`, 'CLONE_FAILED', { originalError });
    this.name = 'CloneError';
  }
}
