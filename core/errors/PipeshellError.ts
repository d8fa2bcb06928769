/**
 * Base interface for error details.
 * Specific error types should extend this.
 */
export type BaseErrorDetails = Record<string, unknown>;

/**
 * Options for creating a PipeshellError instance.
 */
export interface PipeshellErrorOptions {
  code: string;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for all custom pipeshell errors.
 * Provides structure for error codes and details.
 */
export class PipeshellError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: PipeshellErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isPipeshellError(error: unknown): error is PipeshellError {
  return error instanceof PipeshellError;
}

/**
 * Normalise a caught value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : String(error));
}
