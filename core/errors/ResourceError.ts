import { PipeshellError } from './PipeshellError';

export type ResourceOperation = 'create' | 'open' | 'read' | 'write' | 'close' | 'delete';

export interface ResourceErrorDetails extends Record<string, unknown> {
  operation: ResourceOperation;
  path: string;
  /** Stage error this failure superseded, when raised during cleanup */
  stageError?: Error;
  /** Further cleanup failures after the first */
  additionalFailures?: ResourceError[];
}

/**
 * Error thrown when a tracked file cannot be created, opened, read, written,
 * closed or deleted
 */
export class ResourceError extends PipeshellError {
  declare readonly details: ResourceErrorDetails;

  constructor(message: string, details: ResourceErrorDetails, cause?: unknown) {
    super(message, {
      code: 'RESOURCE_FAILED',
      details,
      cause
    });
  }

  static create(operation: ResourceOperation, path: string, cause: unknown): ResourceError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ResourceError(`Failed to ${operation} ${path}: ${reason}`, { operation, path }, cause);
  }
}
