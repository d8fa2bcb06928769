import { PipeshellError, type BaseErrorDetails } from './PipeshellError';

export interface VariableValidationErrorOptions {
  code?: string;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Error thrown when a variable name is malformed or may not be bound
 */
export class VariableValidationError extends PipeshellError {
  public readonly variableName: string;

  constructor(message: string, variableName: string, options: VariableValidationErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'INVALID_VARIABLE_NAME',
      details: { variableName, ...options.details },
      cause: options.cause
    });
    this.variableName = variableName;
  }

  static invalidName(variableName: string): VariableValidationError {
    return new VariableValidationError(
      `Invalid variable name "${variableName}": must match ^[a-zA-Z]+$ (excluding: content, file)`,
      variableName
    );
  }
}
