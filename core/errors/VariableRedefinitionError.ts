import { VariableValidationError } from './VariableValidationError';

/**
 * Error thrown when a run attempts to bind a name that is already bound
 */
export class VariableRedefinitionError extends VariableValidationError {
  constructor(variableName: string) {
    super(`Variable "${variableName}" already exists`, variableName, {
      code: 'DUPLICATE_VARIABLE'
    });
  }
}
