import { PipeshellError, type BaseErrorDetails } from './PipeshellError';

export interface TypeMismatchDetails extends BaseErrorDetails {
  /** Variant names the receiver accepts */
  expected: string[];
  /** Variant that was received */
  received: string;
  stage?: string;
  variableName?: string;
}

/**
 * Error thrown when a stage, or substitution, receives a value variant it
 * cannot handle
 */
export class TypeMismatchError extends PipeshellError {
  declare readonly details: TypeMismatchDetails;

  constructor(message: string, details: TypeMismatchDetails, code = 'TYPE_MISMATCH') {
    super(message, {
      code,
      details
    });
  }

  static forStage(stage: string, expected: string[], received: string): TypeMismatchError {
    return new TypeMismatchError(
      `Stage "${stage}" expects ${expected.join(' or ')} input, received ${received}`,
      { expected, received, stage }
    );
  }

  static unsupportedVariable(variableName: string, received: string): TypeMismatchError {
    return new TypeMismatchError(
      `Cannot substitute variable "${variableName}": unsupported type ${received}, required: text, bytes or file`,
      { expected: ['text', 'bytes', 'file'], received, variableName },
      'UNSUPPORTED_VARIABLE_TYPE'
    );
  }
}
