/**
 * Central export point for pipeshell error types.
 */

export {
  PipeshellError,
  isPipeshellError,
  toError,
  type BaseErrorDetails,
  type PipeshellErrorOptions
} from './PipeshellError';
export { VariableValidationError } from './VariableValidationError';
export { VariableRedefinitionError } from './VariableRedefinitionError';
export { TypeMismatchError, type TypeMismatchDetails } from './TypeMismatchError';
export { CommandExecutionError, type CommandExecutionDetails } from './CommandExecutionError';
export { ResourceError, type ResourceErrorDetails, type ResourceOperation } from './ResourceError';
export { PipelineDefinitionError, type PipelineDefinitionDetails } from './PipelineDefinitionError';
