import type { PipelineValue, VariableBindings } from '@core/types';
import { VariableValidationError, VariableRedefinitionError } from '@core/errors';
import { RESERVED_VARIABLE_NAMES, VARIABLE_NAME_PATTERN } from '@core/constants/pipeline';

export function isReservedVariableName(name: string): boolean {
  return RESERVED_VARIABLE_NAMES.some(reserved => reserved === name);
}

/**
 * Throws unless `name` matches ^[a-zA-Z]+$ and is not a reserved name
 */
export function validateVariableName(name: string): void {
  if (!VARIABLE_NAME_PATTERN.test(name) || isReservedVariableName(name)) {
    throw VariableValidationError.invalidName(name);
  }
}

/**
 * Write-once name → value bindings for a single run
 */
export class VariableStore implements VariableBindings {
  private readonly variables = new Map<string, PipelineValue>();

  bind(name: string, value: PipelineValue): void {
    validateVariableName(name);
    if (this.variables.has(name)) {
      throw new VariableRedefinitionError(name);
    }
    this.variables.set(name, value);
  }

  get(name: string): PipelineValue | undefined {
    return this.variables.get(name);
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  entries(): IterableIterator<[string, PipelineValue]> {
    return this.variables.entries();
  }

  get size(): number {
    return this.variables.size;
  }
}
