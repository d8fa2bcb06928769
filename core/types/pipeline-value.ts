/**
 * Pipeline Value Model
 *
 * The closed set of values that can flow between pipeline stages. Every stage
 * receives one of these variants and returns one of these variants; branching
 * on a value is an exhaustive switch over `type`.
 */

import type { FileHandle } from 'fs/promises';

// =========================================================================
// VARIANTS
// =========================================================================

export interface EmptyValue {
  type: 'empty';
}

export interface TextValue {
  type: 'text';
  value: string;
}

export interface BytesValue {
  type: 'bytes';
  value: Buffer;
}

/**
 * A file-backed value. `handle` is present when the producing stage left a
 * descriptor open; the runner closes it at the end of the run.
 */
export interface FileValue {
  type: 'file';
  path: string;
  handle?: FileHandle;
}

export interface StructValue {
  type: 'struct';
  value: unknown;
}

/**
 * Marker returned by a binding stage. The runner stores `value` under `name`
 * and then forwards the marker itself to the next stage.
 */
export interface BindingValue {
  type: 'binding';
  name: string;
  value: PipelineValue;
}

export interface SplitValue {
  type: 'split';
  left: PipelineValue;
  right: PipelineValue;
}

/**
 * Input handed to command stages: the raw output of the previous stage plus
 * a reference to the run's live bindings.
 */
export interface InterceptedValue {
  type: 'intercepted';
  raw: PipelineValue;
  variables: VariableBindings;
}

export type PipelineValue =
  | EmptyValue
  | TextValue
  | BytesValue
  | FileValue
  | StructValue
  | BindingValue
  | SplitValue
  | InterceptedValue;

export type PipelineValueType = PipelineValue['type'];

/**
 * Read access to a run's variable bindings
 */
export interface VariableBindings {
  get(name: string): PipelineValue | undefined;
  has(name: string): boolean;
  entries(): IterableIterator<[string, PipelineValue]>;
  readonly size: number;
}

// =========================================================================
// FACTORIES
// =========================================================================

const EMPTY: EmptyValue = Object.freeze({ type: 'empty' });

export const PipelineValues = {
  empty: (): EmptyValue => EMPTY,

  text: (value: string): TextValue => ({ type: 'text', value }),

  bytes: (value: Buffer | string): BytesValue => ({
    type: 'bytes',
    value: typeof value === 'string' ? Buffer.from(value, 'utf8') : value
  }),

  file: (path: string, handle?: FileHandle): FileValue =>
    handle ? { type: 'file', path, handle } : { type: 'file', path },

  struct: (value: unknown): StructValue => ({ type: 'struct', value }),

  binding: (name: string, value: PipelineValue): BindingValue => ({
    type: 'binding',
    name,
    value
  }),

  split: (left: PipelineValue, right: PipelineValue): SplitValue => ({
    type: 'split',
    left,
    right
  }),

  intercepted: (raw: PipelineValue, variables: VariableBindings): InterceptedValue => ({
    type: 'intercepted',
    raw,
    variables
  })
};

// =========================================================================
// HELPERS
// =========================================================================

export function isFileValue(value: PipelineValue): value is FileValue {
  return value.type === 'file';
}

/**
 * Decoded text of a text or bytes value, undefined for every other variant
 */
export function valueAsText(value: PipelineValue): string | undefined {
  switch (value.type) {
    case 'text':
      return value.value;
    case 'bytes':
      return value.value.toString('utf8');
    default:
      return undefined;
  }
}

/**
 * Human-readable variant name used in error messages
 */
export function describeValueType(value: PipelineValue): string {
  switch (value.type) {
    case 'empty':
      return 'empty';
    case 'text':
      return 'text';
    case 'bytes':
      return 'bytes';
    case 'file':
      return `file (${value.path})`;
    case 'struct':
      return 'struct';
    case 'binding':
      return `binding (${value.name})`;
    case 'split':
      return 'split result';
    case 'intercepted':
      return 'intercepted input';
  }
}
