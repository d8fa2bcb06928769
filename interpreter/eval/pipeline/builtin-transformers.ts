/**
 * Built-in value transformers
 *
 * Stages that reshape the value flowing through a pipeline without touching
 * the filesystem or spawning processes.
 */

import {
  PipelineValues,
  defineStage,
  describeValueType,
  reportProgress,
  valueAsText,
  type PipelineValue,
  type Stage
} from '@core/types';
import { TypeMismatchError } from '@core/errors';
import { validateVariableName } from '@interpreter/env/VariableStore';

/**
 * Ignore the input and emit `value`
 */
export function insert(value: PipelineValue): Stage {
  return defineStage('insert', async (_input, progress) => {
    reportProgress(progress, 'Inserting value into pipeline');
    return value;
  });
}

/**
 * Replace the input with an empty value. Used after `bindVariable` so the
 * binding marker does not reach the next stage.
 */
export function discard(): Stage {
  return defineStage('discard', async () => PipelineValues.empty());
}

/**
 * Emit `value` as a value owned by an enclosing run. Split uses this to hand
 * its input to each branch.
 */
export function seed(value: PipelineValue): Stage {
  return defineStage('seed', async () => value, 'seed');
}

/**
 * Bind the input to `name` for `#{name}` substitution in later command
 * stages. The name must match ^[a-zA-Z]+$ and may not be `content` or `file`;
 * it is checked when the stage runs.
 *
 * The next stage receives the binding marker, not the input.
 */
export function bindVariable(name: string): Stage {
  return defineStage(`bind(${name})`, async input => {
    validateVariableName(name);
    return PipelineValues.binding(name, input);
  });
}

/**
 * Drop every line of a text or bytes input containing any of `exclusions`.
 * Any other input yields empty text.
 */
export function excludeLines(separator: string, ...exclusions: string[]): Stage {
  return defineStage('excludeLines', async input => {
    const content = valueAsText(input);
    if (content === undefined) {
      return PipelineValues.text('');
    }

    const kept = content
      .split(separator)
      .filter(line => !exclusions.some(exclusion => line.includes(exclusion)));
    return PipelineValues.text(kept.join(separator));
  });
}

/**
 * Plain JSON-compatible form of a value. Binding markers and interception
 * envelopes have none.
 */
export function toPlainValue(value: PipelineValue): unknown {
  switch (value.type) {
    case 'empty':
      return null;
    case 'text':
    case 'bytes':
      return valueAsText(value);
    case 'file':
      return value.path;
    case 'struct':
      return value.value;
    case 'split':
      return { left: toPlainValue(value.left), right: toPlainValue(value.right) };
    case 'binding':
    case 'intercepted':
      throw TypeMismatchError.forStage(
        'toJSON',
        ['empty', 'text', 'bytes', 'file', 'struct', 'split result'],
        describeValueType(value)
      );
  }
}

/**
 * Serialise the input as JSON bytes
 */
export function toJSON(): Stage {
  return defineStage('toJSON', async (input, progress) => {
    reportProgress(progress, 'Serialising value as JSON');
    return PipelineValues.bytes(JSON.stringify(toPlainValue(input)) ?? 'null');
  });
}

/**
 * Parse a text or bytes input as JSON into a struct value, optionally
 * checking its shape
 */
export function parseJSON(validate?: (value: unknown) => boolean): Stage {
  return defineStage('parseJSON', async (input, progress) => {
    reportProgress(progress, 'Parsing JSON input');
    const content = valueAsText(input);
    if (content === undefined) {
      throw TypeMismatchError.forStage('parseJSON', ['text', 'bytes'], describeValueType(input));
    }

    const parsed: unknown = JSON.parse(content);
    if (validate && !validate(parsed)) {
      throw new TypeMismatchError('Parsed JSON does not have the expected shape', {
        expected: ['validated struct'],
        received: 'struct',
        stage: 'parseJSON'
      });
    }
    return PipelineValues.struct(parsed);
  });
}
