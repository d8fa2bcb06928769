import type { PipelineValue, VariableBindings } from '@core/types';
import { describeValueType, valueAsText } from '@core/types';
import { TypeMismatchError } from '@core/errors';

export function placeholder(name: string): string {
  return `#{${name}}`;
}

function replacePlaceholder(template: string, name: string, text: string): string {
  // Function replacer so `$&`-style patterns in the text are inserted literally
  return template.replaceAll(placeholder(name), () => text);
}

/**
 * Text form of a bound variable: text and bytes decode, files become their
 * path; any other variant cannot be substituted.
 */
export function variableText(name: string, value: PipelineValue): string {
  switch (value.type) {
    case 'text':
    case 'bytes':
      return valueAsText(value) ?? '';
    case 'file':
      return value.path;
    default:
      throw TypeMismatchError.unsupportedVariable(name, describeValueType(value));
  }
}

/**
 * Resolve `#{...}` placeholders in a command template.
 *
 * `#{content}` takes the text of a text/bytes ambient value and `#{file}` the
 * path of a file ambient value; every bound variable then replaces its own
 * placeholder. Placeholders naming nothing are left as written.
 */
export function substituteVariables(
  template: string,
  variables: VariableBindings,
  ambient: PipelineValue
): string {
  let resolved = template;

  switch (ambient.type) {
    case 'text':
    case 'bytes':
      resolved = replacePlaceholder(resolved, 'content', valueAsText(ambient) ?? '');
      break;
    case 'file':
      resolved = replacePlaceholder(resolved, 'file', ambient.path);
      break;
    default:
      break;
  }

  for (const [name, value] of variables.entries()) {
    resolved = replacePlaceholder(resolved, name, variableText(name, value));
  }

  return resolved;
}
