import type { PipelineValue } from '@core/types';
import { toPlainValue } from '@interpreter/eval/pipeline';

/**
 * Render the final value of a run for the terminal: text and bytes as they
 * are, files as their path, structured values as indented JSON
 */
export function formatResultValue(value: PipelineValue): string | Buffer {
  switch (value.type) {
    case 'empty':
      return '';
    case 'text':
    case 'bytes':
      return value.value;
    case 'file':
      return value.path;
    case 'struct':
    case 'split':
      return JSON.stringify(toPlainValue(value), null, 2) ?? '';
    case 'binding':
      return formatResultValue(value.value);
    case 'intercepted':
      return formatResultValue(value.raw);
  }
}
