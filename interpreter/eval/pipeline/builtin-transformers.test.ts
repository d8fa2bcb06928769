import { describe, it, expect } from 'vitest';
import {
  insert,
  discard,
  seed,
  bindVariable,
  excludeLines,
  toJSON,
  parseJSON
} from './builtin-transformers';
import { PipelineValues, discardProgress } from '@core/types';
import { TypeMismatchError, VariableValidationError } from '@core/errors';
import { ProgressRecorder } from '@tests/utils/ProgressRecorder';

describe('builtin transformers', () => {
  describe('insert', () => {
    it('should ignore its input and report progress', async () => {
      const progress = new ProgressRecorder();

      const output = await insert(PipelineValues.text('x')).run(PipelineValues.text('ignored'), progress);

      expect(output).toEqual({ type: 'text', value: 'x' });
      expect(progress.text).toBe('\nInserting value into pipeline\n');
    });
  });

  it('should discard to an empty value', async () => {
    expect(await discard().run(PipelineValues.text('x'), discardProgress)).toEqual({ type: 'empty' });
  });

  it('should mark seeds with the seed role', () => {
    expect(seed(PipelineValues.empty()).role).toBe('seed');
    expect(insert(PipelineValues.empty()).role).toBe('transform');
  });

  describe('bindVariable', () => {
    it('should wrap its input in a binding marker', async () => {
      const output = await bindVariable('greeting').run(PipelineValues.text('hello'), discardProgress);

      expect(output).toEqual({ type: 'binding', name: 'greeting', value: { type: 'text', value: 'hello' } });
    });

    it('should validate the name when it runs', async () => {
      const stage = bindVariable('content');

      await expect(stage.run(PipelineValues.empty(), discardProgress)).rejects.toBeInstanceOf(
        VariableValidationError
      );
    });
  });

  describe('excludeLines', () => {
    it('should drop lines containing any exclusion', async () => {
      const stage = excludeLines('\n', 'hi', 'there');

      const output = await stage.run(PipelineValues.bytes('hi\nthere and here\nyou\n'), discardProgress);

      expect(output).toEqual({ type: 'text', value: 'you\n' });
    });

    it('should leave nothing when the only line is excluded', async () => {
      const output = await excludeLines('\n', 'every').run(PipelineValues.text('hello everyone'), discardProgress);

      expect(output).toEqual({ type: 'text', value: '' });
    });

    it('should honour custom separators', async () => {
      const output = await excludeLines(',', 'b').run(PipelineValues.text('a,b,c'), discardProgress);

      expect(output).toEqual({ type: 'text', value: 'a,c' });
    });

    it('should yield empty text for non-text input', async () => {
      const output = await excludeLines('\n', 'x').run(PipelineValues.struct([1]), discardProgress);

      expect(output).toEqual({ type: 'text', value: '' });
    });
  });

  describe('toJSON', () => {
    it('should serialise struct payloads compactly', async () => {
      const output = await toJSON().run(PipelineValues.struct({ name: 'bob' }), discardProgress);

      expect(output).toEqual({ type: 'bytes', value: Buffer.from('{"name":"bob"}') });
    });

    it('should serialise split results and empty values', async () => {
      const pair = PipelineValues.split(PipelineValues.text('l'), PipelineValues.empty());

      const output = await toJSON().run(pair, discardProgress);

      expect(output).toEqual({ type: 'bytes', value: Buffer.from('{"left":"l","right":null}') });
    });

    it('should reject binding markers', async () => {
      const marker = PipelineValues.binding('x', PipelineValues.empty());

      await expect(toJSON().run(marker, discardProgress)).rejects.toBeInstanceOf(TypeMismatchError);
    });
  });

  describe('parseJSON', () => {
    it('should parse bytes into a struct', async () => {
      const output = await parseJSON().run(PipelineValues.bytes('{"name": "bob"}'), discardProgress);

      expect(output).toEqual({ type: 'struct', value: { name: 'bob' } });
    });

    it('should surface JSON syntax errors', async () => {
      await expect(parseJSON().run(PipelineValues.text('"name": "bob"}'), discardProgress)).rejects.toBeInstanceOf(
        SyntaxError
      );
    });

    it('should reject inputs without text', async () => {
      await expect(parseJSON().run(PipelineValues.file('/tmp/a.json'), discardProgress)).rejects.toMatchObject({
        code: 'TYPE_MISMATCH',
        message: 'Stage "parseJSON" expects text or bytes input, received file (/tmp/a.json)'
      });
    });

    it('should apply the shape check', async () => {
      const isList = (value: unknown): boolean => Array.isArray(value);

      await expect(parseJSON(isList).run(PipelineValues.text('{}'), discardProgress)).rejects.toBeInstanceOf(
        TypeMismatchError
      );
      await expect(parseJSON(isList).run(PipelineValues.text('[1]'), discardProgress)).resolves.toEqual({
        type: 'struct',
        value: [1]
      });
    });
  });
});
