import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  run,
  split,
  insert,
  bindVariable,
  discard,
  exec,
  excludeLines,
  parseJSON,
  toJSON,
  writeFile,
  writeTempFile,
  readFile,
  openFile
} from '@interpreter/eval/pipeline';
import { PipelineValues, defineStage, type Stage } from '@core/types';
import { CommandExecutionError, TypeMismatchError, VariableRedefinitionError } from '@core/errors';
import { TEMPORARY_FILE_PREFIX } from '@core/constants/pipeline';
import { ProgressRecorder } from '@tests/utils/ProgressRecorder';

function bytes(content: string) {
  return { status: 'success', value: { type: 'bytes', value: Buffer.from(content) } };
}

describe('Pipeline end-to-end', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-e2e-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should run a shell command', async () => {
    expect(await run(undefined, exec('echo -n "hello there"'))).toEqual(bytes('hello there'));
  });

  it('should fail with the exit status of a missing command', async () => {
    const result = await run(undefined, exec('ech -n "hello there"'));

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toBeInstanceOf(CommandExecutionError);
      expect(result.error.message).toBe('Command failed with exit status 127: ech -n "hello there"');
    }
  });

  it('should substitute a saved variable into a later command', async () => {
    const progress = new ProgressRecorder();

    const result = await run(
      progress,
      insert(PipelineValues.text('hello')),
      bindVariable('greeting'),
      insert(PipelineValues.empty()),
      exec('echo -n "#{greeting}"')
    );

    expect(result).toEqual(bytes('hello'));
    expect(progress.text).toContain('\nExecuting command: echo -n "hello"\n');
  });

  it('should pipe text output into the next command', async () => {
    const result = await run(undefined, exec('echo -n "hello there"'), exec('echo -n "#{content}"'));

    expect(result).toEqual(bytes('hello there'));
  });

  it('should write a temporary file and read it back by path', async () => {
    const result = await run(
      undefined,
      exec('echo -n "hello there"'),
      writeTempFile(),
      exec('cat #{file}')
    );

    expect(result).toEqual(bytes('hello there'));
  });

  it('should substitute a saved file path', async () => {
    const result = await run(
      undefined,
      insert(PipelineValues.text('hello')),
      writeTempFile(),
      bindVariable('myFile'),
      discard(),
      exec('cat #{myFile}')
    );

    expect(result).toEqual(bytes('hello'));
  });

  it('should round-trip JSON through a struct', async () => {
    const result = await run(
      undefined,
      exec('echo -n "{\\"name\\": \\"bob\\"}"'),
      parseJSON(),
      toJSON()
    );

    expect(result).toEqual(bytes('{"name":"bob"}'));
  });

  it('should surface JSON syntax errors', async () => {
    const result = await run(undefined, exec('echo -n "\\"name\\": \\"bob\\"}"'), parseJSON());

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toBeInstanceOf(SyntaxError);
    }
  });

  it('should filter command output by line', async () => {
    const result = await run(
      undefined,
      exec('echo -e "hi\\nthere and here\\nyou"'),
      excludeLines('\n', 'hi', 'there')
    );

    expect(result).toEqual({ status: 'success', value: { type: 'text', value: 'you\n' } });
  });

  it('should split JSON into a struct and an extracted field', async () => {
    const getName: Stage = defineStage('getName', async input => {
      if (input.type === 'struct' && typeof input.value === 'object' && input.value !== null) {
        return PipelineValues.text(String(Reflect.get(input.value, 'name')));
      }
      return PipelineValues.empty();
    });

    const result = await run(
      undefined,
      exec('echo -n "{\\"name\\": \\"bob\\"}"'),
      split([parseJSON()], [parseJSON(), getName])
    );

    expect(result).toEqual({
      status: 'success',
      value: {
        type: 'split',
        left: { type: 'struct', value: { name: 'bob' } },
        right: { type: 'text', value: 'bob' }
      }
    });
  });

  it('should write a file and read it back', async () => {
    const target = path.join(dir, 'something');

    const result = await run(
      undefined,
      insert(PipelineValues.text('some content')),
      writeFile(target),
      readFile(target)
    );

    expect(result).toEqual(bytes('some content'));
    expect(fs.readFileSync(target, 'utf8')).toBe('some content');
  });

  it('should load a file handle and substitute its path', async () => {
    const target = path.join(dir, 'test');

    const result = await run(
      undefined,
      insert(PipelineValues.text('hi there')),
      writeFile(target),
      openFile(target),
      exec('cat #{file}')
    );

    expect(result).toEqual(bytes('hi there'));
    expect(fs.existsSync(target)).toBe(true);
  });

  it('should reject a second binding of the same name', async () => {
    const result = await run(
      undefined,
      insert(PipelineValues.text('hello')),
      bindVariable('myVar'),
      bindVariable('myVar')
    );

    expect(result.status === 'failed' ? result.error : undefined).toBeInstanceOf(VariableRedefinitionError);
  });

  it('should reject substituting a struct variable', async () => {
    const result = await run(
      undefined,
      insert(PipelineValues.struct({ name: 'bob' })),
      bindVariable('subject'),
      discard(),
      exec('echo #{subject}')
    );

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toBeInstanceOf(TypeMismatchError);
      expect(result.error.message).toBe(
        'Cannot substitute variable "subject": unsupported type struct, required: text, bytes or file'
      );
    }
  });

  it('should leave no temporary files behind whether the run succeeds or fails', async () => {
    const created: string[] = [];
    const remember = defineStage('remember', async input => {
      if (input.type === 'file') created.push(input.path);
      return input;
    });

    await run(undefined, insert(PipelineValues.text('a')), writeTempFile(), remember);
    await run(undefined, insert(PipelineValues.text('b')), writeTempFile(), remember, exec('exit 2'));

    expect(created).toHaveLength(2);
    expect(created.every(filePath => path.basename(filePath).startsWith(TEMPORARY_FILE_PREFIX))).toBe(true);
    expect(created.filter(filePath => fs.existsSync(filePath))).toEqual([]);
  });

  it('should serialise a greeting subject and combine it with a saved greeting', async () => {
    const result = await run(
      undefined,
      insert(PipelineValues.text('hello')),
      bindVariable('greeting'),
      insert(PipelineValues.struct({ name: 'bob' })),
      toJSON(),
      writeTempFile(),
      exec('echo -n "#{greeting}" && cat #{file}')
    );

    expect(result).toEqual(bytes('hello{"name":"bob"}'));
  });
});
