/**
 * Built-in effect stages: shell commands and file access
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { randomBytes } from 'crypto';
import {
  PipelineValues,
  defineStage,
  describeValueType,
  reportProgress,
  valueAsText,
  type PipelineValue,
  type Stage
} from '@core/types';
import { ResourceError, TypeMismatchError } from '@core/errors';
import { TEMPORARY_FILE_PREFIX } from '@core/constants/pipeline';
import { substituteVariables } from '@interpreter/utils/interpolation';
import { ShellCommandExecutor, type ICommandExecutor } from '@interpreter/env/executors';

let defaultExecutor: ShellCommandExecutor | undefined;

function getDefaultExecutor(): ShellCommandExecutor {
  defaultExecutor ??= new ShellCommandExecutor();
  return defaultExecutor;
}

function requireContent(stage: string, input: PipelineValue): string {
  const content = valueAsText(input);
  if (content === undefined) {
    throw TypeMismatchError.forStage(stage, ['text', 'bytes'], describeValueType(input));
  }
  return content;
}

/**
 * Run a shell command built from `template`.
 *
 * `#{content}` is replaced by the previous stage's text or bytes output,
 * `#{file}` by the path of its file output, and `#{name}` by any variable
 * bound earlier in the run. Emits the command's standard output as bytes.
 */
export function exec(template: string, executor: ICommandExecutor = getDefaultExecutor()): Stage {
  return defineStage(
    `exec(${template})`,
    async (input, progress) => {
      if (input.type !== 'intercepted') {
        throw new TypeMismatchError('exec stage was not intercepted', {
          expected: ['intercepted input'],
          received: describeValueType(input),
          stage: 'exec'
        });
      }

      const command = substituteVariables(template, input.variables, input.raw);
      reportProgress(progress, `Executing command: ${command}`);
      return PipelineValues.bytes(await executor.execute(command, progress));
    },
    'command'
  );
}

/**
 * Write a text or bytes input to a new temporary file. The file is deleted
 * when the run ends.
 */
export function writeTempFile(): Stage {
  return defineStage('writeTempFile', async (input, progress) => {
    const content = requireContent('writeTempFile', input);
    const filePath = path.join(os.tmpdir(), `${TEMPORARY_FILE_PREFIX}${randomBytes(6).toString('hex')}`);

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(filePath, 'wx', 0o600);
    } catch (error) {
      throw ResourceError.create('create', filePath, error);
    }
    reportProgress(progress, `Created temporary file: ${filePath}`);

    try {
      await handle.writeFile(content, 'utf8');
    } catch (error) {
      await handle.close();
      await fs.rm(filePath, { force: true });
      throw ResourceError.create('write', filePath, error);
    }
    reportProgress(progress, 'Content written to temporary file.');

    try {
      await handle.close();
    } catch (error) {
      throw ResourceError.create('close', filePath, error);
    }
    return PipelineValues.file(filePath);
  });
}

/**
 * Write a text or bytes input to `filePath`, then hand on a read-only handle
 * to it. The file is kept when the run ends; only the handle is closed.
 */
export function writeFile(filePath: string): Stage {
  return defineStage(`writeFile(${filePath})`, async (input, progress) => {
    const content = requireContent('writeFile', input);
    reportProgress(progress, `Writing file: ${filePath}`);

    try {
      await fs.writeFile(filePath, content, { encoding: 'utf8', mode: 0o666 });
    } catch (error) {
      throw ResourceError.create('write', filePath, error);
    }
    return openHandle(filePath, 'r', 0o666);
  });
}

async function openHandle(filePath: string, flags: string | number, mode: number): Promise<PipelineValue> {
  try {
    return PipelineValues.file(filePath, await fs.open(filePath, flags, mode));
  } catch (error) {
    throw ResourceError.create('open', filePath, error);
  }
}

/**
 * Open a handle to `filePath`, discarding the input
 */
export function openFile(filePath: string, flags: string | number = 'r', mode = 0o666): Stage {
  return defineStage(`openFile(${filePath})`, async (_input, progress) => {
    reportProgress(progress, `Loading file handle to: ${filePath}`);
    return openHandle(filePath, flags, mode);
  });
}

/**
 * Emit the bytes of `filePath`, discarding the input
 */
export function readFile(filePath: string): Stage {
  return defineStage(`readFile(${filePath})`, async (_input, progress) => {
    reportProgress(progress, `Reading content of file: ${filePath}`);
    try {
      return PipelineValues.bytes(await fs.readFile(filePath));
    } catch (error) {
      throw ResourceError.create('read', filePath, error);
    }
  });
}
