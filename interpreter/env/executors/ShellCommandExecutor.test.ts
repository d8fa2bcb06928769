import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ShellCommandExecutor } from './ShellCommandExecutor';
import { CommandExecutionError } from '@core/errors';
import { discardProgress } from '@core/types';
import { ProgressRecorder } from '@tests/utils/ProgressRecorder';

describe('ShellCommandExecutor', () => {
  let executor: ShellCommandExecutor;

  beforeEach(() => {
    executor = new ShellCommandExecutor();
  });

  it('should default to bash', () => {
    expect(executor.shell).toBe('bash');
  });

  it('should return captured stdout and forward it to progress', async () => {
    const progress = new ProgressRecorder();

    const output = await executor.execute('echo -n "hello there"', progress);

    expect(output.toString()).toBe('hello there');
    expect(progress.text).toBe('hello there');
  });

  it('should forward stderr without capturing it', async () => {
    const progress = new ProgressRecorder();

    const output = await executor.execute('echo -n out; echo -n err 1>&2', progress);

    expect(output.toString()).toBe('out');
    expect(progress.text).toContain('err');
  });

  it('should drain large output on both streams without blocking', async () => {
    const output = await executor.execute(
      "head -c 300000 /dev/zero | tr '\\0' e 1>&2; head -c 1000000 /dev/zero | tr '\\0' o",
      discardProgress
    );

    expect(output.length).toBe(1000000);
    expect(output.subarray(0, 3).toString()).toBe('ooo');
  });

  it('should fail on a non-zero exit status', async () => {
    const failure = executor.execute('echo -n oops 1>&2; exit 3', discardProgress);

    await expect(failure).rejects.toBeInstanceOf(CommandExecutionError);
    await expect(failure).rejects.toMatchObject({
      message: 'Command failed with exit status 3: echo -n oops 1>&2; exit 3',
      details: { exitCode: 3, stderr: 'oops' }
    });
  });

  it('should report unknown commands with exit status 127', async () => {
    await expect(executor.execute('ech -n "hello there"', discardProgress)).rejects.toMatchObject({
      details: { exitCode: 127 }
    });
  });

  it('should fail when the shell cannot be spawned', async () => {
    const broken = new ShellCommandExecutor({ shell: '/nonexistent/pipeshell-shell' });

    await expect(broken.execute('echo hi', discardProgress)).rejects.toMatchObject({
      code: 'COMMAND_EXECUTION_FAILED'
    });
  });

  it('should pass extra environment variables', async () => {
    const output = await executor.execute('echo -n "$GREETING"', discardProgress, {
      env: { GREETING: 'hi' }
    });

    expect(output.toString()).toBe('hi');
  });

  describe('working directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'executor-test-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should run in the configured directory', async () => {
      const scoped = new ShellCommandExecutor({ workingDirectory: dir });

      const output = await scoped.execute('pwd -P', discardProgress);

      expect(output.toString().trim()).toBe(fs.realpathSync(dir));
    });
  });
});
