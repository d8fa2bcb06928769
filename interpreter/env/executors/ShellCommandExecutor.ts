import { spawn } from 'child_process';
import type { Readable } from 'stream';
import {
  BaseCommandExecutor,
  type CommandExecutionOptions,
  type CommandExecutionResult
} from './BaseCommandExecutor';
import type { ProgressSink } from '@core/types';
import { CommandExecutionError, toError } from '@core/errors';
import { DEFAULT_SHELL } from '@core/constants/pipeline';

export interface ShellCommandExecutorOptions extends CommandExecutionOptions {
  /** Shell binary invoked as `<shell> -c <command>` */
  shell?: string;
}

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Read a stream to its end, forwarding each chunk to the progress sink while
 * accumulating it
 */
async function drainStream(stream: Readable, progress: ProgressSink): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    progress.write(buffer);
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

/**
 * Executes shell commands, draining stdout and stderr concurrently with the
 * process so neither pipe can fill up and block it
 */
export class ShellCommandExecutor extends BaseCommandExecutor {
  readonly shell: string;

  constructor(options: ShellCommandExecutorOptions = {}) {
    const { shell, ...defaults } = options;
    super(defaults);
    this.shell = shell ?? DEFAULT_SHELL;
  }

  async execute(command: string, progress: ProgressSink, options?: CommandExecutionOptions): Promise<Buffer> {
    return this.executeWithCommonHandling(
      command,
      options,
      finalOptions => this.executeShellCommand(command, progress, finalOptions)
    );
  }

  private async executeShellCommand(
    command: string,
    progress: ProgressSink,
    options: CommandExecutionOptions & { workingDirectory: string }
  ): Promise<CommandExecutionResult> {
    const startTime = Date.now();

    const child = spawn(this.shell, ['-c', command], {
      cwd: options.workingDirectory,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const exited = new Promise<ProcessExit>((resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code, signal) => resolve({ code, signal }));
    });

    // Both drains are running before the exit is awaited, and all three are
    // joined before any outcome is inspected
    const [exit, stdout, stderr] = await Promise.allSettled([
      exited,
      drainStream(child.stdout, progress),
      drainStream(child.stderr, progress)
    ]);
    const duration = Date.now() - startTime;

    if (exit.status === 'rejected') {
      throw exit.reason;
    }

    if (stdout.status === 'rejected' || stderr.status === 'rejected') {
      const failed = stdout.status === 'rejected' ? stdout : stderr;
      const cause = toError(failed.status === 'rejected' ? failed.reason : undefined);
      throw new CommandExecutionError(
        `Failed to read output of command: ${command}: ${cause.message}`,
        { command, duration, workingDirectory: options.workingDirectory },
        cause
      );
    }

    const { code, signal } = exit.value;
    if (code !== 0) {
      throw CommandExecutionError.create(command, code ?? undefined, duration, {
        signal: signal ?? undefined,
        stderr: stderr.value.toString('utf8'),
        workingDirectory: options.workingDirectory
      });
    }

    return {
      stdout: stdout.value,
      stderr: stderr.value,
      duration,
      exitCode: code
    };
  }
}
