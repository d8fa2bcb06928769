import type { ProgressSink } from '@core/types';
import { CommandExecutionError, toError } from '@core/errors';
import { executorLogger } from '@core/utils/logger';

export interface CommandExecutionOptions {
  /** Directory to run in; defaults to the process cwd at execution time */
  workingDirectory?: string;
  env?: Record<string, string>;
}

export interface CommandExecutionResult {
  stdout: Buffer;
  stderr: Buffer;
  duration: number;
  exitCode: number;
}

export interface ICommandExecutor {
  /**
   * Execute a command, streaming its output to `progress`, and resolve with
   * the captured standard output
   */
  execute(command: string, progress: ProgressSink, options?: CommandExecutionOptions): Promise<Buffer>;
}

/**
 * Base class for command executors providing timing, logging and error
 * normalisation
 */
export abstract class BaseCommandExecutor implements ICommandExecutor {
  constructor(protected readonly defaults: CommandExecutionOptions = {}) {}

  abstract execute(command: string, progress: ProgressSink, options?: CommandExecutionOptions): Promise<Buffer>;

  protected resolveWorkingDirectory(options?: CommandExecutionOptions): string {
    return options?.workingDirectory ?? this.defaults.workingDirectory ?? process.cwd();
  }

  /**
   * Common execution wrapper: merges options, logs, and turns anything thrown
   * by `executor` into a CommandExecutionError
   */
  protected async executeWithCommonHandling(
    command: string,
    options: CommandExecutionOptions | undefined,
    executor: (options: CommandExecutionOptions & { workingDirectory: string }) => Promise<CommandExecutionResult>
  ): Promise<Buffer> {
    const workingDirectory = this.resolveWorkingDirectory(options);
    const finalOptions = {
      ...this.defaults,
      ...options,
      env: { ...this.defaults.env, ...options?.env },
      workingDirectory
    };
    const startTime = Date.now();

    executorLogger.debug('Running command', { command, workingDirectory });

    try {
      const result = await executor(finalOptions);
      executorLogger.debug('Command finished', {
        command,
        duration: result.duration,
        stdoutBytes: result.stdout.length
      });
      return result.stdout;
    } catch (error: unknown) {
      const commandError = this.createCommandExecutionError(error, command, Date.now() - startTime, workingDirectory);
      executorLogger.debug('Command failed', { command, error: commandError.message });
      throw commandError;
    }
  }

  protected createCommandExecutionError(
    error: unknown,
    command: string,
    duration: number,
    workingDirectory: string
  ): CommandExecutionError {
    if (error instanceof CommandExecutionError) {
      return error;
    }
    const cause = toError(error);
    return new CommandExecutionError(
      `Command could not be executed: ${command}: ${cause.message}`,
      { command, duration, workingDirectory },
      cause
    );
  }
}
