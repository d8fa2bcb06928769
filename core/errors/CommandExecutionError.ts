import { PipeshellError } from './PipeshellError';

export interface CommandExecutionDetails extends Record<string, unknown> {
  command: string;
  exitCode?: number;
  signal?: string;
  duration: number;
  stderr?: string;
  workingDirectory: string;
}

/**
 * Error thrown when a shell command cannot be spawned, exits non-zero, or
 * one of its output streams fails while being drained
 */
export class CommandExecutionError extends PipeshellError {
  declare readonly details: CommandExecutionDetails;

  constructor(message: string, details: CommandExecutionDetails, cause?: unknown) {
    super(message, {
      code: 'COMMAND_EXECUTION_FAILED',
      details,
      cause
    });
  }

  /**
   * Creates a command execution error for a process that ran and failed
   */
  static create(
    command: string,
    exitCode: number | undefined,
    duration: number,
    additionalContext: {
      signal?: string;
      stderr?: string;
      workingDirectory: string;
    }
  ): CommandExecutionError {
    const status = exitCode !== undefined
      ? `exit status ${exitCode}`
      : `signal ${additionalContext.signal ?? 'unknown'}`;

    return new CommandExecutionError(`Command failed with ${status}: ${command}`, {
      command,
      exitCode,
      signal: additionalContext.signal,
      duration,
      stderr: additionalContext.stderr,
      workingDirectory: additionalContext.workingDirectory
    });
  }
}
