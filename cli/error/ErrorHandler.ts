import chalk from 'chalk';
import { CommanderError } from 'commander';
import {
  CommandExecutionError,
  PipelineDefinitionError,
  ResourceError,
  isPipeshellError,
  type PipeshellError
} from '@core/errors';
import { cliLogger } from '@core/utils/logger';

export interface ErrorHandlerOptions {
  debug?: boolean;
}

export class ErrorHandler {
  constructor(private readonly colors: chalk.Chalk = chalk) {}

  /**
   * Print an error to stderr and return the process exit code
   */
  handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
    // Commander has already printed its own message
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    cliLogger.debug('Pipeline failed', { error: error instanceof Error ? error.stack : String(error) });
    console.error(this.format(error, options));
    return 1;
  }

  format(error: unknown, options: ErrorHandlerOptions = {}): string {
    const c = this.colors;

    if (isPipeshellError(error)) {
      const lines = [`${c.red('Error')} ${c.gray(`[${error.code}]`)} ${error.message}`];
      lines.push(...this.formatDetails(error));
      if (options.debug && error.stack) {
        lines.push(c.gray(error.stack));
      }
      return lines.join('\n');
    }

    if (error instanceof Error) {
      const lines = [`${c.red('Error')} ${error.message}`];
      if (options.debug && error.stack) {
        lines.push(c.gray(error.stack));
      }
      return lines.join('\n');
    }

    return `${c.red('Error')} ${String(error)}`;
  }

  private formatDetails(error: PipeshellError): string[] {
    const c = this.colors;
    const lines: string[] = [];

    if (error instanceof CommandExecutionError) {
      const stderr = error.details.stderr?.trim();
      if (stderr) {
        lines.push(c.gray(stderr));
      }
    }

    if (error instanceof ResourceError) {
      const { stageError, additionalFailures = [] } = error.details;
      if (stageError) {
        lines.push(`  ${c.yellow('Stage error:')} ${stageError.message}`);
      }
      for (const failure of additionalFailures) {
        lines.push(`  ${c.yellow('Also failed:')} ${failure.message}`);
      }
    }

    if (error instanceof PipelineDefinitionError) {
      if (error.details.file) {
        lines.push(`  ${c.gray(`in ${error.details.file}`)}`);
      }
    }

    return lines;
  }
}
