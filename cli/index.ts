/**
 * Central entry point for the pipeshell CLI
 */
import { Command } from 'commander';
import { version } from '@core/version';
import { RunCommand, type RunCommandDependencies, type RunOptions } from './commands/run';
import { ErrorHandler } from './error/ErrorHandler';

export type { RunOptions };

/**
 * Build the command-line program. Commander errors are thrown rather than
 * exiting so that `main` decides the exit code.
 */
export function createProgram(dependencies: RunCommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('pipeshell')
    .description('Run staged shell pipelines defined in YAML')
    .version(version)
    .exitOverride();

  program
    .command('run')
    .description('Run the pipeline in a YAML file and print its final value')
    .argument('<pipeline>', 'Pipeline definition file')
    .option('-q, --quiet', 'Only print the final value')
    .option('--debug', 'Enable debug logging')
    .option('--shell <shell>', 'Shell used for exec steps')
    .action(async (pipeline: string, options: RunOptions) => {
      await new RunCommand(dependencies).run(pipeline, options);
    });

  return program;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function main(customArgs?: string[], dependencies?: RunCommandDependencies): Promise<number> {
  const args = customArgs ?? process.argv.slice(2);

  try {
    await createProgram(dependencies).parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    return new ErrorHandler().handleError(error, { debug: args.includes('--debug') });
  }
}
