/**
 * Run CLI Command
 * Execute a pipeline defined in a YAML file
 */

import * as path from 'path';
import type { PipelineValue, ProgressSink } from '@core/types';
import { ConfigLoader } from '@core/config/loader';
import { cliLogger, loggerFactory } from '@core/utils/logger';
import { runOrThrow } from '@interpreter/eval/pipeline';
import { createExecutor } from '@sdk/index';
import { PipelineFileParser } from '../parsers/PipelineFileParser';
import { formatResultValue } from '../utils/output';

export interface RunOptions {
  /** Suppress progress and command output; only the final value is printed */
  quiet?: boolean;
  debug?: boolean;
  /** Overrides the configured shell */
  shell?: string;
}

export interface RunCommandDependencies {
  stdout?: ProgressSink;
  configLoader?: ConfigLoader;
}

const NEWLINE = 0x0a;

export class RunCommand {
  private readonly stdout: ProgressSink;
  private readonly configLoader: ConfigLoader;

  constructor(dependencies: RunCommandDependencies = {}) {
    this.stdout = dependencies.stdout ?? process.stdout;
    this.configLoader = dependencies.configLoader ?? new ConfigLoader();
  }

  async run(pipelineFile: string, options: RunOptions = {}): Promise<PipelineValue> {
    const config = this.configLoader.load();

    if (options.debug) {
      loggerFactory.setLevel('debug');
    } else if (config.logLevel) {
      loggerFactory.setLevel(config.logLevel);
    }

    const executor = createExecutor({ ...config, shell: options.shell ?? config.shell });
    const filePath = path.resolve(pipelineFile);
    const stages = await new PipelineFileParser({ executor }).parseFile(filePath);

    cliLogger.info(`Running ${stages.length} stages from ${filePath}`, { shell: executor.shell });

    const value = await runOrThrow(options.quiet ? undefined : this.stdout, ...stages);
    this.printResult(value);
    return value;
  }

  private printResult(value: PipelineValue): void {
    const output = formatResultValue(value);
    if (output.length === 0) {
      return;
    }

    this.stdout.write(output);
    const endsWithNewline = typeof output === 'string'
      ? output.endsWith('\n')
      : output[output.length - 1] === NEWLINE;
    if (!endsWithNewline) {
      this.stdout.write('\n');
    }
  }
}
