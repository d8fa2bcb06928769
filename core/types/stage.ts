import type { PipelineValue } from './pipeline-value';

/**
 * Where stage progress and command output are streamed to
 */
export interface ProgressSink {
  write(chunk: string | Uint8Array): void;
}

/**
 * Static capability tag read by the runner before a stage executes.
 *
 * - `transform`: receives the previous stage's output as-is
 * - `command`: receives an `intercepted` envelope carrying the raw input and
 *   the run's variable bindings
 * - `seed`: emits a value owned by an enclosing run; file values it returns
 *   are not tracked by the run executing it
 */
export type StageRole = 'transform' | 'command' | 'seed';

/**
 * Outcome of a run. On failure `value` is the last value that flowed through
 * the pipeline and must be treated as partial.
 */
export type RunResult =
  | { status: 'success'; value: PipelineValue }
  | { status: 'failed'; value: PipelineValue; error: Error };

/**
 * Handed to each stage by the run executing it
 */
export interface StageContext {
  /** Execute stages as an independent run on the same runner */
  runNested(progress: ProgressSink, stages: readonly Stage[]): Promise<RunResult>;
}

export type StageFunction = (
  input: PipelineValue,
  progress: ProgressSink,
  context?: StageContext
) => Promise<PipelineValue>;

export interface Stage {
  /** Label used in progress messages and logs */
  readonly name: string;
  readonly role: StageRole;
  run: StageFunction;
}

/**
 * Wrap a plain function as a pipeline stage
 */
export function defineStage(name: string, run: StageFunction, role: StageRole = 'transform'): Stage {
  return { name, role, run };
}

export const discardProgress: ProgressSink = {
  write: () => {}
};

/**
 * Write a progress line, framed by blank lines so it stands apart from
 * streamed command output
 */
export function reportProgress(progress: ProgressSink, message: string): void {
  progress.write(`\n${message}\n`);
}
