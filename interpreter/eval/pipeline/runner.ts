import { randomUUID } from 'crypto';
import {
  PipelineValues,
  discardProgress,
  type PipelineValue,
  type ProgressSink,
  type RunResult,
  type Stage,
  type StageContext
} from '@core/types';
import { ResourceError, toError } from '@core/errors';
import { VariableStore } from '@interpreter/env/VariableStore';
import { ResourceTracker } from '@interpreter/env/ResourceTracker';
import { pipelineLogger } from '@core/utils/logger';

export interface PipelineRunnerOptions {
  /** Basename prefix marking files to delete at the end of a run */
  temporaryPrefix?: string;
}

/**
 * Pick the error a run reports. A cleanup failure supersedes the stage error;
 * the stage error and any later cleanup failures travel in its details.
 */
export function resolveRunError(
  stageError: Error | undefined,
  cleanupFailures: readonly ResourceError[]
): Error | undefined {
  const [first, ...rest] = cleanupFailures;
  if (!first) {
    return stageError;
  }
  if (!stageError && rest.length === 0) {
    return first;
  }

  return new ResourceError(
    first.message,
    {
      ...first.details,
      ...(stageError ? { stageError } : {}),
      ...(rest.length > 0 ? { additionalFailures: rest } : {})
    },
    first.cause
  );
}

/**
 * Executes stages strictly in order, threading each output into the next
 * stage. Each run owns a fresh variable store and resource tracker.
 */
export class PipelineRunner {
  /** Lets stages such as `split` start nested runs with this runner's options */
  readonly context: StageContext = {
    runNested: (progress, stages) => this.run(progress, stages)
  };

  constructor(private readonly options: PipelineRunnerOptions = {}) {}

  async run(progress: ProgressSink | undefined, stages: readonly Stage[]): Promise<RunResult> {
    const sink = progress ?? discardProgress;
    const runId = randomUUID().slice(0, 8);
    const variables = new VariableStore();
    const resources = new ResourceTracker(this.options.temporaryPrefix);

    let current: PipelineValue = PipelineValues.empty();
    let stageError: Error | undefined;

    pipelineLogger.debug(`[${runId}] Starting run with ${stages.length} stages`);

    for (const [index, stage] of stages.entries()) {
      pipelineLogger.debug(`[${runId}] Stage ${index + 1}/${stages.length}: ${stage.name}`);

      const input = stage.role === 'command'
        ? PipelineValues.intercepted(current, variables)
        : current;

      try {
        current = await stage.run(input, sink, this.context);
        this.absorb(stage, current, variables, resources);
      } catch (error) {
        stageError = toError(error);
        pipelineLogger.debug(`[${runId}] Stage ${stage.name} failed`, { error: stageError.message });
        break;
      }
    }

    const cleanupFailures = await resources.release();
    const error = resolveRunError(stageError, cleanupFailures);

    if (error) {
      pipelineLogger.debug(`[${runId}] Run failed`, { error: error.message });
      return { status: 'failed', value: current, error };
    }

    pipelineLogger.debug(`[${runId}] Run complete`, { result: current.type });
    return { status: 'success', value: current };
  }

  /**
   * Record what a stage produced: file values are tracked for cleanup,
   * binding markers are stored. The value itself flows on unchanged.
   */
  private absorb(stage: Stage, output: PipelineValue, variables: VariableStore, resources: ResourceTracker): void {
    switch (output.type) {
      case 'file':
        if (stage.role !== 'seed') {
          resources.track(output);
        }
        break;
      case 'binding':
        variables.bind(output.name, output.value);
        break;
      default:
        break;
    }
  }
}

export const defaultRunner = new PipelineRunner();

/**
 * Run stages in order with the default runner. Without a progress sink,
 * progress is discarded.
 */
export function run(progress: ProgressSink | undefined, ...stages: Stage[]): Promise<RunResult> {
  return defaultRunner.run(progress, stages);
}

/**
 * Run stages and resolve with the final value, rejecting with the run's error
 */
export async function runOrThrow(progress: ProgressSink | undefined, ...stages: Stage[]): Promise<PipelineValue> {
  const result = await defaultRunner.run(progress, stages);
  if (result.status === 'failed') {
    throw result.error;
  }
  return result.value;
}
