import { PipelineValues, defineStage, type Stage } from '@core/types';
import { seed } from './builtin-transformers';
import { defaultRunner } from './runner';

/**
 * Fork the input into two nested runs, left then right, and pair their
 * results.
 *
 * Each branch is an independent run with its own variable store and tracked
 * resources; only the input is shared. Branches run on the runner executing
 * the split, or the default runner when the stage is called outside a run.
 * The right branch starts after the left one has finished and does not start
 * at all if the left one fails. A failing branch's error becomes the split
 * stage's error.
 */
export function split(left: readonly Stage[], right: readonly Stage[]): Stage {
  return defineStage('split', async (input, progress, context = defaultRunner.context) => {
    const leftResult = await context.runNested(progress, [seed(input), ...left]);
    if (leftResult.status === 'failed') {
      throw leftResult.error;
    }

    const rightResult = await context.runNested(progress, [seed(input), ...right]);
    if (rightResult.status === 'failed') {
      throw rightResult.error;
    }

    return PipelineValues.split(leftResult.value, rightResult.value);
  });
}
