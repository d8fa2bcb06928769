export {
  PipelineRunner,
  defaultRunner,
  run,
  runOrThrow,
  resolveRunError,
  type PipelineRunnerOptions
} from './runner';
export { split } from './split';
export { insert, discard, seed, bindVariable, excludeLines, toJSON, parseJSON, toPlainValue } from './builtin-transformers';
export { exec, writeTempFile, writeFile, openFile, readFile } from './builtin-effects';
