/**
 * pipeshell API Entry Point
 *
 * Build pipelines from stages and run them programmatically.
 */
/// <reference types="node" />
import { ConfigLoader, type ConfigLoaderOptions } from '@core/config/loader';
import type { ResolvedPipeshellConfig } from '@core/config/types';
import { ShellCommandExecutor } from '@interpreter/env/executors';

// Export core types/errors
export * from '@core/types';
export * from '@core/errors';
export { TEMPORARY_FILE_PREFIX, RESERVED_VARIABLE_NAMES } from '@core/constants/pipeline';

// Export the engine
export * from '@interpreter/eval/pipeline';
export { VariableStore, validateVariableName } from '@interpreter/env/VariableStore';
export { ResourceTracker, classifyResource, type ResourceKind } from '@interpreter/env/ResourceTracker';
export { substituteVariables } from '@interpreter/utils/interpolation';
export {
  BaseCommandExecutor,
  ShellCommandExecutor,
  type CommandExecutionOptions,
  type ICommandExecutor,
  type ShellCommandExecutorOptions
} from '@interpreter/env/executors';

// Export configuration
export { ConfigLoader, type ConfigLoaderOptions };
export type { PipeshellConfig, ResolvedPipeshellConfig } from '@core/config/types';
export { version } from '@core/version';

/**
 * Create a shell executor from resolved configuration
 */
export function createExecutor(config: ResolvedPipeshellConfig): ShellCommandExecutor {
  return new ShellCommandExecutor({
    shell: config.shell,
    workingDirectory: config.workingDirectory
  });
}

/**
 * Load configuration from the usual locations and create a shell executor
 * from it
 */
export function loadExecutor(options?: ConfigLoaderOptions): ShellCommandExecutor {
  return createExecutor(new ConfigLoader(options).load());
}
