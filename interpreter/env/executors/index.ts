export { BaseCommandExecutor, type CommandExecutionOptions, type CommandExecutionResult, type ICommandExecutor } from './BaseCommandExecutor';
export { ShellCommandExecutor, type ShellCommandExecutorOptions } from './ShellCommandExecutor';
