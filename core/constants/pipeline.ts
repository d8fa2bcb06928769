/**
 * Basename prefix shared by every file the engine creates itself. Files whose
 * name starts with it are deleted at the end of a run; all other files are
 * only closed.
 */
export const TEMPORARY_FILE_PREFIX = 'pipeshell-temporary-file';

/** Names bound implicitly from the previous stage's output */
export const RESERVED_VARIABLE_NAMES = ['content', 'file'] as const;

export const VARIABLE_NAME_PATTERN = /^[a-zA-Z]+$/;

export const DEFAULT_SHELL = 'bash';
