/**
 * Configuration types for pipeshell
 */

export interface PipeshellConfig {
  /** Shell used to run command stages as `<shell> -c <command>` */
  shell?: string;
  /** Directory commands run in; defaults to the process cwd at execution time */
  workingDirectory?: string;
  /** winston level for every service logger */
  logLevel?: string;
}

export interface ResolvedPipeshellConfig {
  shell: string;
  workingDirectory?: string;
  logLevel?: string;
}
