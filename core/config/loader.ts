import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { PipeshellConfig, ResolvedPipeshellConfig } from './types';
import { DEFAULT_SHELL } from '@core/constants/pipeline';
import { configLogger } from '@core/utils/logger';

export interface ConfigLoaderOptions {
  /** Directory holding pipeshell.config.json; defaults to the process cwd */
  projectPath?: string;
  /** Directory holding the global .config/pipeshell.json; defaults to the home directory */
  homePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load pipeshell configuration from the global and project locations, then
 * apply environment overrides
 */
export class ConfigLoader {
  private readonly globalConfigPath: string;
  private readonly projectConfigPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private cachedConfig?: ResolvedPipeshellConfig;

  constructor(options: ConfigLoaderOptions = {}) {
    // Global config location: ~/.config/pipeshell.json
    this.globalConfigPath = path.join(options.homePath ?? os.homedir(), '.config', 'pipeshell.json');

    // Project config location: <project>/pipeshell.config.json
    this.projectConfigPath = path.join(options.projectPath ?? process.cwd(), 'pipeshell.config.json');

    this.env = options.env ?? process.env;
  }

  /**
   * Load and merge configurations (project overrides global, env overrides both)
   */
  load(): ResolvedPipeshellConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    const merged: ResolvedPipeshellConfig = {
      shell: DEFAULT_SHELL,
      ...globalConfig,
      ...projectConfig
    };

    if (this.env.PIPESHELL_SHELL) {
      merged.shell = this.env.PIPESHELL_SHELL;
    }
    if (this.env.LOG_LEVEL) {
      merged.logLevel = this.env.LOG_LEVEL;
    }

    configLogger.debug('Resolved configuration', { config: merged });
    this.cachedConfig = merged;
    return merged;
  }

  /**
   * Load a single config file; missing files yield an empty config
   */
  private loadConfigFile(filePath: string): PipeshellConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      return this.validate(parsed, filePath);
    } catch (error) {
      configLogger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }
  }

  private validate(parsed: unknown, filePath: string): PipeshellConfig {
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${filePath} must contain a JSON object`);
    }

    const config: PipeshellConfig = {};
    for (const key of ['shell', 'workingDirectory', 'logLevel'] as const) {
      const value: unknown = Reflect.get(parsed, key);
      if (value === undefined) continue;
      if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`"${key}" must be a non-empty string`);
      }
      config[key] = value;
    }
    return config;
  }
}
