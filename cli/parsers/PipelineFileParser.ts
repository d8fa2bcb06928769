import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { PipelineDefinitionError } from '@core/errors';
import { PipelineValues, type Stage } from '@core/types';
import type { ICommandExecutor } from '@interpreter/env/executors';
import {
  bindVariable,
  discard,
  excludeLines,
  exec,
  insert,
  openFile,
  parseJSON,
  readFile,
  split,
  toJSON,
  writeFile,
  writeTempFile
} from '@interpreter/eval/pipeline';

export interface PipelineFileParserOptions {
  /** Executor handed to every `exec` entry */
  executor?: ICommandExecutor;
  /** Reported in definition errors */
  file?: string;
}

type EntryBuilder = (value: unknown, entry: string) => Stage;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Turns a YAML pipeline definition into stages.
 *
 * A definition is either a list of entries or a mapping with a `steps` list.
 * Each entry is a mapping with exactly one key naming the stage:
 *
 * ```yaml
 * steps:
 *   - insert: hello
 *   - bind: greeting
 *   - discard: true
 *   - exec: echo -n "#{greeting}"
 * ```
 */
export class PipelineFileParser {
  private readonly builders: Record<string, EntryBuilder>;

  constructor(private readonly options: PipelineFileParserOptions = {}) {
    this.builders = {
      exec: (value, entry) => exec(this.requireString(value, entry, 'exec'), this.options.executor),
      insert: (value, entry) => {
        if (value === null) {
          return insert(PipelineValues.empty());
        }
        return insert(PipelineValues.text(this.requireString(value, entry, 'insert')));
      },
      bind: (value, entry) => bindVariable(this.requireString(value, entry, 'bind')),
      discard: (value, entry) => this.flag(value, entry, 'discard', discard),
      writeTempFile: (value, entry) => this.flag(value, entry, 'writeTempFile', writeTempFile),
      toJSON: (value, entry) => this.flag(value, entry, 'toJSON', toJSON),
      parseJSON: (value, entry) => this.flag(value, entry, 'parseJSON', () => parseJSON()),
      writeFile: (value, entry) => writeFile(this.requireString(value, entry, 'writeFile')),
      readFile: (value, entry) => readFile(this.requireString(value, entry, 'readFile')),
      openFile: (value, entry) => openFile(this.requireString(value, entry, 'openFile')),
      excludeLines: (value, entry) => this.excludeLinesEntry(value, entry),
      split: (value, entry) => this.splitEntry(value, entry)
    };
  }

  /**
   * Read and parse a pipeline file
   */
  async parseFile(filePath: string): Promise<Stage[]> {
    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PipelineDefinitionError(`Cannot read pipeline file: ${reason}`, { file: filePath });
    }
    return new PipelineFileParser({ ...this.options, file: filePath }).parse(source);
  }

  parse(source: string): Stage[] {
    let document: unknown;
    try {
      document = yaml.load(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PipelineDefinitionError(`Invalid YAML: ${reason}`, { file: this.options.file });
    }

    const steps = isRecord(document) ? document.steps : document;
    if (!Array.isArray(steps)) {
      throw new PipelineDefinitionError('Pipeline must be a list of steps or a mapping with a "steps" list', {
        file: this.options.file
      });
    }
    return this.parseEntries(steps, 'steps');
  }

  private parseEntries(entries: unknown[], prefix: string): Stage[] {
    return entries.map((value, index) => this.parseEntry(value, `${prefix}[${index}]`));
  }

  private parseEntry(value: unknown, entry: string): Stage {
    if (!isRecord(value)) {
      throw this.error('entry must be a mapping with a single stage key', entry);
    }

    const keys = Object.keys(value);
    if (keys.length !== 1) {
      throw this.error(`entry must have exactly one stage key, found ${keys.length}`, entry);
    }

    const [kind] = keys;
    const builder = Object.hasOwn(this.builders, kind) ? this.builders[kind] : undefined;
    if (!builder) {
      throw this.error(`unknown stage "${kind}"`, entry);
    }
    return builder(value[kind], entry);
  }

  private excludeLinesEntry(value: unknown, entry: string): Stage {
    if (!isRecord(value)) {
      throw this.error('excludeLines expects a mapping with "patterns"', entry);
    }

    const separator = value.separator ?? '\n';
    if (typeof separator !== 'string' || separator.length === 0) {
      throw this.error('excludeLines separator must be a non-empty string', entry);
    }
    if (!isStringArray(value.patterns)) {
      throw this.error('excludeLines patterns must be a list of strings', entry);
    }
    return excludeLines(separator, ...value.patterns);
  }

  private splitEntry(value: unknown, entry: string): Stage {
    if (!isRecord(value) || !Array.isArray(value.left) || !Array.isArray(value.right)) {
      throw this.error('split expects "left" and "right" lists of steps', entry);
    }

    return split(
      this.parseEntries(value.left, `${entry}.split.left`),
      this.parseEntries(value.right, `${entry}.split.right`)
    );
  }

  private flag(value: unknown, entry: string, kind: string, build: () => Stage): Stage {
    if (value !== true) {
      throw this.error(`${kind} takes no arguments; write "${kind}: true"`, entry);
    }
    return build();
  }

  private requireString(value: unknown, entry: string, kind: string): string {
    if (typeof value !== 'string') {
      throw this.error(`${kind} expects a string`, entry);
    }
    return value;
  }

  private error(message: string, entry: string): PipelineDefinitionError {
    return new PipelineDefinitionError(message, { file: this.options.file, entry });
  }
}
