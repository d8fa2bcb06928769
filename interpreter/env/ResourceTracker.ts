import * as path from 'path';
import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { FileValue } from '@core/types';
import { ResourceError } from '@core/errors';
import { TEMPORARY_FILE_PREFIX } from '@core/constants/pipeline';
import { resourceLogger } from '@core/utils/logger';

export type ResourceKind = 'temporary' | 'persistent';

export function classifyResource(filePath: string, prefix: string = TEMPORARY_FILE_PREFIX): ResourceKind {
  return path.basename(filePath).startsWith(prefix) ? 'temporary' : 'persistent';
}

/**
 * Tracks file-backed values produced during one run and releases them when
 * the run ends: persistent files are closed, temporary files are deleted.
 */
export class ResourceTracker {
  private readonly persistent: FileValue[] = [];
  private readonly temporary: FileValue[] = [];
  private readonly seenPaths = new Set<string>();
  private readonly seenHandles = new Set<FileHandle>();

  constructor(private readonly temporaryPrefix: string = TEMPORARY_FILE_PREFIX) {}

  /**
   * Register a file value. A temporary path is registered once per run; a
   * persistent file is registered once per open handle, so every handle is
   * closed exactly once.
   */
  track(file: FileValue): ResourceKind {
    const kind = classifyResource(file.path, this.temporaryPrefix);

    if (kind === 'temporary') {
      if (this.seenPaths.has(file.path)) {
        return kind;
      }
      this.seenPaths.add(file.path);
      this.temporary.push(file);
    } else {
      if (!file.handle || this.seenHandles.has(file.handle)) {
        return kind;
      }
      this.seenHandles.add(file.handle);
      this.persistent.push(file);
    }
    resourceLogger.debug(`Tracking ${kind} resource`, { path: file.path });
    return kind;
  }

  get persistentResources(): readonly FileValue[] {
    return this.persistent;
  }

  get temporaryResources(): readonly FileValue[] {
    return this.temporary;
  }

  /**
   * Close every persistent file, then delete every temporary file, each in
   * registration order. All steps run even when one fails; the failures are
   * returned in the order they occurred.
   */
  async release(): Promise<ResourceError[]> {
    const failures: ResourceError[] = [];

    for (const file of this.persistent) {
      try {
        await file.handle?.close();
      } catch (error) {
        failures.push(ResourceError.create('close', file.path, error));
      }
    }

    for (const file of this.temporary) {
      try {
        await file.handle?.close();
      } catch (error) {
        failures.push(ResourceError.create('close', file.path, error));
      }
      try {
        await fs.unlink(file.path);
      } catch (error) {
        failures.push(ResourceError.create('delete', file.path, error));
      }
    }

    if (failures.length > 0) {
      resourceLogger.warn(`Resource cleanup failed for ${failures.length} file(s)`, {
        paths: failures.map(failure => failure.details.path)
      });
    }
    return failures;
  }
}
