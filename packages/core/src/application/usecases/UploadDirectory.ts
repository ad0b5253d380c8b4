import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { UploadSummary } from '../../domain/model/Upload.js';
import { GlobMatcher } from '../../domain/services/GlobMatcher.js';
import { ValidationError, errorMessage } from '../../domain/errors/AepError.js';
import type { IngestionContext } from '../IngestionContext.js';
import { UploadMany } from './UploadMany.js';

export interface UploadDirectoryOptions {
  /** Base-name pattern, e.g. `*.json` or `part-*.{csv,tsv}`. Default: `*`. */
  readonly pattern?: string;
  /** Descend into subdirectories. Default: `false`. */
  readonly recursive?: boolean;
  readonly maxConcurrency?: number;
}

/** Use case: upload every matching regular file of a directory into a batch. */
export class UploadDirectory {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(directory: string, batchId: string, options: UploadDirectoryOptions = {}): Promise<UploadSummary> {
    const pattern = options.pattern ?? '*';
    let matcher: GlobMatcher;
    try {
      matcher = new GlobMatcher(pattern);
    } catch (error) {
      throw new ValidationError(`Invalid pattern '${pattern}': ${errorMessage(error)}`, { cause: error });
    }

    await this.assertDirectory(directory);

    const files = await this.collect(directory, matcher, options.recursive ?? false);
    if (files.length === 0) {
      throw new ValidationError(`No files found matching pattern '${pattern}' in ${directory}`);
    }

    return new UploadMany(this.ctx).execute(files, batchId, options.maxConcurrency);
  }

  private async assertDirectory(directory: string): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await stat(directory)).isDirectory();
    } catch (error) {
      throw new ValidationError(`Not a directory: ${directory}`, { cause: error });
    }
    if (!isDirectory) {
      throw new ValidationError(`Not a directory: ${directory}`);
    }
  }

  /** Matching file paths, sorted so uploads happen in a stable order. */
  private async collect(directory: string, matcher: GlobMatcher, recursive: boolean): Promise<string[]> {
    const entries: Dirent[] = await readdir(directory, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = join(directory, entry.name);
      if (entry.isFile() && matcher.matches(entry.name)) {
        files.push(fullPath);
      } else if (entry.isDirectory() && recursive) {
        files.push(...(await this.collect(fullPath, matcher, recursive)));
      }
    }

    return files.sort();
  }
}
