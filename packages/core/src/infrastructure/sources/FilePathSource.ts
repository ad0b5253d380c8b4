import type { Stats } from 'node:fs';
import { stat, readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { NotFoundError, ValidationError } from '../../domain/errors/AepError.js';
import { detectContentType } from '../detectContentType.js';

export interface FilePathSourceOptions {
  /** Name stored in the batch. Default: the file's base name. */
  readonly fileName?: string;
  /** Content type override. Default: inferred from the extension. */
  readonly mimeType?: string;
}

/** Upload source backed by a local file. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly fileNameOverride: string | undefined;
  private readonly mimeTypeOverride: string | undefined;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.fileNameOverride = options?.fileName;
    this.mimeTypeOverride = options?.mimeType;
  }

  async metadata(): Promise<SourceMetadata> {
    const fileName = this.fileNameOverride ?? basename(this.filePath);
    let stats: Stats;

    try {
      stats = await stat(this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(
          `File not found: ${this.filePath}`,
          { status: 0, method: 'STAT', path: this.filePath },
          { cause: error },
        );
      }
      throw error;
    }

    if (!stats.isFile()) {
      throw new ValidationError(`Not a regular file: ${this.filePath}`);
    }

    return {
      fileName,
      fileSize: stats.size,
      mimeType: this.mimeTypeOverride ?? detectContentType(fileName),
      filePath: this.filePath,
    };
  }

  read(): Promise<Buffer> {
    return readFile(this.filePath);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
