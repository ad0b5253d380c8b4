import type { DataSource } from '../../domain/ports/DataSource.js';
import type { UploadResult } from '../../domain/model/Upload.js';
import { ValidationError } from '../../domain/errors/AepError.js';
import { FilePathSource } from '../../infrastructure/sources/FilePathSource.js';
import type { IngestionContext } from '../IngestionContext.js';

export interface UploadFileOptions {
  /** Name stored in the batch. Default: the file's base name. */
  readonly name?: string;
  /** Skip the dataset lookup when the caller already knows it. */
  readonly datasetId?: string;
}

/**
 * Use case: upload a single file into a batch.
 *
 * The source is validated before anything is sent: a missing file raises
 * `NotFoundError`, an empty one `ValidationError`.
 */
export class UploadFile {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(batchId: string, source: string | DataSource, options: UploadFileOptions = {}): Promise<UploadResult> {
    const dataSource = typeof source === 'string' ? new FilePathSource(source, { fileName: options.name }) : source;
    const meta = await dataSource.metadata();
    const fileName = options.name ?? meta.fileName;
    const filePath = meta.filePath ?? fileName;

    if (fileName.trim() === '') {
      throw new ValidationError(`Upload name must not be empty: ${filePath}`);
    }
    if (meta.fileSize === 0) {
      throw new ValidationError(`File is empty: ${filePath}`);
    }

    const datasetId = options.datasetId ?? (await this.ctx.resolveDatasetId(batchId));
    const data = await dataSource.read();

    this.ctx.logger.debug(`Uploading ${fileName} (${String(data.length)} bytes, ${meta.mimeType}) to batch ${batchId}`);
    await this.ctx.ingest.putFile(batchId, datasetId, fileName, data, meta.mimeType);

    this.ctx.eventBus.emit({
      type: 'file:uploaded',
      batchId,
      fileName,
      sizeBytes: data.length,
      timestamp: Date.now(),
    });

    return {
      success: true,
      fileName,
      filePath,
      sizeBytes: data.length,
      contentType: meta.mimeType,
    };
  }
}
