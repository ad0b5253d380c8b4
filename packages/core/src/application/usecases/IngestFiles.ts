import type { DataSource } from '../../domain/ports/DataSource.js';
import type { IngestionReport } from '../../domain/model/Upload.js';
import type { Batch } from '../../domain/model/Batch.js';
import { ValidationError } from '../../domain/errors/AepError.js';
import type { IngestionContext } from '../IngestionContext.js';
import { CreateBatch } from './CreateBatch.js';
import { UploadMany } from './UploadMany.js';
import { CompleteBatch } from './CompleteBatch.js';
import { AbortBatch } from './AbortBatch.js';
import { PollBatch } from './PollBatch.js';

export interface IngestOptions {
  readonly format?: string;
  readonly maxConcurrency?: number;
  /** Poll until the batch settles. When `false`, the report holds the batch as read right after completion. Default: `true`. */
  readonly wait?: boolean;
  readonly pollIntervalMs?: number;
  readonly pollTimeoutMs?: number;
  /**
   * Complete the batch even when some uploads failed. By default any failed
   * upload aborts the batch, so a dataset never receives a partial file set.
   */
  readonly allowPartial?: boolean;
}

/** Use case: the whole lifecycle in one call: create → upload → complete → wait. */
export class IngestFiles {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(
    datasetId: string,
    sources: readonly (string | DataSource)[],
    options: IngestOptions = {},
  ): Promise<IngestionReport> {
    if (sources.length === 0) {
      throw new ValidationError('No files to ingest');
    }
    this.ctx.assertConcurrency(options.maxConcurrency ?? this.ctx.defaults.maxConcurrency);

    const batchId = await new CreateBatch(this.ctx).execute(datasetId, options.format);
    const uploads = await new UploadMany(this.ctx).execute(sources, batchId, options.maxConcurrency);

    let batch: Batch;
    if (uploads.succeeded === 0 || (uploads.failed > 0 && !options.allowPartial)) {
      await new AbortBatch(this.ctx).execute(batchId);
      batch = await this.ctx.catalog.getBatch(batchId);
    } else {
      await new CompleteBatch(this.ctx).execute(batchId);
      batch =
        options.wait === false
          ? await this.ctx.catalog.getBatch(batchId)
          : await new PollBatch(this.ctx).execute(batchId, options.pollIntervalMs, options.pollTimeoutMs);
    }

    return { batchId, datasetId, uploads, batch };
  }
}
