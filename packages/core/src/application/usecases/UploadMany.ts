import { basename } from 'node:path';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { UploadResult, UploadSummary } from '../../domain/model/Upload.js';
import { summarizeUploads } from '../../domain/model/Upload.js';
import { Semaphore } from '../../domain/services/Semaphore.js';
import { errorMessage } from '../../domain/errors/AepError.js';
import type { IngestionContext } from '../IngestionContext.js';
import { UploadFile } from './UploadFile.js';

/**
 * Use case: upload many files into one batch with bounded concurrency.
 *
 * Never throws for a per-file failure: each file gets an `UploadResult`, and one
 * failing file does not cancel the others. Results keep the input order.
 */
export class UploadMany {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(
    sources: readonly (string | DataSource)[],
    batchId: string,
    maxConcurrency: number = this.ctx.defaults.maxConcurrency,
  ): Promise<UploadSummary> {
    this.ctx.assertConcurrency(maxConcurrency);

    const startedAt = Date.now();
    const semaphore = new Semaphore(maxConcurrency);
    const uploader = new UploadFile(this.ctx);
    const results = new Array<UploadResult>(sources.length);

    this.ctx.logger.info(
      `Uploading ${String(sources.length)} file(s) to batch ${batchId} (max ${String(maxConcurrency)} concurrent)`,
    );

    await Promise.all(
      sources.map((source, index) =>
        semaphore.run(async () => {
          results[index] = await this.uploadOne(uploader, batchId, source);
        }),
      ),
    );

    const summary = summarizeUploads(batchId, results, Date.now() - startedAt);
    this.ctx.logger.info(
      `Batch ${batchId}: ${String(summary.succeeded)}/${String(summary.total)} file(s) uploaded, ${String(summary.totalBytes)} bytes`,
    );
    return summary;
  }

  private async uploadOne(uploader: UploadFile, batchId: string, source: string | DataSource): Promise<UploadResult> {
    try {
      return await uploader.execute(batchId, source);
    } catch (error) {
      const fileName = await describeSource(source);
      const failure = {
        type: error instanceof Error ? error.name : 'Error',
        message: errorMessage(error),
      };
      this.ctx.logger.warn(`Upload of ${fileName} to batch ${batchId} failed: ${failure.message}`);
      this.ctx.eventBus.emit({
        type: 'file:failed',
        batchId,
        fileName,
        error: failure,
        timestamp: Date.now(),
      });
      return {
        success: false,
        fileName,
        filePath: typeof source === 'string' ? source : fileName,
        sizeBytes: 0,
        error: failure,
      };
    }
  }
}

async function describeSource(source: string | DataSource): Promise<string> {
  if (typeof source === 'string') return basename(source);
  try {
    return (await source.metadata()).fileName;
  } catch {
    return 'unknown';
  }
}
