import type { InputFormat } from '../domain/model/Batch.js';
import { getBatchDatasetId } from '../domain/model/Batch.js';
import { ValidationError } from '../domain/errors/AepError.js';
import type { CatalogClient } from '../infrastructure/api/CatalogClient.js';
import type { BatchIngestClient } from '../infrastructure/api/BatchIngestClient.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import type { EventBus } from './EventBus.js';

/** Defaults applied when an operation is called without its own settings. */
export interface IngestionDefaults {
  readonly format: InputFormat;
  readonly maxConcurrency: number;
  readonly pollIntervalMs: number;
  readonly pollTimeoutMs: number;
}

/**
 * State shared by the use cases of one `BatchIngestion` instance.
 *
 * Internal: not exported from the package entry point. The only mutable state is
 * the batch → dataset mapping, held from creation until the batch is completed or
 * aborted.
 */
export class IngestionContext {
  /** Dataset of each batch, remembered from `createBatch` or resolved through the Catalog. */
  private readonly datasetByBatch = new Map<string, Promise<string>>();

  constructor(
    readonly catalog: CatalogClient,
    readonly ingest: BatchIngestClient,
    readonly eventBus: EventBus,
    readonly logger: Logger,
    readonly defaults: IngestionDefaults,
  ) {}

  rememberDataset(batchId: string, datasetId: string): void {
    this.datasetByBatch.set(batchId, Promise.resolve(datasetId));
  }

  forgetDataset(batchId: string): void {
    this.datasetByBatch.delete(batchId);
  }

  /**
   * Dataset the batch writes into. Looked up through the Catalog at most once per
   * batch; concurrent callers share the lookup. A failed lookup is not cached.
   */
  resolveDatasetId(batchId: string): Promise<string> {
    const known = this.datasetByBatch.get(batchId);
    if (known) return known;

    const lookup = (async () => {
      try {
        const datasetId = getBatchDatasetId(await this.catalog.getBatch(batchId));
        if (!datasetId) {
          throw new ValidationError(`Batch ${batchId} is not attached to a dataset`);
        }
        return datasetId;
      } catch (error) {
        this.datasetByBatch.delete(batchId);
        throw error;
      }
    })();
    this.datasetByBatch.set(batchId, lookup);
    return lookup;
  }

  assertConcurrency(maxConcurrency: number): void {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ValidationError(`maxConcurrency must be a positive integer, got ${String(maxConcurrency)}`);
    }
  }
}
