import type { IngestionContext } from '../IngestionContext.js';

/** Use case: abandon a batch. Terminal on the platform side. */
export class AbortBatch {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(batchId: string): Promise<void> {
    await this.ctx.ingest.abortBatch(batchId);
    this.ctx.forgetDataset(batchId);
    this.ctx.logger.warn(`Batch ${batchId} aborted`);
    this.ctx.eventBus.emit({ type: 'batch:aborted', batchId, timestamp: Date.now() });
  }
}
