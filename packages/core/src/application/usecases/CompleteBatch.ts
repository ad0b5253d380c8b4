import type { IngestionContext } from '../IngestionContext.js';

/** Use case: signal that all files are uploaded so the platform starts processing. */
export class CompleteBatch {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(batchId: string): Promise<void> {
    await this.ctx.ingest.completeBatch(batchId);
    this.ctx.forgetDataset(batchId);
    this.ctx.logger.info(`Batch ${batchId} marked complete`);
    this.ctx.eventBus.emit({ type: 'batch:completed', batchId, timestamp: Date.now() });
  }
}
