import type { Batch } from '../../domain/model/Batch.js';
import type { BatchStatus } from '../../domain/model/BatchStatus.js';
import { canTransition, isTerminalStatus } from '../../domain/model/BatchStatus.js';
import { TimeoutError, ValidationError } from '../../domain/errors/AepError.js';
import { sleep } from '../../domain/services/Backoff.js';
import type { IngestionContext } from '../IngestionContext.js';

/**
 * Use case: poll a batch until it reaches a terminal status.
 *
 * Returns the batch as first observed in `success`, `failed` or `aborted`; a
 * failed batch is returned, not thrown. Raises `TimeoutError` once `timeoutMs`
 * has elapsed without a terminal status. The last sleep is shortened so the
 * final read happens at the deadline rather than after it.
 */
export class PollBatch {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(
    batchId: string,
    intervalMs: number = this.ctx.defaults.pollIntervalMs,
    timeoutMs: number = this.ctx.defaults.pollTimeoutMs,
  ): Promise<Batch> {
    if (!(intervalMs >= 0) || !(timeoutMs >= 0)) {
      throw new ValidationError('Polling interval and timeout must be non-negative');
    }

    const startedAt = Date.now();
    let previous: BatchStatus | undefined;
    let attempt = 0;

    for (;;) {
      attempt++;
      const batch = await this.ctx.catalog.getBatch(batchId);
      const elapsedMs = Date.now() - startedAt;

      this.ctx.eventBus.emit({
        type: 'batch:polled',
        batchId,
        status: batch.status,
        attempt,
        elapsedMs,
        timestamp: Date.now(),
      });

      if (previous !== undefined && previous !== batch.status) {
        if (canTransition(previous, batch.status)) {
          this.ctx.logger.info(`Batch ${batchId}: ${previous} → ${batch.status}`);
        } else {
          this.ctx.logger.warn(`Batch ${batchId}: unexpected status change ${previous} → ${batch.status}`);
        }
      }
      previous = batch.status;

      if (isTerminalStatus(batch.status)) {
        this.ctx.eventBus.emit({ type: 'batch:settled', batchId, batch, timestamp: Date.now() });
        this.ctx.logger.info(`Batch ${batchId} settled as ${batch.status} after ${String(attempt)} poll(s)`);
        return batch;
      }

      if (elapsedMs >= timeoutMs) {
        throw new TimeoutError(batchId, timeoutMs, batch.status);
      }

      await sleep(Math.min(intervalMs, timeoutMs - elapsedMs));
    }
  }
}
