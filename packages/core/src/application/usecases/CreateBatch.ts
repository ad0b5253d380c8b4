import type { InputFormat } from '../../domain/model/Batch.js';
import { INPUT_FORMATS, isInputFormat } from '../../domain/model/Batch.js';
import { ValidationError } from '../../domain/errors/AepError.js';
import type { IngestionContext } from '../IngestionContext.js';

/** Use case: open a new batch for a dataset. */
export class CreateBatch {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(datasetId: string, format: string = this.ctx.defaults.format): Promise<string> {
    if (datasetId.trim() === '') {
      throw new ValidationError('datasetId must not be empty');
    }
    const inputFormat = this.assertFormat(format);

    const batchId = await this.ctx.ingest.createBatch(datasetId, inputFormat);
    this.ctx.rememberDataset(batchId, datasetId);
    this.ctx.logger.info(`Created batch ${batchId} for dataset ${datasetId} (${inputFormat})`);

    this.ctx.eventBus.emit({
      type: 'batch:created',
      batchId,
      datasetId,
      format: inputFormat,
      timestamp: Date.now(),
    });

    return batchId;
  }

  private assertFormat(format: string): InputFormat {
    const normalized = format.toLowerCase();
    if (!isInputFormat(normalized)) {
      throw new ValidationError(`Unsupported input format '${format}'. Expected one of: ${INPUT_FORMATS.join(', ')}`);
    }
    return normalized;
  }
}
