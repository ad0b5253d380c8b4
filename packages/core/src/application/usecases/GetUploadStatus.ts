import type { UploadStatus } from '../../domain/model/Upload.js';
import type { IngestionContext } from '../IngestionContext.js';

/** Use case: check whether a file is present in a batch, according to the Catalog. */
export class GetUploadStatus {
  constructor(private readonly ctx: IngestionContext) {}

  async execute(batchId: string, fileName: string): Promise<UploadStatus> {
    const files = await this.ctx.catalog.listDatasetFiles({ batchId, limit: 100 });
    const file = files.find((f) => f.name === fileName);

    if (!file) {
      return { exists: false, fileName };
    }
    return {
      exists: true,
      fileName,
      sizeBytes: file.sizeInBytes ?? 0,
      records: file.records ?? 0,
      isValid: file.isValid ?? false,
    };
  }
}
