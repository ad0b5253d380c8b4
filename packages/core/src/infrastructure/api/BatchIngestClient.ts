import type { InputFormat } from '../../domain/model/Batch.js';
import { ValidationError, ServiceError } from '../../domain/errors/AepError.js';
import type { AepHttpClient } from '../http/AepHttpClient.js';
import { parseCreatedBatchId } from './schemas.js';

export const IMPORT_PATH = '/data/foundation/import';

/** Client for the bulk ingestion API: batch creation, file PUTs and lifecycle actions. */
export class BatchIngestClient {
  constructor(private readonly http: AepHttpClient) {}

  /** Open a batch for the dataset. Returns the batch id. */
  async createBatch(datasetId: string, format: InputFormat): Promise<string> {
    const path = `${IMPORT_PATH}/batches`;
    const body = await this.http.post(path, {
      json: { datasetId, inputFormat: { format } },
    });
    return parseCreatedBatchId(body, { method: 'POST', path });
  }

  /**
   * Store one file in the batch. The platform takes the whole payload in a single PUT.
   *
   * @throws ValidationError when the platform rejects the payload as too large (413).
   */
  async putFile(batchId: string, datasetId: string, fileName: string, data: Buffer, contentType: string): Promise<void> {
    const path =
      `${IMPORT_PATH}/batches/${encodeURIComponent(batchId)}` +
      `/datasets/${encodeURIComponent(datasetId)}/files/${encodeURIComponent(fileName)}`;

    try {
      await this.http.put(path, { body: data, contentType });
    } catch (error) {
      if (error instanceof ServiceError && error.status === 413) {
        throw new ValidationError(`File too large: ${fileName} (${String(data.length)} bytes)`, { cause: error });
      }
      throw error;
    }
  }

  /** Signal that every file has been uploaded; the platform starts processing the batch. */
  async completeBatch(batchId: string): Promise<void> {
    await this.action(batchId, 'COMPLETE');
  }

  /** Abandon the batch. Allowed from any non-terminal status. */
  async abortBatch(batchId: string): Promise<void> {
    await this.action(batchId, 'ABORT');
  }

  private async action(batchId: string, action: 'COMPLETE' | 'ABORT'): Promise<void> {
    await this.http.post(`${IMPORT_PATH}/batches/${encodeURIComponent(batchId)}`, { query: { action } });
  }
}
