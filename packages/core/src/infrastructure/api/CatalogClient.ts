import type { Batch } from '../../domain/model/Batch.js';
import type { BatchStatus } from '../../domain/model/BatchStatus.js';
import type { Dataset, DataSetFile, DatasetTags } from '../../domain/model/Dataset.js';
import { NotFoundError, ServiceError, ValidationError } from '../../domain/errors/AepError.js';
import type { AepHttpClient } from '../http/AepHttpClient.js';
import {
  parseBatchList,
  parseBatchLookup,
  parseCreatedDatasetId,
  parseDataSetFileList,
  parseDatasetList,
  parseDatasetLookup,
} from './schemas.js';

export const CATALOG_PATH = '/data/foundation/catalog';

/** Catalog list endpoints cap `limit` at 100. */
const MAX_LIMIT = 100;

const XED_CONTENT_TYPE = 'application/vnd.adobe.xed+json;version=1';

export interface CreateDatasetOptions {
  readonly description?: string;
  /** Tag the dataset for Real-Time Customer Profile. */
  readonly enableProfile?: boolean;
  /** Tag the dataset for Identity Service. */
  readonly enableIdentity?: boolean;
}

export interface ListDatasetsOptions {
  readonly limit?: number;
  /** Restrict the properties returned for each dataset. */
  readonly properties?: readonly string[];
  readonly schemaId?: string;
  /** `DRAFT` or `ENABLED`. */
  readonly state?: string;
}

/** Dataset properties to change. Properties left out keep their current value. */
export interface DatasetUpdate {
  readonly name?: string;
  readonly description?: string;
  readonly tags?: DatasetTags;
}

export interface ListBatchesOptions {
  readonly limit?: number;
  readonly datasetId?: string;
  readonly status?: BatchStatus;
}

export interface ListDatasetFilesOptions {
  readonly limit?: number;
  readonly datasetId?: string;
  readonly batchId?: string;
}

/**
 * Client for the Catalog Service: datasets, batch metadata and the files batches
 * produced. Batch creation and lifecycle actions go through `BatchIngestClient`.
 */
export class CatalogClient {
  constructor(private readonly http: AepHttpClient) {}

  // --- Datasets ---

  /**
   * Create a dataset bound to an XDM schema.
   *
   * @param schemaId - Full schema `$id` URI.
   * @returns The new dataset id.
   * @throws ValidationError when a dataset with this name already exists (409).
   */
  async createDataset(name: string, schemaId: string, options: CreateDatasetOptions = {}): Promise<string> {
    const path = `${CATALOG_PATH}/dataSets`;
    const tags: Record<string, string[]> = {};
    if (options.enableProfile) tags.unifiedProfile = ['enabled:true'];
    if (options.enableIdentity) tags.unifiedIdentity = ['enabled:true'];

    const payload = {
      name,
      schemaRef: { id: schemaId, contentType: XED_CONTENT_TYPE },
      ...(options.description ? { description: options.description } : {}),
      ...(Object.keys(tags).length > 0 ? { tags } : {}),
    };

    try {
      const body = await this.http.post(path, { json: payload });
      return parseCreatedDatasetId(body, { method: 'POST', path });
    } catch (error) {
      if (error instanceof ServiceError && error.status === 409) {
        throw new ValidationError(`Dataset with name '${name}' already exists`, { cause: error });
      }
      throw error;
    }
  }

  async listDatasets(options: ListDatasetsOptions = {}): Promise<Dataset[]> {
    const path = `${CATALOG_PATH}/dataSets`;
    const body = await this.http.get(path, {
      query: {
        limit: clampLimit(options.limit),
        properties: options.properties?.join(','),
        'schemaRef.id': options.schemaId,
        state: options.state,
      },
    });
    return parseDatasetList(body, { method: 'GET', path });
  }

  async getDataset(datasetId: string): Promise<Dataset> {
    const path = `${CATALOG_PATH}/dataSets/${encodeURIComponent(datasetId)}`;
    const body = await this.withNotFound(`Dataset not found: ${datasetId}`, () => this.http.get(path));
    return parseDatasetLookup(body, { method: 'GET', path });
  }

  /**
   * PATCH dataset properties, then read the dataset back.
   *
   * @throws ValidationError when `update` changes nothing.
   */
  async updateDataset(datasetId: string, update: DatasetUpdate): Promise<Dataset> {
    const path = `${CATALOG_PATH}/dataSets/${encodeURIComponent(datasetId)}`;
    const payload: Record<string, unknown> = {};
    if (update.name !== undefined) payload.name = update.name;
    if (update.description !== undefined) payload.description = update.description;
    if (update.tags !== undefined) payload.tags = update.tags;
    if (Object.keys(payload).length === 0) {
      throw new ValidationError(`No changes given for dataset ${datasetId}`);
    }

    await this.withNotFound(`Dataset not found: ${datasetId}`, () => this.http.patch(path, { json: payload }));
    return this.getDataset(datasetId);
  }

  /** Tag the dataset for Real-Time Customer Profile. */
  enableDatasetForProfile(datasetId: string): Promise<Dataset> {
    return this.updateDataset(datasetId, { tags: { unifiedProfile: ['enabled:true'] } });
  }

  /** Tag the dataset for Identity Service. */
  enableDatasetForIdentity(datasetId: string): Promise<Dataset> {
    return this.updateDataset(datasetId, { tags: { unifiedIdentity: ['enabled:true'] } });
  }

  async deleteDataset(datasetId: string): Promise<void> {
    const path = `${CATALOG_PATH}/dataSets/${encodeURIComponent(datasetId)}`;
    await this.withNotFound(`Dataset not found: ${datasetId}`, () => this.http.delete(path));
  }

  // --- Batches ---

  async getBatch(batchId: string): Promise<Batch> {
    const path = `${CATALOG_PATH}/batches/${encodeURIComponent(batchId)}`;
    const body = await this.withNotFound(`Batch not found: ${batchId}`, () => this.http.get(path));
    return parseBatchLookup(body, { method: 'GET', path });
  }

  async listBatches(options: ListBatchesOptions = {}): Promise<Batch[]> {
    const path = `${CATALOG_PATH}/batches`;
    const body = await this.http.get(path, {
      query: {
        limit: clampLimit(options.limit),
        dataSet: options.datasetId,
        status: options.status,
      },
    });
    return parseBatchList(body, { method: 'GET', path });
  }

  // --- Dataset files ---

  async listDatasetFiles(options: ListDatasetFilesOptions = {}): Promise<DataSetFile[]> {
    const path = `${CATALOG_PATH}/dataSetFiles`;
    const body = await this.http.get(path, {
      query: {
        limit: clampLimit(options.limit),
        dataSetId: options.datasetId,
        batchId: options.batchId,
      },
    });
    return parseDataSetFileList(body, { method: 'GET', path });
  }

  /** Re-label a remote 404 with the entity that was looked up. */
  private async withNotFound(message: string, call: () => Promise<unknown>): Promise<unknown> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(message, error, { cause: error });
      }
      throw error;
    }
  }
}

function clampLimit(limit: number | undefined): number {
  return Math.min(Math.max(1, limit ?? 50), MAX_LIMIT);
}
