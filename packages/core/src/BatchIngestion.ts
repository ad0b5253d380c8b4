import type { Batch } from './domain/model/Batch.js';
import type { InputFormat } from './domain/model/Batch.js';
import type { UploadResult, UploadStatus, UploadSummary, IngestionReport } from './domain/model/Upload.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { TokenProvider } from './domain/ports/TokenProvider.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { ValidationError, errorMessage } from './domain/errors/AepError.js';
import { EventBus } from './application/EventBus.js';
import { IngestionContext } from './application/IngestionContext.js';
import { CreateBatch } from './application/usecases/CreateBatch.js';
import { UploadFile } from './application/usecases/UploadFile.js';
import type { UploadFileOptions } from './application/usecases/UploadFile.js';
import { UploadMany } from './application/usecases/UploadMany.js';
import { UploadDirectory } from './application/usecases/UploadDirectory.js';
import type { UploadDirectoryOptions } from './application/usecases/UploadDirectory.js';
import { CompleteBatch } from './application/usecases/CompleteBatch.js';
import { AbortBatch } from './application/usecases/AbortBatch.js';
import { PollBatch } from './application/usecases/PollBatch.js';
import { GetUploadStatus } from './application/usecases/GetUploadStatus.js';
import { IngestFiles } from './application/usecases/IngestFiles.js';
import type { IngestOptions } from './application/usecases/IngestFiles.js';
import { AepHttpClient } from './infrastructure/http/AepHttpClient.js';
import type { AepHttpClientConfig, FetchFn } from './infrastructure/http/AepHttpClient.js';
import { CatalogClient } from './infrastructure/api/CatalogClient.js';
import { BatchIngestClient } from './infrastructure/api/BatchIngestClient.js';
import { FlowClient } from './infrastructure/api/FlowClient.js';
import { StaticTokenProvider } from './infrastructure/auth/StaticTokenProvider.js';
import { ImsTokenProvider } from './infrastructure/auth/ImsTokenProvider.js';
import type { AepConfig } from './infrastructure/config/AepConfig.js';
import type { Logger } from './infrastructure/logging/logger.js';
import { createSilentLogger } from './infrastructure/logging/logger.js';

/** Connection settings for the platform; see `AepHttpClientConfig`. */
export type AepConnection = Omit<AepHttpClientConfig, 'logger' | 'onRetry'>;

/** Configuration for a `BatchIngestion` instance. */
export interface BatchIngestionConfig {
  readonly connection: AepConnection;
  /** Default: a silent logger. */
  readonly logger?: Logger;
  /** Input format used by `createBatch()` when none is given. Default: `json`. */
  readonly defaultFormat?: InputFormat;
  /** Concurrent uploads in bulk operations. Default: `3`. */
  readonly maxConcurrency?: number;
  /** Delay between status reads while polling. Default: `5000`. */
  readonly pollIntervalMs?: number;
  /** Polling deadline. Default: `300000` (5 minutes). */
  readonly pollTimeoutMs?: number;
}

/** Extra wiring for `BatchIngestion.fromConfig()`. */
export interface FromConfigOptions {
  readonly logger?: Logger;
  readonly fetch?: FetchFn;
  readonly maxConcurrency?: number;
  readonly pollIntervalMs?: number;
  readonly pollTimeoutMs?: number;
}

/**
 * Facade over the batch ingestion lifecycle: create → upload → complete → poll.
 *
 * Delegates each operation to a use case in `application/usecases/`, all sharing
 * one `IngestionContext`. Single-file operations throw typed errors; bulk
 * operations report per-file outcomes instead.
 *
 * @example
 * ```typescript
 * const ingestion = BatchIngestion.fromConfig(loadConfig());
 * const batchId = await ingestion.createBatch(datasetId, 'json');
 * await ingestion.uploadMany(['a.json', 'b.json'], batchId);
 * await ingestion.completeBatch(batchId);
 * const batch = await ingestion.pollUntilTerminal(batchId);
 * ```
 */
export class BatchIngestion {
  private readonly ctx: IngestionContext;
  private readonly flowClient: FlowClient;

  constructor(config: BatchIngestionConfig) {
    const logger = config.logger ?? createSilentLogger();
    const eventBus = new EventBus((error, event) => {
      logger.warn(`Event handler for '${event.type}' threw: ${errorMessage(error)}`);
    });

    const http = new AepHttpClient({
      ...config.connection,
      logger,
      onRetry: (notice) => {
        eventBus.emit({
          type: 'request:retried',
          method: notice.method,
          path: notice.path,
          attempt: notice.attempt,
          maxAttempts: notice.maxAttempts,
          delayMs: notice.delayMs,
          error: notice.error.message,
          timestamp: Date.now(),
        });
      },
    });

    this.ctx = new IngestionContext(
      new CatalogClient(http),
      new BatchIngestClient(http),
      eventBus,
      logger,
      {
        format: config.defaultFormat ?? 'json',
        maxConcurrency: config.maxConcurrency ?? 3,
        pollIntervalMs: config.pollIntervalMs ?? 5000,
        pollTimeoutMs: config.pollTimeoutMs ?? 300_000,
      },
    );
    this.ctx.assertConcurrency(this.ctx.defaults.maxConcurrency);
    this.flowClient = new FlowClient(http);
  }

  /**
   * Build an instance from environment configuration. Uses `AEP_ACCESS_TOKEN` when
   * set, otherwise exchanges the client credentials with IMS.
   */
  static fromConfig(config: AepConfig, options: FromConfigOptions = {}): BatchIngestion {
    let tokenProvider: TokenProvider;
    if (config.accessToken) {
      tokenProvider = new StaticTokenProvider(config.accessToken);
    } else if (config.clientSecret) {
      tokenProvider = new ImsTokenProvider({
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        tokenUrl: config.imsTokenUrl,
        scopes: config.imsScopes,
        fetch: options.fetch,
      });
    } else {
      throw new ValidationError('Either an access token or a client secret is required');
    }

    return new BatchIngestion({
      connection: {
        baseUrl: config.apiBaseUrl,
        clientId: config.clientId,
        orgId: config.orgId,
        sandboxName: config.sandboxName,
        tokenProvider,
        timeoutMs: config.timeoutMs,
        retry: { maxAttempts: config.maxAttempts, retryDelayMs: config.retryDelayMs },
        fetch: options.fetch,
      },
      logger: options.logger,
      maxConcurrency: options.maxConcurrency,
      pollIntervalMs: options.pollIntervalMs,
      pollTimeoutMs: options.pollTimeoutMs,
    });
  }

  /** Catalog Service client sharing this instance's connection, for dataset and batch queries. */
  get catalog(): CatalogClient {
    return this.ctx.catalog;
  }

  /** Flow Service client sharing this instance's connection, for dataflow and run inspection. */
  get flow(): FlowClient {
    return this.flowClient;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Open a batch for a dataset.
   *
   * @param format - `parquet`, `json`, `csv` or `avro`. Default: the configured `defaultFormat`.
   * @returns The batch id.
   * @throws ValidationError for an unknown format; ServiceError when the platform rejects the request.
   */
  createBatch(datasetId: string, format?: string): Promise<string> {
    return new CreateBatch(this.ctx).execute(datasetId, format);
  }

  /**
   * Upload one file (or in-memory source) into a batch.
   *
   * @param name - Name stored in the batch, or options. Default: the file's base name.
   * @throws NotFoundError for a missing file; ValidationError for an empty or oversized one.
   */
  uploadFile(batchId: string, source: string | DataSource, name?: string | UploadFileOptions): Promise<UploadResult> {
    const options = typeof name === 'string' ? { name } : name;
    return new UploadFile(this.ctx).execute(batchId, source, options);
  }

  /**
   * Upload many files with at most `maxConcurrency` requests in flight.
   * A failing file is reported in the summary and does not stop the others.
   */
  uploadMany(sources: readonly (string | DataSource)[], batchId: string, maxConcurrency?: number): Promise<UploadSummary> {
    return new UploadMany(this.ctx).execute(sources, batchId, maxConcurrency);
  }

  /** Upload every file of a directory whose name matches `options.pattern`. */
  uploadDirectory(directory: string, batchId: string, options?: UploadDirectoryOptions): Promise<UploadSummary> {
    return new UploadDirectory(this.ctx).execute(directory, batchId, options);
  }

  /** Signal that all uploads are done. */
  completeBatch(batchId: string): Promise<void> {
    return new CompleteBatch(this.ctx).execute(batchId);
  }

  /** Abandon a batch that has not reached a terminal status. */
  abortBatch(batchId: string): Promise<void> {
    return new AbortBatch(this.ctx).execute(batchId);
  }

  /** Current state of a batch. @throws NotFoundError when the batch does not exist. */
  getBatch(batchId: string): Promise<Batch> {
    return this.ctx.catalog.getBatch(batchId);
  }

  /**
   * Poll until the batch reaches `success`, `failed` or `aborted` and return it.
   *
   * @throws TimeoutError when no terminal status is observed within `timeoutMs`.
   */
  pollUntilTerminal(batchId: string, intervalMs?: number, timeoutMs?: number): Promise<Batch> {
    return new PollBatch(this.ctx).execute(batchId, intervalMs, timeoutMs);
  }

  /** Whether `fileName` has been stored in the batch. */
  getUploadStatus(batchId: string, fileName: string): Promise<UploadStatus> {
    return new GetUploadStatus(this.ctx).execute(batchId, fileName);
  }

  /** Run the whole lifecycle for a set of files and report the outcome. */
  ingest(datasetId: string, sources: readonly (string | DataSource)[], options?: IngestOptions): Promise<IngestionReport> {
    return new IngestFiles(this.ctx).execute(datasetId, sources, options);
  }
}
