// Main entry point
export { BatchIngestion } from './BatchIngestion.js';
export type { BatchIngestionConfig, AepConnection, FromConfigOptions } from './BatchIngestion.js';

// Domain model
export type {
  Batch,
  BatchInputFormat,
  BatchMetrics,
  BatchError,
  BatchRelatedObject,
} from './domain/model/Batch.js';
export { InputFormat, INPUT_FORMATS, isInputFormat, getBatchDatasetId, describeBatchFailure } from './domain/model/Batch.js';
export { BatchStatus, BATCH_STATUSES, isTerminalStatus, canTransition, isBatchStatus } from './domain/model/BatchStatus.js';
export type { Dataset, DatasetSchemaRef, DatasetTags, DataSetFile } from './domain/model/Dataset.js';
export type {
  Dataflow,
  DataflowRun,
  DataflowHealth,
  DataflowRunFailure,
  DataflowSchedule,
  FlowSpecRef,
  RunError,
  RunMetrics,
} from './domain/model/Dataflow.js';
export { DataflowState, RunStatus, summarizeRuns } from './domain/model/Dataflow.js';
export type { UploadResult, UploadFailure, UploadSummary, UploadStatus, IngestionReport } from './domain/model/Upload.js';
export { summarizeUploads } from './domain/model/Upload.js';

// Errors
export {
  AepError,
  ValidationError,
  ServiceError,
  NotFoundError,
  RateLimitError,
  ServerError,
  NetworkError,
  TimeoutError,
  isRetryable,
  errorMessage,
} from './domain/errors/AepError.js';
export type { AepErrorCode, ServiceErrorDetails } from './domain/errors/AepError.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  BatchCreatedEvent,
  BatchCompletedEvent,
  BatchAbortedEvent,
  BatchPolledEvent,
  BatchSettledEvent,
  FileUploadedEvent,
  FileFailedEvent,
  RequestRetriedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';

// Use case option types
export type { UploadFileOptions } from './application/usecases/UploadFile.js';
export type { UploadDirectoryOptions } from './application/usecases/UploadDirectory.js';
export type { IngestOptions } from './application/usecases/IngestFiles.js';

// Domain services
export { Semaphore } from './domain/services/Semaphore.js';
export { GlobMatcher } from './domain/services/GlobMatcher.js';
export type { RetryPolicy } from './domain/services/Backoff.js';
export { DEFAULT_RETRY_POLICY, backoffDelay } from './domain/services/Backoff.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { TokenProvider } from './domain/ports/TokenProvider.js';

// Built-in adapters
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { detectContentType } from './infrastructure/detectContentType.js';
export { StaticTokenProvider } from './infrastructure/auth/StaticTokenProvider.js';
export { ImsTokenProvider } from './infrastructure/auth/ImsTokenProvider.js';
export type { ImsTokenProviderOptions } from './infrastructure/auth/ImsTokenProvider.js';
export { AepHttpClient } from './infrastructure/http/AepHttpClient.js';
export type { AepHttpClientConfig, FetchFn, RequestOptions, RetryNotice, QueryValue } from './infrastructure/http/AepHttpClient.js';
export { CatalogClient, CATALOG_PATH } from './infrastructure/api/CatalogClient.js';
export type {
  CreateDatasetOptions,
  DatasetUpdate,
  ListDatasetsOptions,
  ListBatchesOptions,
  ListDatasetFilesOptions,
} from './infrastructure/api/CatalogClient.js';
export { BatchIngestClient, IMPORT_PATH } from './infrastructure/api/BatchIngestClient.js';
export { FlowClient, FLOW_SERVICE_PATH } from './infrastructure/api/FlowClient.js';
export type { ListDataflowsOptions, ListRunsOptions } from './infrastructure/api/FlowClient.js';

// Configuration and logging
export { loadConfig, DEFAULT_API_BASE_URL, DEFAULT_IMS_TOKEN_URL, DEFAULT_IMS_SCOPES } from './infrastructure/config/AepConfig.js';
export type { AepConfig } from './infrastructure/config/AepConfig.js';
export { createLogger, createSilentLogger } from './infrastructure/logging/logger.js';
export type { Logger, LoggerOptions } from './infrastructure/logging/logger.js';
