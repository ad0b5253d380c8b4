import type { Batch } from './Batch.js';

/** Error details attached to a failed upload. `type` is the error class name, e.g. `ValidationError`. */
export interface UploadFailure {
  readonly type: string;
  readonly message: string;
}

/** Per-file outcome of an upload into a batch. */
export type UploadResult =
  | {
      readonly success: true;
      readonly fileName: string;
      readonly filePath: string;
      readonly sizeBytes: number;
      readonly contentType: string;
    }
  | {
      readonly success: false;
      readonly fileName: string;
      readonly filePath: string;
      readonly sizeBytes: number;
      readonly error: UploadFailure;
    };

/** Aggregate of a bulk upload. `results` keeps the order of the input paths. */
export interface UploadSummary {
  readonly batchId: string;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly totalBytes: number;
  readonly results: readonly UploadResult[];
  readonly elapsedMs: number;
}

/** Presence of a single file in a batch, as listed by the Catalog Service. */
export type UploadStatus =
  | {
      readonly exists: true;
      readonly fileName: string;
      readonly sizeBytes: number;
      readonly records: number;
      readonly isValid: boolean;
    }
  | { readonly exists: false; readonly fileName: string };

/** Outcome of the full create → upload → complete → wait lifecycle. */
export interface IngestionReport {
  readonly batchId: string;
  readonly datasetId: string;
  readonly uploads: UploadSummary;
  /** Last observed state of the batch. */
  readonly batch: Batch;
}

export function summarizeUploads(batchId: string, results: readonly UploadResult[], elapsedMs: number): UploadSummary {
  let succeeded = 0;
  let totalBytes = 0;
  for (const result of results) {
    if (result.success) {
      succeeded++;
      totalBytes += result.sizeBytes;
    }
  }
  return {
    batchId,
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    totalBytes,
    results,
    elapsedMs,
  };
}
