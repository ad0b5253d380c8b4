import type { BatchStatus } from './BatchStatus.js';

/** File formats accepted by the bulk ingestion API. */
export const InputFormat = {
  PARQUET: 'parquet',
  JSON: 'json',
  CSV: 'csv',
  AVRO: 'avro',
} as const;

export type InputFormat = (typeof InputFormat)[keyof typeof InputFormat];

export const INPUT_FORMATS: readonly InputFormat[] = Object.values(InputFormat);

export function isInputFormat(value: string): value is InputFormat {
  return INPUT_FORMATS.some((format) => format === value);
}

/** Input format declared when the batch was created. CSV options are only set for `csv`. */
export interface BatchInputFormat {
  readonly format: string;
  readonly delimiter?: string;
  readonly quote?: string;
  readonly escape?: string;
}

/** Ingestion counters and timing reported by the platform. Timestamps are epoch milliseconds. */
export interface BatchMetrics {
  readonly recordsRead?: number;
  readonly recordsWritten?: number;
  readonly recordsFailed?: number;
  readonly startTime?: number;
  readonly endTime?: number;
  readonly failureReason?: string;
}

export interface BatchError {
  readonly code: string;
  readonly description: string;
  /** Row numbers affected, when the platform can attribute the error. */
  readonly rows?: readonly number[];
}

/** Object the batch is attached to. For ingestion batches `type` is `dataSet`. */
export interface BatchRelatedObject {
  readonly type: string;
  readonly id: string;
}

/** A unit of data ingestion into a dataset. */
export interface Batch {
  readonly id: string;
  readonly status: BatchStatus;
  readonly imsOrg?: string;
  readonly created?: number;
  readonly updated?: number;
  readonly relatedObjects: readonly BatchRelatedObject[];
  readonly inputFormat?: BatchInputFormat;
  readonly metrics?: BatchMetrics;
  readonly errors: readonly BatchError[];
  readonly createdUser?: string;
  readonly tags?: Readonly<Record<string, unknown>>;
}

/** Dataset the batch writes into, taken from its related objects. */
export function getBatchDatasetId(batch: Batch): string | undefined {
  return batch.relatedObjects.find((o) => o.type === 'dataSet')?.id;
}

/** One-line human readable reason for a failed batch, combining the failure reason and error list. */
export function describeBatchFailure(batch: Batch): string {
  let head = `Batch ${batch.id} ${batch.status}`;
  if (batch.metrics?.failureReason) {
    head += `: ${batch.metrics.failureReason}`;
  }
  return [head, ...batch.errors.map((e) => `${e.code}: ${e.description}`)].join('; ');
}
