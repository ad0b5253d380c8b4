import type { Batch } from '../model/Batch.js';
import type { BatchStatus } from '../model/BatchStatus.js';
import type { UploadFailure } from '../model/Upload.js';

/** Emitted after the platform accepted a new batch. */
export interface BatchCreatedEvent {
  readonly type: 'batch:created';
  readonly batchId: string;
  readonly datasetId: string;
  readonly format: string;
  readonly timestamp: number;
}

/** Emitted after the batch was signalled complete (all files uploaded). */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly batchId: string;
  readonly timestamp: number;
}

/** Emitted after an abort request was accepted. */
export interface BatchAbortedEvent {
  readonly type: 'batch:aborted';
  readonly batchId: string;
  readonly timestamp: number;
}

/** Emitted on every status read while polling. `attempt` starts at `1`. */
export interface BatchPolledEvent {
  readonly type: 'batch:polled';
  readonly batchId: string;
  readonly status: BatchStatus;
  readonly attempt: number;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted once polling observes a terminal status. */
export interface BatchSettledEvent {
  readonly type: 'batch:settled';
  readonly batchId: string;
  readonly batch: Batch;
  readonly timestamp: number;
}

/** Emitted when a file has been stored in the batch. */
export interface FileUploadedEvent {
  readonly type: 'file:uploaded';
  readonly batchId: string;
  readonly fileName: string;
  readonly sizeBytes: number;
  readonly timestamp: number;
}

/** Emitted when a file could not be uploaded. */
export interface FileFailedEvent {
  readonly type: 'file:failed';
  readonly batchId: string;
  readonly fileName: string;
  readonly error: UploadFailure;
  readonly timestamp: number;
}

/** Emitted before a request is sent again after a retryable failure. */
export interface RequestRetriedEvent {
  readonly type: 'request:retried';
  readonly method: string;
  readonly path: string;
  /** Retry number, starting at `1`. */
  readonly attempt: number;
  /** Total requests allowed, the first one included. */
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly error: string;
  readonly timestamp: number;
}

export type DomainEvent =
  | BatchCreatedEvent
  | BatchCompletedEvent
  | BatchAbortedEvent
  | BatchPolledEvent
  | BatchSettledEvent
  | FileUploadedEvent
  | FileFailedEvent
  | RequestRetriedEvent;

export type EventType = DomainEvent['type'];

/** Extract the event interface for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
