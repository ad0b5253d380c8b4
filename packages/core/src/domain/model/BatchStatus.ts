/**
 * Remote lifecycle of an ingestion batch, as reported by the Catalog Service.
 *
 * Valid transitions:
 * - `loading` → `staged` | `aborted`
 * - `staged` → `processing` | `aborted`
 * - `processing` → `success` | `failed` | `retrying` | `aborted`
 * - `retrying` → `processing` | `aborted`
 * - `failed` → `retrying`
 * - `success`, `aborted` → (terminal)
 *
 * `failed` counts as terminal for callers waiting on a batch: the platform only
 * moves a failed batch back to `retrying` when an operator replays it.
 */
export const BatchStatus = {
  LOADING: 'loading',
  STAGED: 'staged',
  PROCESSING: 'processing',
  SUCCESS: 'success',
  FAILED: 'failed',
  ABORTED: 'aborted',
  RETRYING: 'retrying',
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

export const BATCH_STATUSES: readonly BatchStatus[] = Object.values(BatchStatus);

const TERMINAL_STATUSES: ReadonlySet<BatchStatus> = new Set([
  BatchStatus.SUCCESS,
  BatchStatus.FAILED,
  BatchStatus.ABORTED,
]);

const VALID_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  [BatchStatus.LOADING]: [BatchStatus.STAGED, BatchStatus.ABORTED],
  [BatchStatus.STAGED]: [BatchStatus.PROCESSING, BatchStatus.ABORTED],
  [BatchStatus.PROCESSING]: [BatchStatus.SUCCESS, BatchStatus.FAILED, BatchStatus.RETRYING, BatchStatus.ABORTED],
  [BatchStatus.RETRYING]: [BatchStatus.PROCESSING, BatchStatus.ABORTED],
  [BatchStatus.FAILED]: [BatchStatus.RETRYING],
  [BatchStatus.SUCCESS]: [],
  [BatchStatus.ABORTED]: [],
};

/** Whether polling should stop at this status. */
export function isTerminalStatus(status: BatchStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** Check whether a status change observed between two polls is a legal lifecycle step. */
export function canTransition(from: BatchStatus, to: BatchStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isBatchStatus(value: string): value is BatchStatus {
  return BATCH_STATUSES.some((status) => status === value);
}
