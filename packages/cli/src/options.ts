import { InvalidArgumentError } from 'commander';
import type { BatchStatus } from '@aep-ingest/core';
import { BATCH_STATUSES, DataflowState, isBatchStatus } from '@aep-ingest/core';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseBatchStatus(value: string): BatchStatus {
  if (!isBatchStatus(value)) {
    throw new InvalidArgumentError(`Expected one of: ${BATCH_STATUSES.join(', ')}.`);
  }
  return value;
}

export function parseDataflowState(value: string): DataflowState {
  const states = Object.values(DataflowState);
  const state = states.find((candidate) => candidate === value);
  if (!state) {
    throw new InvalidArgumentError(`Expected one of: ${states.join(', ')}.`);
  }
  return state;
}
