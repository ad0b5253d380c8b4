import type { BatchStatus } from '../model/BatchStatus.js';

/** Stable machine-readable codes carried by every SDK error. */
export type AepErrorCode =
  | 'VALIDATION'
  | 'SERVICE'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'SERVER'
  | 'NETWORK'
  | 'TIMEOUT';

/** Base class for all errors raised by the SDK. */
export class AepError extends Error {
  readonly code: AepErrorCode;

  constructor(message: string, code: AepErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AepError';
    this.code = code;
  }
}

/** Bad local input: an empty file, an unknown format, a malformed option. Never retried. */
export class ValidationError extends AepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'VALIDATION', options);
    this.name = 'ValidationError';
  }
}

/** Where the failing request went. `status` is `0` when no HTTP response was received. */
export interface ServiceErrorDetails {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  /** Parsed remote error body (JSON object or text), when the service sent one. */
  readonly body?: unknown;
}

/** A request to the platform returned a non-2xx response. */
export class ServiceError extends AepError {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  readonly body: unknown;

  constructor(message: string, details: ServiceErrorDetails, code: AepErrorCode = 'SERVICE', options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'ServiceError';
    this.status = details.status;
    this.method = details.method;
    this.path = details.path;
    this.body = details.body;
  }
}

/** 404 from the platform, or a local file that does not exist (status `0`). */
export class NotFoundError extends ServiceError {
  constructor(message: string, details: ServiceErrorDetails, options?: { cause?: unknown }) {
    super(message, details, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/** 429 from the platform. Retried with backoff. */
export class RateLimitError extends ServiceError {
  constructor(message: string, details: ServiceErrorDetails) {
    super(message, details, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

/** 5xx from the platform. Retried with backoff. */
export class ServerError extends ServiceError {
  constructor(message: string, details: ServiceErrorDetails) {
    super(message, details, 'SERVER');
    this.name = 'ServerError';
  }
}

/** The request never produced a response (DNS, reset connection, request timeout). Retried with backoff. */
export class NetworkError extends ServiceError {
  constructor(message: string, details: Omit<ServiceErrorDetails, 'status' | 'body'>, cause: unknown) {
    super(message, { ...details, status: 0 }, 'NETWORK', { cause });
    this.name = 'NetworkError';
  }
}

/** A batch did not reach a terminal status before the polling deadline. */
export class TimeoutError extends AepError {
  readonly batchId: string;
  readonly lastStatus: BatchStatus | undefined;
  readonly timeoutMs: number;

  constructor(batchId: string, timeoutMs: number, lastStatus: BatchStatus | undefined) {
    super(
      `Batch ${batchId} did not reach a terminal status within ${String(timeoutMs)}ms (last status: ${lastStatus ?? 'unknown'})`,
      'TIMEOUT',
    );
    this.name = 'TimeoutError';
    this.batchId = batchId;
    this.timeoutMs = timeoutMs;
    this.lastStatus = lastStatus;
  }
}

/** Whether a failed request may succeed if sent again. */
export function isRetryable(error: unknown): boolean {
  return error instanceof RateLimitError || error instanceof ServerError || error instanceof NetworkError;
}

/** Human readable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
