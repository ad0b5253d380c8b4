/** Retry settings shared by every platform request. */
export interface RetryPolicy {
  /** Requests sent in total, the first one included. Default: `5`. */
  readonly maxAttempts: number;
  /** Delay before the first retry; doubles on each following retry. Default: `1000`. */
  readonly retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  retryDelayMs: 1000,
};

/**
 * Delay before retry number `retry` (1-based): `retryDelayMs * 2^(retry - 1)`.
 * With a 1000 ms base this yields 1s, 2s, 4s, 8s, 16s.
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return policy.retryDelayMs * Math.pow(2, retry - 1);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
