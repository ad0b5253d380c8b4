import { describe, it, expect } from 'vitest';
import { DEFAULT_RETRY_POLICY, backoffDelay } from '../../../src/domain/services/Backoff.js';

describe('backoffDelay', () => {
  it('should double the delay on each retry with the default policy', () => {
    const delays = [1, 2, 3, 4, 5].map((retry) => backoffDelay(DEFAULT_RETRY_POLICY, retry));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000]);
  });

  it('should scale from the configured base delay', () => {
    expect(backoffDelay({ maxAttempts: 3, retryDelayMs: 50 }, 3)).toBe(200);
  });

  it('should allow five attempts by default', () => {
    expect(DEFAULT_RETRY_POLICY.maxAttempts).toBe(5);
  });
});
