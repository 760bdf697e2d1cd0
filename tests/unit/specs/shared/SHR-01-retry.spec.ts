/**
 * SHR-01: DynamoDB Retry
 */

import { describe, it, expect, vi } from 'vitest';
import { storage } from '@openid-provider/shared';

const FAST = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 };

function throttled(): Error {
  const err = new Error('Rate exceeded');
  err.name = 'ProvisionedThroughputExceededException';
  return err;
}

describe('SHR-01: DynamoDB Retry', () => {
  describe('isRetryableError', () => {
    it('should retry throttling errors by name', () => {
      expect(storage.isRetryableError(throttled())).toBe(true);
    });

    it('should retry 5xx responses by status code', () => {
      expect(storage.isRetryableError({ name: 'Unknown', $metadata: { httpStatusCode: 503 } })).toBe(true);
    });

    it('should not retry client errors', () => {
      const err = new Error('The conditional request failed');
      err.name = 'ConditionalCheckFailedException';

      expect(storage.isRetryableError(err)).toBe(false);
      expect(storage.isRetryableError({ $metadata: { httpStatusCode: 400 } })).toBe(false);
      expect(storage.isRetryableError(undefined)).toBe(false);
    });
  });

  describe('withRetry', () => {
    it('should retry a transient failure until it succeeds', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(throttled())
        .mockResolvedValueOnce('ok');

      await expect(storage.withRetry(operation, FAST)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should give up after maxRetries', async () => {
      const operation = vi.fn().mockRejectedValue(throttled());

      await expect(storage.withRetry(operation, FAST)).rejects.toThrow('Rate exceeded');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should not retry a permanent failure', async () => {
      const operation = vi.fn().mockRejectedValue(new Error('ValidationException'));

      await expect(storage.withRetry(operation, FAST)).rejects.toThrow('ValidationException');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('calculateDelay', () => {
    it('should stay below the capped exponential delay', () => {
      const config = { maxRetries: 5, baseDelayMs: 100, maxDelayMs: 300 };

      for (let attempt = 0; attempt < 5; attempt++) {
        const delay = storage.calculateDelay(attempt, config);
        expect(delay).toBeGreaterThanOrEqual(0);
        expect(delay).toBeLessThan(Math.min(100 * 2 ** attempt, 300));
      }
    });
  });
});
