/**
 * Unit tests for retry and timeout helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { Result, ok, err } from '../../../src/lib/result-types.js';
import { createRetryConfig, withRetry, withTimeout, DEFAULT_RETRY_CONFIG } from '../../../src/lib/retry-utils.js';
import {
  AdapterError,
  AdapterNetworkError,
  AdapterRateLimitError,
  AdapterTimeoutError,
  AdapterValidationError,
} from '../../../src/services/embedding/adapter-interface.js';
import { createSilentLogger } from '../../helpers/engine-test-helper.js';

const logger = createSilentLogger();
const fast = createRetryConfig({ maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5 });

function sequence(...results: Array<Result<string, AdapterError>>): { fn: () => Promise<Result<string, AdapterError>>; calls: () => number } {
  let index = 0;
  return {
    fn: async () => {
      const result = results[Math.min(index, results.length - 1)] ?? ok('done');
      index++;
      return result;
    },
    calls: () => index,
  };
}

describe('retry-utils', () => {
  describe('createRetryConfig', () => {
    it('should keep defaults for fields not overridden', () => {
      const config = createRetryConfig({ maxRetries: 0 });
      expect(config.maxRetries).toBe(0);
      expect(config.retryableErrors).toEqual(DEFAULT_RETRY_CONFIG.retryableErrors);
    });
  });

  describe('withRetry', () => {
    it('should return the first success', async () => {
      const { fn, calls } = sequence(err(new AdapterNetworkError('reset')), ok('done'));
      const result = await withRetry(fn, fast, logger);

      expect(result.isOk() && result.value).toBe('done');
      expect(calls()).toBe(2);
    });

    it('should give up after the configured retries', async () => {
      const { fn, calls } = sequence(err(new AdapterNetworkError('reset')));
      const result = await withRetry(fn, fast, logger);

      expect(result.isErr() && result.error.code).toBe('ADAPTER_NETWORK_ERROR');
      expect(calls()).toBe(3);
    });

    it('should not retry non-retryable errors', async () => {
      const { fn, calls } = sequence(err(new AdapterValidationError('bad input')));
      const result = await withRetry(fn, fast, logger);

      expect(result.isErr() && result.error.code).toBe('ADAPTER_VALIDATION_ERROR');
      expect(calls()).toBe(1);
    });

    it('should not retry codes missing from the retryable list', async () => {
      const { fn, calls } = sequence(err(new AdapterNetworkError('reset')));
      const config = createRetryConfig({ initialDelayMs: 1, retryableErrors: ['ADAPTER_TIMEOUT'] });
      await withRetry(fn, config, logger);

      expect(calls()).toBe(1);
    });

    it('should honour a rate limit hint', async () => {
      const { fn, calls } = sequence(err(new AdapterRateLimitError('slow down', 2)), ok('done'));
      const result = await withRetry(fn, createRetryConfig({ initialDelayMs: 60000 }), logger);

      expect(result.isOk()).toBe(true);
      expect(calls()).toBe(2);
    });

    it('should cap a rate limit hint at the maximum delay', async () => {
      const { fn } = sequence(err(new AdapterRateLimitError('slow down', 60000)), ok('done'));
      const debug = vi.spyOn(logger, 'debug');

      const result = await withRetry(fn, fast, logger);

      expect(result.isOk()).toBe(true);
      expect(debug).toHaveBeenCalledWith('Retrying embedding call', {
        attempt: 1,
        maxRetries: 2,
        delayMs: 5,
        code: 'ADAPTER_RATE_LIMIT',
      });
      debug.mockRestore();
    });
  });

  describe('withTimeout', () => {
    it('should pass through results that beat the deadline', async () => {
      const result = await withTimeout(async () => ok(1), 1000, 'fast call');
      expect(result.isOk() && result.value).toBe(1);
    });

    it('should fail with a timeout error and abort the signal', async () => {
      const seen: { signal?: AbortSignal } = {};
      const result = await withTimeout<number>(
        (signal) => {
          seen.signal = signal;
          return new Promise(() => {});
        },
        10,
        'Slow call'
      );

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(AdapterTimeoutError);
        expect(result.error.message).toBe('Slow call timed out after 10ms');
      }
      expect(seen.signal?.aborted).toBe(true);
    });
  });
});
