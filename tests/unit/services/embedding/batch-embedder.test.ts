/**
 * Unit tests for batch embedding
 */

import { describe, it, expect } from 'vitest';
import { Result, ok, err } from '../../../../src/lib/result-types.js';
import { createRetryConfig } from '../../../../src/lib/retry-utils.js';
import { DimensionMismatchError, ProviderFailureError } from '../../../../src/lib/errors/EngineErrors.js';
import { chunk, embedInBatches, validateVectors } from '../../../../src/services/embedding/batch-embedder.js';
import {
  AdapterError,
  AdapterNetworkError,
  type EmbeddingBatch,
} from '../../../../src/services/embedding/adapter-interface.js';
import {
  CountingAdapter,
  FailingAdapter,
  NO_RETRY,
  createSilentLogger,
} from '../../../helpers/engine-test-helper.js';

const logger = createSilentLogger();
const batching = { batchSize: 2, concurrency: 2, timeoutMs: 5000 };

/**
 * Counting adapter that yields to the event loop and tracks calls in flight
 */
class SlowAdapter extends CountingAdapter {
  inFlight = 0;
  maxInFlight = 0;

  override async embed(texts: string[]): Promise<Result<EmbeddingBatch, AdapterError>> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight--;
    return super.embed(texts);
  }
}

/**
 * Fails with a network error a fixed number of times, then succeeds
 */
class FlakyAdapter extends CountingAdapter {
  attempts = 0;

  constructor(private failuresLeft: number) {
    super(8);
  }

  override async embed(texts: string[]): Promise<Result<EmbeddingBatch, AdapterError>> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      return err(new AdapterNetworkError('reset'));
    }
    return super.embed(texts);
  }
}

/**
 * Returns one vector whatever the batch size
 */
class ShortAdapter extends CountingAdapter {
  override async embed(texts: string[]): Promise<Result<EmbeddingBatch, AdapterError>> {
    return ok({ vectors: [this.vectorize(texts[0] ?? '')], stats: { totalTexts: 1, durationMs: 0 } });
  }
}

describe('batch embedder', () => {
  describe('chunk', () => {
    it('should split into consecutive chunks', () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    });
  });

  describe('validateVectors', () => {
    it('should return the common width', () => {
      const result = validateVectors([[1, 0], [0, 1]], 2);
      expect(result.isOk() && result.value).toBe(2);
    });

    it('should accept an empty batch', () => {
      const result = validateVectors([], 0);
      expect(result.isOk() && result.value).toBe(0);
    });

    it('should flag a width disagreement as a dimension mismatch', () => {
      const result = validateVectors([[1, 0, 0], [1, 0]], 2);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(DimensionMismatchError);
        expect(result.error.message).toBe('Dimension mismatch: expected 3, got 2 (vector 1)');
      }
    });

    it('should reject a wrong vector count', () => {
      const result = validateVectors([[1]], 2);
      expect(result.isErr() && result.error).toBeInstanceOf(ProviderFailureError);
    });

    it('should reject non-finite values', () => {
      const result = validateVectors([[1, Number.NaN]], 1);
      expect(result.isErr() && result.error).toBeInstanceOf(ProviderFailureError);
    });
  });

  describe('embedInBatches', () => {
    it('should embed every text in input order', async () => {
      const adapter = new CountingAdapter(16);
      const texts = ['one', 'two', 'three', 'four', 'five'];

      const result = await embedInBatches(adapter, texts, { ...batching, logger });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.vectors).toEqual(texts.map((t) => adapter.vectorize(t)));
        expect(result.value.dimension).toBe(16);
        expect(result.value.calls).toBe(3);
      }
      expect(adapter.batches.map((b) => b.length).sort()).toEqual([1, 2, 2]);
    });

    it('should not call the provider for an empty corpus', async () => {
      const adapter = new CountingAdapter(16);
      const result = await embedInBatches(adapter, [], { ...batching, logger });

      expect(result.isOk() && result.value).toEqual({ vectors: [], dimension: 0, calls: 0 });
      expect(adapter.calls).toBe(0);
    });

    it('should cap batches at the adapter maximum', async () => {
      const adapter = new CountingAdapter(8, { maxBatchSize: 1 });
      await embedInBatches(adapter, ['a', 'b', 'c'], { ...batching, batchSize: 10, logger });

      expect(adapter.calls).toBe(3);
    });

    it('should bound calls in flight by the concurrency setting', async () => {
      const adapter = new SlowAdapter(8);
      const texts = Array.from({ length: 12 }, (_, i) => `text ${i}`);
      await embedInBatches(adapter, texts, { batchSize: 2, concurrency: 3, timeoutMs: 5000, logger });

      expect(adapter.calls).toBe(6);
      expect(adapter.maxInFlight).toBe(3);
    });

    it('should run one call at a time for non-concurrent adapters', async () => {
      const adapter = new SlowAdapter(8, { concurrent: false });
      const texts = Array.from({ length: 6 }, (_, i) => `text ${i}`);
      await embedInBatches(adapter, texts, { batchSize: 2, concurrency: 4, timeoutMs: 5000, logger });

      expect(adapter.maxInFlight).toBe(1);
    });

    it('should wrap provider failures', async () => {
      const adapter = new FailingAdapter();
      const result = await embedInBatches(adapter, ['a', 'b', 'c'], {
        batchSize: 1,
        concurrency: 1,
        timeoutMs: 5000,
        retry: NO_RETRY,
        logger,
      });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(ProviderFailureError);
        expect(result.error.retryable).toBe(true);
      }
      expect(adapter.calls).toBe(1);
    });

    it('should retry transient failures', async () => {
      const adapter = new FlakyAdapter(1);

      const result = await embedInBatches(adapter, ['a'], {
        ...batching,
        retry: createRetryConfig({ maxRetries: 2, initialDelayMs: 1 }),
        logger,
      });

      expect(result.isOk() && result.value.calls).toBe(2);
      expect(adapter.attempts).toBe(2);
      expect(adapter.calls).toBe(1);
    });

    it('should reject a batch with too few vectors', async () => {
      const result = await embedInBatches(new ShortAdapter(8), ['a', 'b'], { ...batching, logger });
      expect(result.isErr() && result.error).toBeInstanceOf(ProviderFailureError);
    });
  });
});
