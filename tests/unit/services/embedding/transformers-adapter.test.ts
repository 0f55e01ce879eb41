/**
 * Unit tests for the local transformers adapter
 */

import { describe, it, expect } from 'vitest';
import { TransformersEmbeddingAdapter, tensorToRows } from '../../../../src/services/embedding/transformers-adapter.js';

describe('tensorToRows', () => {
  it('should split a [batch, dim] tensor into rows by offset', () => {
    const output = { data: new Float32Array([1, 2, 3, 4, 5, 6]), dims: [2, 3] };

    expect(tensorToRows(output, 2)._unsafeUnwrap()).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('should reject dims that disagree with the input count', () => {
    const output = { data: new Float32Array([1, 2]), dims: [1, 2] };

    expect(tensorToRows(output, 2)._unsafeUnwrapErr().message).toBe('Pipeline returned dims [1, 2] for 2 inputs');
  });

  it('should reject data shorter than its dims', () => {
    const output = { data: new Float32Array([1, 2, 3]), dims: [2, 2] };

    expect(tensorToRows(output, 2)._unsafeUnwrapErr().message).toBe('Pipeline returned 3 values for dims [2, 2]');
  });

  it('should reject outputs that are not tensors', () => {
    expect(tensorToRows([[1, 2]], 1).isErr()).toBe(true);
  });
});

describe('TransformersEmbeddingAdapter', () => {
  it('should name the weight precision in its model identifier', () => {
    const quantized = new TransformersEmbeddingAdapter({ type: 'transformers', model: 'Xenova/bge-small-en-v1.5', quantized: true });
    const full = new TransformersEmbeddingAdapter({ type: 'transformers', model: 'Xenova/bge-small-en-v1.5', quantized: false });

    expect(quantized.modelIdentifier).toBe('transformers:Xenova/bge-small-en-v1.5:q8:mean:normalized');
    expect(full.modelIdentifier).toBe('transformers:Xenova/bge-small-en-v1.5:fp32:mean:normalized');
    expect(quantized.dimension()).toBeUndefined();
  });
});
