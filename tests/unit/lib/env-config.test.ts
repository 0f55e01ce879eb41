/**
 * Unit tests for runtime configuration
 */

import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  ConfigError,
  ConfigurationManager,
  describeEmbeddingConfig,
  loadRuntimeConfig,
  maskApiKey,
} from '../../../src/lib/env-config.js';
import { createTempDir } from '../../helpers/engine-test-helper.js';

function configFrom(env: Record<string, string>) {
  return new ConfigurationManager(env).getRuntimeConfig();
}

describe('ConfigurationManager', () => {
  it('should apply defaults to an empty environment', () => {
    const result = configFrom({});

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.cacheDir).toBe('.qctx/cache');
      expect(result.value.logDir).toBe('.qctx/logs');
      expect(result.value.logLevel).toBe('warn');
      expect(result.value.embedding).toEqual({
        type: 'transformers',
        model: 'Xenova/bge-small-en-v1.5',
        quantized: true,
        modelCacheDir: undefined,
      });
      expect(result.value.batching).toEqual({ batchSize: 64, concurrency: 4, timeoutMs: 30000 });
      expect(result.value.retrieval.minScore).toBe(0);
      expect(result.value.ann).toEqual({ minCardinality: 256, nprobe: 8 });
      expect(result.value.corpus.fieldMetadataMaxAgeDays).toBe(7);
    }
  });

  it('should coerce numeric settings', () => {
    const result = configFrom({
      QCTX_EMBED_TYPE: 'hashing',
      QCTX_EMBED_DIMENSIONS: '256',
      QCTX_MIN_SCORE: '0.25',
      QCTX_ANN_MIN_CARDINALITY: '1000',
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.embedding).toEqual({ type: 'hashing', dimensions: 256 });
      expect(result.value.retrieval.minScore).toBe(0.25);
      expect(result.value.ann.minCardinality).toBe(1000);
    }
  });

  it('should treat blank values as unset', () => {
    const result = configFrom({ QCTX_CACHE_DIR: '   ', QCTX_EMBED_BATCH_SIZE: '' });

    expect(result.isOk() && result.value.cacheDir).toBe('.qctx/cache');
    expect(result.isOk() && result.value.batching.batchSize).toBe(64);
  });

  it('should name the offending variable', () => {
    const result = configFrom({ QCTX_EMBED_BATCH_SIZE: '-5' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe('Invalid QCTX_EMBED_BATCH_SIZE: Number must be greater than 0');
    }
  });

  it('should reject a minimum score outside the similarity range', () => {
    expect(configFrom({ QCTX_MIN_SCORE: '1.5' }).isErr()).toBe(true);
  });

  describe('hosted adapter', () => {
    const hosted = {
      QCTX_EMBED_TYPE: 'hosted',
      QCTX_EMBED_ENDPOINT: 'https://embeddings.example.test/v1',
      QCTX_EMBED_API_KEY: 'test-secret',
      QCTX_EMBED_MODEL: 'text-embed-small',
    };

    it('should build a hosted config', () => {
      const result = configFrom(hosted);

      expect(result.isOk() && result.value.embedding).toEqual({
        type: 'hosted',
        endpoint: 'https://embeddings.example.test/v1',
        apiKey: 'test-secret',
        model: 'text-embed-small',
        timeoutMs: 30000,
      });
    });

    it('should require an API key', () => {
      const { QCTX_EMBED_API_KEY: _omitted, ...rest } = hosted;
      const result = configFrom(rest);

      expect(result.isErr() && result.error.message).toBe(
        'Missing required config: QCTX_EMBED_API_KEY. Set this environment variable or add it to your .env file.'
      );
    });

    it('should require a model', () => {
      const { QCTX_EMBED_MODEL: _omitted, ...rest } = hosted;
      const result = configFrom(rest);

      expect(result.isErr() && result.error.message).toBe('Missing required config: QCTX_EMBED_MODEL');
    });
  });

  describe('loadRuntimeConfig', () => {
    let cleanup: (() => void) | undefined;

    afterEach(() => {
      cleanup?.();
      cleanup = undefined;
    });

    it('should read settings from a .env file without overriding the environment', () => {
      const dir = createTempDir();
      cleanup = dir.cleanup;
      const envPath = join(dir.path, '.env');
      writeFileSync(envPath, 'QCTX_EMBED_TYPE=hashing\nQCTX_EMBED_DIMENSIONS=48\nQCTX_CACHE_DIR=/from-file\n');

      const env: Record<string, string> = { QCTX_CACHE_DIR: '/from-env' };
      const result = loadRuntimeConfig(env, envPath);

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.embedding).toEqual({ type: 'hashing', dimensions: 48 });
        expect(result.value.cacheDir).toBe('/from-env');
      }
    });
  });
});

describe('maskApiKey', () => {
  it('should show only the last four characters', () => {
    expect(maskApiKey('test-secret')).toBe('****cret');
    expect(maskApiKey('abc')).toBe('****');
  });
});

describe('describeEmbeddingConfig', () => {
  it('should mask the key of a hosted configuration', () => {
    expect(
      describeEmbeddingConfig({
        type: 'hosted',
        endpoint: 'https://embeddings.test/v1',
        apiKey: 'test-secret',
        model: 'embed-small',
        timeoutMs: 1000,
      })
    ).toEqual({
      type: 'hosted',
      endpoint: 'https://embeddings.test/v1',
      apiKey: '****cret',
      model: 'embed-small',
      timeoutMs: 1000,
    });
  });

  it('should pass other configurations through', () => {
    expect(describeEmbeddingConfig({ type: 'hashing', dimensions: 256 })).toEqual({ type: 'hashing', dimensions: 256 });
  });
});
