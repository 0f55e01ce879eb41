/**
 * Unit tests for CacheManager load-or-rebuild decisions
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { CacheManager, type CacheManagerOptions } from '../../../../src/services/cache/CacheManager.js';
import { MetadataStore } from '../../../../src/services/cache/MetadataStore.js';
import { VectorIndex } from '../../../../src/services/vector-index/VectorIndex.js';
import {
  StaticCorpusSupplier,
  exampleQueryCollection,
} from '../../../../src/services/corpus/CorpusSupplier.js';
import { ExampleQueryFileSupplier } from '../../../../src/services/corpus/file-suppliers.js';
import { CorpusLoadError } from '../../../../src/lib/errors/EngineErrors.js';
import type { IEmbeddingAdapter } from '../../../../src/services/embedding/adapter-interface.js';
import type { ExampleQuery } from '../../../../src/models/ExampleQuery.js';
import type { Logger } from '../../../../src/lib/logger.js';
import {
  CountingAdapter,
  FailingAdapter,
  NO_RETRY,
  createSilentLogger,
  createTempDir,
} from '../../../helpers/engine-test-helper.js';

const QUERIES: Record<string, ExampleQuery> = {
  clicks: { description: 'Clicks per campaign last week', query: 'SELECT metrics.clicks FROM campaign' },
  spend: { description: 'Cost of each ad group', query: 'SELECT metrics.cost_micros FROM ad_group' },
  keywords: { description: 'Keywords with the most impressions', query: 'SELECT ad_group_criterion.keyword.text FROM keyword_view' },
};

describe('CacheManager', () => {
  let dir: ReturnType<typeof createTempDir>;
  let store: MetadataStore;
  let index: VectorIndex;
  let supplier: StaticCorpusSupplier<ExampleQuery>;
  let logger: Logger;
  let spy: MockInstance<Logger['logCacheEvent']>;
  const managers: CacheManager[] = [];

  beforeEach(() => {
    dir = createTempDir();
    logger = createSilentLogger();
    spy = vi.spyOn(logger, 'logCacheEvent');
    store = new MetadataStore(dir.path);
    index = new VectorIndex(store, { logger });
    supplier = new StaticCorpusSupplier<ExampleQuery>(QUERIES);
  });

  afterEach(() => {
    for (const manager of managers.splice(0)) {
      manager.close();
    }
    dir.cleanup();
  });

  function createManager(adapter: IEmbeddingAdapter, options: CacheManagerOptions = {}): CacheManager {
    const manager = new CacheManager(exampleQueryCollection(supplier), adapter, index, {
      logger,
      retry: NO_RETRY,
      ...options,
    });
    managers.push(manager);
    return manager;
  }

  function cacheEvents(): Array<[string, string]> {
    return spy.mock.calls.map(([, event, reason]): [string, string] => [event, reason]);
  }

  describe('ensureReady', () => {
    it('should build a missing snapshot', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);

      const handle = (await manager.ensureReady())._unsafeUnwrap();

      expect(handle.documentCount).toBe(3);
      expect(manager.state).toBe('ready');
      expect(adapter.textsEmbedded).toBe(3);
      expect(manager.lastRebuild?.reason).toBe('missing');
      expect(manager.lastRebuild?.providerCalls).toBe(1);
      expect(cacheEvents()).toEqual([
        ['rebuild_started', 'missing'],
        ['rebuild_completed', 'missing'],
      ]);
    });

    it('should embed documents in id order', async () => {
      const adapter = new CountingAdapter();
      await createManager(adapter).ensureReady();

      expect(adapter.batches).toEqual([
        [QUERIES.clicks?.description, QUERIES.keywords?.description, QUERIES.spend?.description],
      ]);
    });

    it('should reuse the open snapshot while the corpus is unchanged', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      const first = (await manager.ensureReady())._unsafeUnwrap();
      adapter.reset();
      spy.mockClear();

      const second = (await manager.ensureReady())._unsafeUnwrap();

      expect(second).toBe(first);
      expect(adapter.calls).toBe(0);
      expect(cacheEvents()).toEqual([]);
    });

    it('should open a valid snapshot without embedding', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      spy.mockClear();

      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      const handle = (await manager.ensureReady())._unsafeUnwrap();

      expect(handle.documentCount).toBe(3);
      expect(adapter.calls).toBe(0);
      expect(manager.lastRebuild).toBeNull();
      expect(cacheEvents()).toEqual([['validated', 'none']]);
    });

    it('should rebuild when the corpus changes', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      await manager.ensureReady();
      spy.mockClear();

      supplier.replace({
        ...QUERIES,
        ctr: { description: 'Click-through rate by device', query: 'SELECT metrics.ctr FROM campaign' },
      });
      const handle = (await manager.ensureReady())._unsafeUnwrap();

      expect(handle.documentCount).toBe(4);
      expect(cacheEvents()).toEqual([
        ['rebuild_started', 'fingerprint_mismatch'],
        ['rebuild_completed', 'fingerprint_mismatch'],
      ]);
    });

    it('should rebuild when a document is removed', async () => {
      const manager = createManager(new CountingAdapter());
      await manager.ensureReady();
      spy.mockClear();

      supplier.replace(Object.fromEntries(Object.entries(QUERIES).filter(([key]) => key !== 'keywords')));
      const handle = (await manager.ensureReady())._unsafeUnwrap();

      expect(handle.documentCount).toBe(2);
      expect(cacheEvents()).toEqual([
        ['rebuild_started', 'fingerprint_mismatch'],
        ['rebuild_completed', 'fingerprint_mismatch'],
      ]);
      expect(store.read('example_queries')._unsafeUnwrap().documentCount).toBe(2);
    });

    it('should rebuild when a description is edited', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      const before = (await manager.ensureReady())._unsafeUnwrap();
      const snapshotBefore = store.read('example_queries')._unsafeUnwrap().snapshotFile;
      adapter.reset();
      spy.mockClear();

      supplier.replace({
        ...QUERIES,
        spend: { description: 'Daily cost of each ad group', query: 'SELECT metrics.cost_micros FROM ad_group' },
      });
      const after = (await manager.ensureReady())._unsafeUnwrap();

      expect(after).not.toBe(before);
      expect(after.documentCount).toBe(3);
      expect(adapter.textsEmbedded).toBe(3);
      expect(cacheEvents()[0]).toEqual(['rebuild_started', 'fingerprint_mismatch']);
      expect(store.read('example_queries')._unsafeUnwrap().snapshotFile).not.toBe(snapshotBefore);
    });

    it('should rebuild when the model changes', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      spy.mockClear();

      await createManager(new CountingAdapter(64, { modelTag: 'v2' })).ensureReady();

      expect(cacheEvents()[0]).toEqual(['rebuild_started', 'model_changed']);
      expect(store.read('example_queries')._unsafeUnwrap().modelId).toBe('hashing:xxh64-bow:64:v2');
    });

    it('should rebuild when the schema version changes', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      spy.mockClear();

      await createManager(new CountingAdapter(), { schemaVersion: 2 }).ensureReady();

      expect(cacheEvents()[0]).toEqual(['rebuild_started', 'schema_version_changed']);
      expect(store.read('example_queries')._unsafeUnwrap().fingerprint.startsWith('v2\n')).toBe(true);
    });

    it('should rebuild over an unreadable metadata record', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      writeFileSync(store.metadataPath('example_queries'), '{ not json');
      spy.mockClear();

      const handle = await createManager(new CountingAdapter()).ensureReady();

      expect(handle.isOk()).toBe(true);
      expect(cacheEvents()[0]).toEqual(['rebuild_started', 'corrupt']);
    });

    it('should rebuild when the current snapshot file is damaged', async () => {
      const first = createManager(new CountingAdapter());
      await first.ensureReady();
      first.close();
      const metadata = store.read('example_queries')._unsafeUnwrap();
      writeFileSync(join(store.collectionDir('example_queries'), metadata.snapshotFile), 'garbage');
      spy.mockClear();

      const handle = await createManager(new CountingAdapter()).ensureReady();

      expect(handle.isOk()).toBe(true);
      expect(cacheEvents()[0]).toEqual(['rebuild_started', 'corrupt']);
    });

    it('should rebuild a valid snapshot when forced', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      await manager.ensureReady();
      adapter.reset();

      await manager.ensureReady({ force: true });

      expect(adapter.textsEmbedded).toBe(3);
      expect(manager.lastRebuild?.reason).toBe('forced');
    });

    it('should share one rebuild between concurrent callers', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);

      const [a, b] = await Promise.all([manager.ensureReady(), manager.ensureReady()]);

      expect(a._unsafeUnwrap()).toBe(b._unsafeUnwrap());
      expect(adapter.calls).toBe(1);
      expect(cacheEvents().filter(([event]) => event === 'rebuild_started')).toHaveLength(1);
    });

    it('should share one forced rebuild between concurrent forced callers', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      await manager.ensureReady();
      adapter.reset();
      spy.mockClear();

      const [a, b] = await Promise.all([
        manager.ensureReady({ force: true }),
        manager.ensureReady({ force: true }),
      ]);

      expect(a._unsafeUnwrap()).toBe(b._unsafeUnwrap());
      expect(adapter.textsEmbedded).toBe(3);
      expect(cacheEvents()).toEqual([
        ['rebuild_started', 'forced'],
        ['rebuild_completed', 'forced'],
      ]);
    });

    it('should run a forced rebuild after an unforced one in flight', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);

      const results = await Promise.all([
        manager.ensureReady(),
        manager.ensureReady({ force: true }),
        manager.ensureReady({ force: true }),
      ]);

      expect(results.every((result) => result.isOk())).toBe(true);
      expect(adapter.textsEmbedded).toBe(6);
      expect(cacheEvents()).toEqual([
        ['rebuild_started', 'missing'],
        ['rebuild_completed', 'missing'],
        ['rebuild_started', 'forced'],
        ['rebuild_completed', 'forced'],
      ]);
      expect(results[1]?._unsafeUnwrap()).toBe(results[2]?._unsafeUnwrap());
    });

    it('should keep the previous snapshot current when a rebuild fails', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      const before = store.read('example_queries')._unsafeUnwrap();
      spy.mockClear();

      const failing = createManager(new FailingAdapter());
      const result = await failing.ensureReady();

      expect(result.isErr()).toBe(true);
      expect(cacheEvents()).toEqual([
        ['rebuild_started', 'model_changed'],
        ['rebuild_failed', 'model_changed'],
      ]);
      expect(store.read('example_queries')._unsafeUnwrap()).toEqual(before);
      expect(failing.state).toBe('stale');
    });

    it('should surface corpus load failures', async () => {
      const manager = new CacheManager(
        exampleQueryCollection(new ExampleQueryFileSupplier(join(dir.path, 'absent.json'))),
        new CountingAdapter(),
        index,
        { logger }
      );
      managers.push(manager);

      const result = await manager.ensureReady();

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(CorpusLoadError);
      expect(manager.state).toBe('unknown');
    });
  });

  describe('status', () => {
    it('should report a missing snapshot', async () => {
      const status = (await createManager(new CountingAdapter()).status())._unsafeUnwrap();

      expect(status).toEqual({
        collection: 'example_queries',
        state: 'missing',
        reason: 'missing',
        documentCount: null,
        createdAt: null,
        modelId: null,
        corpusSize: 3,
      });
    });

    it('should report a valid snapshot without embedding', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      const adapter = new CountingAdapter();

      const status = (await createManager(adapter).status())._unsafeUnwrap();

      expect(status.state).toBe('valid');
      expect(status.documentCount).toBe(3);
      expect(status.modelId).toBe('hashing:xxh64-bow:64');
      expect(adapter.calls).toBe(0);
    });

    it('should report a record whose fingerprint does not parse as corrupt', async () => {
      await createManager(new CountingAdapter()).ensureReady();
      const metadata = store.read('example_queries')._unsafeUnwrap();
      store.write('example_queries', { ...metadata, fingerprint: 'not a fingerprint' })._unsafeUnwrap();
      spy.mockClear();

      const manager = createManager(new CountingAdapter());
      const status = (await manager.status())._unsafeUnwrap();
      await manager.ensureReady();

      expect(status.state).toBe('corrupt');
      expect(status.documentCount).toBeNull();
      expect(cacheEvents()[0]).toEqual(['rebuild_started', 'corrupt']);
    });

    it('should report a dimension change for the same model', async () => {
      await createManager(new CountingAdapter()).ensureReady();

      const status = (await createManager(new FailingAdapter('hashing:xxh64-bow:64', 32)).status())._unsafeUnwrap();

      expect(status.state).toBe('stale');
      expect(status.reason).toBe('dimension_mismatch');
    });
  });

  describe('clear', () => {
    it('should delete the snapshot so the next call rebuilds', async () => {
      const adapter = new CountingAdapter();
      const manager = createManager(adapter);
      await manager.ensureReady();

      expect((await manager.clear())._unsafeUnwrap()).toBe(true);
      expect((await manager.status())._unsafeUnwrap().state).toBe('missing');

      await manager.ensureReady();
      expect(manager.lastRebuild?.reason).toBe('missing');
    });

    it('should report when there was nothing to clear', async () => {
      const manager = createManager(new CountingAdapter());

      expect((await manager.clear())._unsafeUnwrap()).toBe(false);
      expect(cacheEvents()).toEqual([['cleared', 'forced']]);
    });
  });
});
