import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ModelFetchError, removeDir, setLogLevel, LogLevel } from '@stagecraft/core';
import { FsModelCache } from '../models/modelCache.js';
import { modelCacheKey } from '../models/modelPlan.js';
import { FakeFetcher, NO_DELAY_RETRY, makeTempDir, modelRequest } from './helpers.js';

setLogLevel(LogLevel.Error);

describe('FsModelCache', () => {
  let root: string;
  let fetcher: FakeFetcher;
  let cache: FsModelCache;
  const embedding = modelRequest('embedding', 'org/embed');

  beforeEach(async () => {
    root = await makeTempDir('model-cache');
    fetcher = new FakeFetcher();
    cache = new FsModelCache({ root, fetcher, retry: NO_DELAY_RETRY });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should fetch once and reuse the entry afterwards', async () => {
    const first = await cache.materialize(embedding);
    const second = await cache.materialize(embedding);

    expect(first.fetched).toBe(true);
    expect(second.fetched).toBe(false);
    expect(second.entry.digest).toBe(first.entry.digest);
    expect(fetcher.calls).toEqual(['embedding:org/embed']);
    expect(await fs.readFile(path.join(first.entry.path, 'snapshots', 'weights.bin'), 'utf-8')).toBe(
      'embedding:org/embed:float32'
    );
    expect(first.entry.key).toBe(modelCacheKey(embedding));
  });

  it('should share one fetch between concurrent requests', async () => {
    const [a, b] = await Promise.all([cache.materialize(embedding), cache.materialize(embedding)]);

    expect(a).toEqual(b);
    expect(fetcher.calls).toHaveLength(1);
  });

  it('should discard a corrupted entry and fetch again', async () => {
    const { entry } = await cache.materialize(embedding);
    await fs.writeFile(path.join(entry.path, 'snapshots', 'weights.bin'), 'truncated');

    expect(await cache.lookup(embedding)).toBeNull();
    const again = await cache.materialize(embedding);

    expect(again.fetched).toBe(true);
    expect(again.entry.digest).toBe(entry.digest);
    expect(fetcher.calls).toHaveLength(2);
  });

  it('should retry transient failures', async () => {
    fetcher.script('embedding:org/embed', new Error('connection reset'));

    const result = await cache.materialize(embedding);

    expect(result.fetched).toBe(true);
    expect(fetcher.calls).toHaveLength(2);
  });

  it('should raise ModelFetchError once retries are spent', async () => {
    fetcher.fail('embedding:org/embed', new Error('connection reset'));

    const failure = await cache.materialize(embedding).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ModelFetchError);
    expect(failure).toMatchObject({
      code: 'MODEL.FETCH',
      kind: 'embedding',
      model: 'org/embed',
      message: 'Failed to fetch embedding model "org/embed": connection reset',
      details: { attempts: 2 },
    });
    expect(fetcher.calls).toHaveLength(2);
  });

  it('should reject a digest that does not match its pin without retrying', async () => {
    const pinned = { ...embedding, sha256: 'b'.repeat(64) };

    const failure = await cache.materialize(pinned).catch((err: unknown) => err);

    expect(failure).toMatchObject({ code: 'MODEL.INTEGRITY', reason: 'integrity' });
    expect(fetcher.calls).toHaveLength(1);
    expect(await fs.readdir(path.dirname(cache.entryPath(pinned)))).toEqual([]);
    expect(await cache.list()).toEqual([]);
  });

  it('should treat an empty fetch as an integrity failure', async () => {
    fetcher.fail('embedding:org/embed', 'empty');

    await expect(cache.materialize(embedding)).rejects.toMatchObject({ code: 'MODEL.INTEGRITY' });
  });

  it('should list and evict entries', async () => {
    const tiktoken = modelRequest('tiktoken', 'cl100k_base');
    await cache.materialize(tiktoken);
    await cache.materialize(embedding);

    const listed = await cache.list();
    expect(listed.map((entry) => entry.request.kind)).toEqual(['embedding', 'tiktoken']);

    const key = modelCacheKey(tiktoken);
    expect(await cache.evict('tiktoken', key)).toBe(true);
    expect(await cache.evict('tiktoken', key)).toBe(false);
    expect((await cache.list()).map((entry) => entry.request.id)).toEqual(['org/embed']);
    await expect(cache.evict('tiktoken', '../escape')).rejects.toThrow('Invalid model cache key');
  });
});
