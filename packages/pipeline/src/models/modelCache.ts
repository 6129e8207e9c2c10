/**
 * Content-addressed model cache shared across builds.
 *
 * Layout: `<root>/<version>/<kind>/<shard>/<key>/` holding `entry.json` and
 * `files/`. Entries are promoted by atomic rename, so a reader never sees a
 * half-written entry and concurrent writers of one key settle on the first.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  ModelFetchError,
  RetryExhaustedError,
  DEFAULT_FETCH_RETRY,
  atomicRename,
  errorMessage,
  getShard,
  isEmptyTree,
  logger as rootLogger,
  pathExists,
  pruneTempEntries,
  removeDir,
  treeDigest,
  withRetry,
} from '@stagecraft/core';
import type { Logger, PruneOptions, RetryPolicy } from '@stagecraft/core';
import type { FetchOptions, ModelFetcher } from './fetchers.js';
import { MODEL_KINDS, describeModel, modelCacheKey, modelRequestSchema } from './modelPlan.js';
import type { ModelKind, ModelRequest } from './modelPlan.js';

export const MODEL_CACHE_VERSION = '1';
export const ENTRY_MANIFEST_FILENAME = 'entry.json';
export const ENTRY_FILES_DIRNAME = 'files';

const entryManifestSchema = z.object({
  request: modelRequestSchema.omit({ sha256: true }),
  key: z.string(),
  digest: z.string().regex(/^[a-f0-9]{64}$/),
  createdAt: z.string(),
});

export interface ModelCacheEntry {
  request: Omit<ModelRequest, 'sha256'>;
  key: string;
  /** Directory holding the materialized files */
  path: string;
  digest: string;
  createdAt: string;
}

export interface MaterializeResult {
  entry: ModelCacheEntry;
  /** False when the entry was already cached */
  fetched: boolean;
}

export interface ModelCache {
  /** Valid entry for the request, or null */
  lookup(request: ModelRequest): Promise<ModelCacheEntry | null>;
  /** Return the cached entry, fetching it first when absent or invalid */
  materialize(request: ModelRequest, options?: FetchOptions): Promise<MaterializeResult>;
  entryPath(request: ModelRequest): string;
  list(): Promise<ModelCacheEntry[]>;
  /** @returns whether an entry was removed */
  evict(kind: ModelKind, key: string): Promise<boolean>;
  /** Remove stale temp directories of interrupted fetches, relative to the cache root */
  pruneTemp(options?: PruneOptions): Promise<string[]>;
}

export interface FsModelCacheOptions {
  root: string;
  fetcher: ModelFetcher;
  retry?: RetryPolicy;
  logger?: Logger;
}

function isModelKind(value: string): value is ModelKind {
  return MODEL_KINDS.some((kind) => kind === value);
}

export class FsModelCache implements ModelCache {
  private readonly root: string;
  private readonly fetcher: ModelFetcher;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<MaterializeResult>>();

  constructor(options: FsModelCacheOptions) {
    this.root = options.root;
    this.fetcher = options.fetcher;
    this.retry = options.retry ?? DEFAULT_FETCH_RETRY;
    this.logger = options.logger ?? rootLogger.child({ component: 'model-cache' });
  }

  get cacheRoot(): string {
    return this.root;
  }

  private keyPath(kind: ModelKind, key: string): string {
    return path.join(this.root, MODEL_CACHE_VERSION, kind, getShard(key), key);
  }

  entryPath(request: ModelRequest): string {
    return this.keyPath(request.kind, modelCacheKey(request));
  }

  async lookup(request: ModelRequest): Promise<ModelCacheEntry | null> {
    const entry = await this.readEntry(this.entryPath(request));
    if (!entry) return null;

    const actual = await treeDigest(entry.path);
    if (actual !== entry.digest) {
      this.logger.warn('model cache entry is corrupted, discarding', { model: describeModel(request) });
      await removeDir(path.dirname(entry.path));
      return null;
    }
    if (request.sha256 !== undefined && request.sha256 !== entry.digest) {
      this.logger.warn('model cache entry does not match pinned digest, discarding', {
        model: describeModel(request),
      });
      await removeDir(path.dirname(entry.path));
      return null;
    }
    return entry;
  }

  materialize(request: ModelRequest, options: FetchOptions = {}): Promise<MaterializeResult> {
    const key = modelCacheKey(request);
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const run = this.materializeOnce(request, key, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async materializeOnce(request: ModelRequest, key: string, options: FetchOptions): Promise<MaterializeResult> {
    const cached = await this.lookup(request);
    if (cached) {
      this.logger.debug('model reused', { model: describeModel(request) });
      return { entry: cached, fetched: false };
    }

    const log = this.logger.child({ model: describeModel(request) });
    try {
      const entry = await withRetry((attempt) => this.fetchOnce(request, key, attempt, options), this.retry, {
        signal: options.signal,
        // a digest mismatch is not transient
        shouldRetry: (err) => !(err instanceof ModelFetchError && err.reason === 'integrity'),
        onRetry: (err, attempt, delayMs) =>
          log.warn('model fetch failed, retrying', { attempt, delayMs, error: errorMessage(err) }),
      });
      return { entry, fetched: true };
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        const last = err.lastError;
        throw new ModelFetchError({
          kind: request.kind,
          model: request.id,
          reason: last instanceof ModelFetchError ? last.reason : 'network',
          message: errorMessage(last),
          attempts: err.attempts,
          cause: last,
        });
      }
      throw err;
    }
  }

  private async fetchOnce(
    request: ModelRequest,
    key: string,
    attempt: number,
    options: FetchOptions
  ): Promise<ModelCacheEntry> {
    const finalPath = this.keyPath(request.kind, key);
    const tempPath = path.join(
      path.dirname(finalPath),
      `.tmp-${key}-${attempt}-${Math.random().toString(36).slice(2, 10)}`
    );
    const filesPath = path.join(tempPath, ENTRY_FILES_DIRNAME);
    await fs.mkdir(filesPath, { recursive: true });

    try {
      this.logger.info('fetching model', { model: describeModel(request), attempt });
      await this.fetcher.fetch(request, filesPath, options);

      if (await isEmptyTree(filesPath)) {
        throw new ModelFetchError({
          kind: request.kind,
          model: request.id,
          reason: 'integrity',
          message: 'fetch produced no files',
        });
      }
      const digest = await treeDigest(filesPath);
      if (request.sha256 !== undefined && digest !== request.sha256) {
        throw new ModelFetchError({
          kind: request.kind,
          model: request.id,
          reason: 'integrity',
          message: `digest ${digest} does not match pinned ${request.sha256}`,
        });
      }

      const { sha256: _pin, ...identity } = request;
      const manifest: z.infer<typeof entryManifestSchema> = {
        request: identity,
        key,
        digest,
        createdAt: new Date().toISOString(),
      };
      await fs.writeFile(path.join(tempPath, ENTRY_MANIFEST_FILENAME), JSON.stringify(manifest, null, 2), 'utf-8');

      if (!(await atomicRename(tempPath, finalPath))) {
        // another build promoted this key first
        await removeDir(tempPath);
        const winner = await this.readEntry(finalPath);
        if (!winner) {
          throw new Error(`model cache entry ${key} vanished after a concurrent write`);
        }
        return winner;
      }
      return { ...manifest, path: path.join(finalPath, ENTRY_FILES_DIRNAME) };
    } catch (err) {
      await removeDir(tempPath);
      throw err;
    }
  }

  private async readEntry(entryDir: string): Promise<ModelCacheEntry | null> {
    const manifestPath = path.join(entryDir, ENTRY_MANIFEST_FILENAME);
    if (!(await pathExists(manifestPath))) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(manifestPath, 'utf-8'));
    } catch (err) {
      this.logger.warn('unreadable model cache manifest, discarding entry', { entryDir, error: errorMessage(err) });
      await removeDir(entryDir);
      return null;
    }
    const parsed = entryManifestSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('malformed model cache manifest, discarding entry', { entryDir });
      await removeDir(entryDir);
      return null;
    }
    return { ...parsed.data, path: path.join(entryDir, ENTRY_FILES_DIRNAME) };
  }

  async list(): Promise<ModelCacheEntry[]> {
    const versionRoot = path.join(this.root, MODEL_CACHE_VERSION);
    const entries: ModelCacheEntry[] = [];
    const kinds = (await pathExists(versionRoot)) ? await fs.readdir(versionRoot) : [];

    for (const kind of kinds.filter(isModelKind).sort()) {
      for (const shard of (await fs.readdir(path.join(versionRoot, kind))).sort()) {
        for (const key of (await fs.readdir(path.join(versionRoot, kind, shard))).sort()) {
          if (key.startsWith('.tmp-')) continue;
          const entry = await this.readEntry(path.join(versionRoot, kind, shard, key));
          if (entry) entries.push(entry);
        }
      }
    }
    return entries;
  }

  async evict(kind: ModelKind, key: string): Promise<boolean> {
    if (!/^[a-f0-9]{64}$/.test(key)) {
      throw new Error(`Invalid model cache key: ${key}`);
    }
    const entryDir = this.keyPath(kind, key);
    if (!(await pathExists(entryDir))) return false;
    await removeDir(entryDir);
    return true;
  }

  async pruneTemp(options: PruneOptions = {}): Promise<string[]> {
    const removed = await pruneTempEntries(path.join(this.root, MODEL_CACHE_VERSION), options);
    return removed.map((relative) => path.join(MODEL_CACHE_VERSION, relative));
  }
}
