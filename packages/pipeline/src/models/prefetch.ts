/**
 * Model Prefetcher
 */

import * as path from 'path';
import { copyTree, logger as rootLogger } from '@stagecraft/core';
import type { Logger } from '@stagecraft/core';
import type { FetchOptions } from './fetchers.js';
import type { ModelCache, ModelCacheEntry } from './modelCache.js';
import { MODEL_DATA_LAYOUT, describeModel } from './modelPlan.js';
import type { ModelRequest } from './modelPlan.js';

export interface PrefetchOptions extends FetchOptions {
  /** When set, every entry is copied into its data layout below this directory */
  targetDir?: string;
  logger?: Logger;
}

export interface PrefetchResult {
  entries: ModelCacheEntry[];
  /** Requests that needed a fetch */
  fetched: string[];
}

/**
 * Materialize `requests` in order. The first failure stops the run: later
 * requests are not attempted and entries already cached stay valid.
 */
export async function prefetchModels(
  requests: readonly ModelRequest[],
  cache: ModelCache,
  options: PrefetchOptions = {}
): Promise<PrefetchResult> {
  const { targetDir, logger, ...fetchOptions } = options;
  const log = logger ?? rootLogger.child({ component: 'prefetch' });
  const result: PrefetchResult = { entries: [], fetched: [] };

  for (const request of requests) {
    options.signal?.throwIfAborted();
    const { entry, fetched } = await cache.materialize(request, fetchOptions);
    result.entries.push(entry);
    if (fetched) result.fetched.push(describeModel(request));
    log.info(fetched ? 'model fetched' : 'model cached', { model: describeModel(request), digest: entry.digest.slice(0, 12) });

    if (targetDir) {
      await copyTree(entry.path, path.join(targetDir, MODEL_DATA_LAYOUT[request.kind]));
    }
  }
  return result;
}
