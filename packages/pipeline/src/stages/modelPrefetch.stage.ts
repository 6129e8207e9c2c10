import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_FETCH_RETRY, errorMessage, removeDir, withRetry } from '@stagecraft/core';
import type { ArtifactEngine, RetryPolicy, Stage, StageContext, StageResult } from '@stagecraft/core';
import { modelLibraries } from '../models/fetchers.js';
import { modelRequestSchema } from '../models/modelPlan.js';
import type { ModelRequest } from '../models/modelPlan.js';
import type { ModelCache } from '../models/modelCache.js';
import { prefetchModels } from '../models/prefetch.js';
import { VENV_DIRNAME } from './backendEnvironment.stage.js';

export const MODEL_PREFETCH_STAGE = 'model-prefetch';
export const MODEL_TOOLS_DIRNAME = 'model-tools';

export const modelPrefetchInputSchema = z
  .object({
    requests: z.array(modelRequestSchema),
  })
  .describe('Materialize model weights and tokenizer data into data/');

export type ModelPrefetchInput = z.infer<typeof modelPrefetchInputSchema>;

export interface ModelPrefetchStageOptions {
  cache: ModelCache;
  /** Interpreter the model tools environment is created from */
  python?: string;
  /** uv download cache shared across builds */
  uvCacheDir?: string;
  retry?: RetryPolicy;
  timeoutMs?: number;
}

/**
 * Stage fn: pull every request through the shared model cache and lay the
 * entries out under `data/`. Cache misses are fetched by the model libraries
 * themselves, installed into a throwaway environment in the workspace.
 */
export function modelPrefetchStageFn(options: ModelPrefetchStageOptions) {
  return async (input: ModelPrefetchInput, { dataDir, runner, signal, logger }: StageContext): Promise<StageResult> => {
    const dataPath = path.join(dataDir, 'data');
    await fs.mkdir(dataPath, { recursive: true });

    const missing: ModelRequest[] = [];
    for (const request of input.requests) {
      if (!(await options.cache.lookup(request))) missing.push(request);
    }

    const toolsPython = path.join(dataDir, MODEL_TOOLS_DIRNAME, VENV_DIRNAME, 'bin', 'python');
    if (missing.length) {
      const libraries = modelLibraries(missing);
      logger.info('installing model libraries', { libraries });
      await fs.mkdir(path.join(dataDir, MODEL_TOOLS_DIRNAME), { recursive: true });
      await runner.run({
        command: 'uv',
        args: ['venv', '--python', options.python ?? 'python3', VENV_DIRNAME],
        cwd: MODEL_TOOLS_DIRNAME,
      });
      await withRetry(
        () =>
          runner.run({
            command: 'uv',
            args: ['pip', 'install', '--python', toolsPython, ...libraries],
            cwd: MODEL_TOOLS_DIRNAME,
          }),
        options.retry ?? DEFAULT_FETCH_RETRY,
        {
          signal,
          onRetry: (err, attempt, delayMs) =>
            logger.warn('model library install failed, retrying', { attempt, delayMs, error: errorMessage(err) }),
        }
      );
    }

    const result = await prefetchModels(input.requests, options.cache, {
      targetDir: dataPath,
      signal,
      runner,
      python: toolsPython,
      logger,
    });
    await removeDir(path.join(dataDir, MODEL_TOOLS_DIRNAME));

    return {
      entry: 'data',
      metadata: {
        models: result.entries.map((entry) => ({ kind: entry.request.kind, id: entry.request.id, digest: entry.digest })),
        fetched: result.fetched,
      },
    };
  };
}

export function createModelPrefetchStage(
  engine: ArtifactEngine,
  options: ModelPrefetchStageOptions
): Stage<ModelPrefetchInput> {
  return engine.createStage<ModelPrefetchInput>({
    kind: MODEL_PREFETCH_STAGE,
    toolchain: {
      name: 'python',
      env: {
        ...(options.uvCacheDir !== undefined && { UV_CACHE_DIR: options.uvCacheDir }),
        UV_LINK_MODE: 'copy',
        HF_HUB_DISABLE_TELEMETRY: '1',
      },
    },
    timeoutMs: options.timeoutMs,
    fn: modelPrefetchStageFn(options),
  });
}
