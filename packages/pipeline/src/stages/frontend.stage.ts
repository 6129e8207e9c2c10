import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  copySourceTree,
  copyTree,
  errorMessage,
  pathExists,
  removeDir,
  withRetry,
  DEFAULT_FETCH_RETRY,
} from '@stagecraft/core';
import type { ArtifactEngine, RetryPolicy, Stage, StageContext, StageResult } from '@stagecraft/core';

export const FRONTEND_STAGE = 'frontend';

export const frontendInputSchema = z
  .object({
    sourceDigest: z.string().describe('Digest of the frontend source tree'),
    buildHash: z.string().describe('Revision exposed to the build as APP_BUILD_HASH'),
  })
  .describe('Compile the web client into build/');

export type FrontendInput = z.infer<typeof frontendInputSchema>;

export interface FrontendStageOptions {
  sourceDir: string;
  /** Subtrees of sourceDir left out of the copy, relative to it */
  excludedPaths?: string[];
  /** npm download cache shared across builds */
  npmCacheDir: string;
  retry?: RetryPolicy;
  timeoutMs?: number;
}

/** Files published next to build/ */
const PUBLISHED_FILES = ['package.json', 'CHANGELOG.md'];

/**
 * Stage fn: install dependencies, build, and keep only the published output
 * in `out/`.
 */
export function frontendStageFn(options: FrontendStageOptions) {
  return async (input: FrontendInput, { dataDir, runner, signal, logger }: StageContext): Promise<StageResult> => {
    const sourcePath = path.join(dataDir, 'src');
    await copySourceTree(options.sourceDir, sourcePath, options.excludedPaths);

    // npm ci downloads packages; a failed download is worth another attempt
    await withRetry(
      () => runner.run({ command: 'npm', args: ['ci', '--no-audit', '--no-fund'], cwd: 'src' }),
      options.retry ?? DEFAULT_FETCH_RETRY,
      {
        signal,
        onRetry: (err, attempt, delayMs) =>
          logger.warn('npm ci failed, retrying', { attempt, delayMs, error: errorMessage(err) }),
      }
    );
    await runner.run({ command: 'npm', args: ['run', 'build'], cwd: 'src', env: { APP_BUILD_HASH: input.buildHash } });

    const buildPath = path.join(sourcePath, 'build');
    if (!(await pathExists(buildPath))) {
      throw new Error('npm run build produced no build/ directory');
    }

    const outPath = path.join(dataDir, 'out');
    await copyTree(buildPath, path.join(outPath, 'build'));
    const published: string[] = [];
    for (const file of PUBLISHED_FILES) {
      if (await pathExists(path.join(sourcePath, file))) {
        await fs.copyFile(path.join(sourcePath, file), path.join(outPath, file));
        published.push(file);
      }
    }
    await removeDir(sourcePath);

    return { entry: 'out', metadata: { buildHash: input.buildHash, published } };
  };
}

export function createFrontendStage(engine: ArtifactEngine, options: FrontendStageOptions): Stage<FrontendInput> {
  return engine.createStage<FrontendInput>({
    kind: FRONTEND_STAGE,
    toolchain: { name: 'node', env: { npm_config_cache: options.npmCacheDir, npm_config_update_notifier: 'false' } },
    timeoutMs: options.timeoutMs,
    fn: frontendStageFn(options),
  });
}
