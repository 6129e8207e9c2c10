import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { copySourceTree, errorMessage, walkTree, withRetry, DEFAULT_FETCH_RETRY } from '@stagecraft/core';
import type { ArtifactEngine, CommandRunner, Logger, RetryPolicy, Stage, StageContext, StageResult } from '@stagecraft/core';
import { findForbiddenDistributions, parseFrozenRequirements } from '../dependencySelection.js';
import type { DependencySelection } from '../dependencySelection.js';

export const BACKEND_ENVIRONMENT_STAGE = 'backend-environment';
export const VENV_DIRNAME = '.venv';
export const LOCK_FILENAME = 'requirements.lock';

export const backendEnvironmentInputSchema = z
  .object({
    sourceDigest: z.string(),
    requirementsFile: z.string(),
    accelerator: z.enum(['cpu', 'cuda']),
    acceleratorIndexUrl: z.string().url(),
    acceleratorPackages: z.array(z.string()).describe('name+variant pins, e.g. torch (cpu)'),
    extraPackages: z.array(z.string()),
    forbiddenDistributions: z.array(z.string()),
  })
  .describe('Resolve the backend package set into a relocatable environment');

export type BackendEnvironmentInput = z.infer<typeof backendEnvironmentInputSchema>;

export function backendEnvironmentInput(
  selection: DependencySelection,
  sourceDigest: string,
  requirementsFile: string
): BackendEnvironmentInput {
  return {
    sourceDigest,
    requirementsFile,
    accelerator: selection.accelerator,
    acceleratorIndexUrl: selection.acceleratorIndexUrl,
    acceleratorPackages: selection.acceleratorPackages.map((p) => p.name),
    extraPackages: selection.extraPackages,
    forbiddenDistributions: selection.forbiddenDistributions,
  };
}

export interface BackendEnvironmentStageOptions {
  sourceDir: string;
  /** Subtrees of sourceDir left out of the copy, relative to it */
  excludedPaths?: string[];
  /** Interpreter the environment is created from */
  python: string;
  /** uv download cache shared across builds */
  uvCacheDir: string;
  retry?: RetryPolicy;
  timeoutMs?: number;
}

/**
 * Files under the environment's bin/ that still point into the build
 * workspace. A relocatable environment has none.
 */
export async function findWorkspaceReferences(binDir: string, workspace: string): Promise<string[]> {
  const offenders: string[] = [];
  for await (const entry of walkTree(binDir)) {
    if (entry.type === 'symlink') {
      const target = await fs.readlink(entry.absolutePath);
      if (path.isAbsolute(target) && target.startsWith(workspace)) offenders.push(entry.relativePath);
    } else if (entry.type === 'file') {
      const content = await fs.readFile(entry.absolutePath);
      if (content.includes(workspace)) offenders.push(entry.relativePath);
    }
  }
  return offenders;
}

async function installWithRetry(
  runner: CommandRunner,
  args: string[],
  retry: RetryPolicy,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  await withRetry(() => runner.run({ command: 'uv', args: ['pip', 'install', ...args], cwd: 'backend' }), retry, {
    signal,
    onRetry: (err, attempt, delayMs) =>
      logger.warn('package install failed, retrying', { attempt, delayMs, error: errorMessage(err) }),
  });
}

/**
 * Stage fn: copy the backend source, create `.venv` and resolve the package
 * set into it. The frozen set is written to requirements.lock.
 */
export function backendEnvironmentStageFn(options: BackendEnvironmentStageOptions) {
  return async (
    input: BackendEnvironmentInput,
    { dataDir, runner, signal, logger }: StageContext
  ): Promise<StageResult> => {
    const backendPath = path.join(dataDir, 'backend');
    const retry = options.retry ?? DEFAULT_FETCH_RETRY;
    await copySourceTree(options.sourceDir, backendPath, options.excludedPaths);

    await runner.run({
      command: 'uv',
      args: ['venv', '--relocatable', '--python', options.python, VENV_DIRNAME],
      cwd: 'backend',
    });
    const venvPython = path.join(backendPath, VENV_DIRNAME, 'bin', 'python');

    await installWithRetry(
      runner,
      ['--python', venvPython, ...input.acceleratorPackages, '--index-url', input.acceleratorIndexUrl],
      retry,
      signal,
      logger
    );
    await installWithRetry(
      runner,
      ['--python', venvPython, '-r', input.requirementsFile, ...input.extraPackages],
      retry,
      signal,
      logger
    );

    const { stdout: frozen } = await runner.run({
      command: 'uv',
      args: ['pip', 'freeze', '--python', venvPython],
      cwd: 'backend',
    });
    await fs.writeFile(path.join(backendPath, LOCK_FILENAME), frozen, 'utf-8');

    const installed = parseFrozenRequirements(frozen);
    const forbidden = findForbiddenDistributions(installed, input.forbiddenDistributions);
    if (forbidden.length) {
      throw new Error(`CPU-only environment resolved accelerator builds: ${forbidden.join(', ')}`);
    }

    const references = await findWorkspaceReferences(path.join(backendPath, VENV_DIRNAME, 'bin'), dataDir);
    if (references.length) {
      throw new Error(`environment is not relocatable, build paths remain in: ${references.join(', ')}`);
    }

    return {
      entry: 'backend',
      metadata: { accelerator: input.accelerator, distributions: installed.length },
    };
  };
}

export function createBackendEnvironmentStage(
  engine: ArtifactEngine,
  options: BackendEnvironmentStageOptions
): Stage<BackendEnvironmentInput> {
  return engine.createStage<BackendEnvironmentInput>({
    kind: BACKEND_ENVIRONMENT_STAGE,
    toolchain: {
      name: 'python',
      env: { UV_CACHE_DIR: options.uvCacheDir, UV_LINK_MODE: 'copy', PIP_DISABLE_PIP_VERSION_CHECK: '1' },
    },
    timeoutMs: options.timeoutMs,
    fn: backendEnvironmentStageFn(options),
  });
}
