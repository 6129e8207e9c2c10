/**
 * Project configuration file (`stagecraft.config.json`)
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, DEFAULT_FETCH_RETRY, errorMessage } from '@stagecraft/core';
import type { RetryPolicy } from '@stagecraft/core';
import { formatZodError } from './resolver.js';

export const PROJECT_CONFIG_FILENAME = 'stagecraft.config.json';

const timeoutMs = z.number().int().positive();

export const projectConfigSchema = z
  .object({
    frontendDir: z.string().min(1).default('.').describe('Frontend source tree (package.json at its root)'),
    backendDir: z.string().min(1).default('backend').describe('Backend source tree (requirements file at its root)'),
    requirementsFile: z.string().min(1).default('requirements.txt'),
    backendEntry: z.string().min(1).default('app/main.py').describe('Backend entry module packaged into the binary'),
    startScript: z.string().min(1).default('start.sh').describe('Backend start script, relative to backendDir'),
    migrationsDir: z.string().min(1).optional().describe('Schema migrations embedded into the binary, relative to backendDir'),
    cacheRoot: z.string().min(1).default('.stagecraft/cache'),
    modelCacheRoot: z.string().min(1).optional().describe('Defaults to <cacheRoot>/models'),
    outDir: z.string().min(1).default('.stagecraft/image'),
    port: z.number().int().min(1).max(65535).default(8080),
    python: z.string().min(1).default('python3'),
    timeouts: z
      .object({
        frontend: timeoutMs,
        'backend-environment': timeoutMs,
        'model-prefetch': timeoutMs,
        'single-binary': timeoutMs,
        assemble: timeoutMs,
      })
      .partial()
      .default({}),
    fetchRetry: z
      .object({
        attempts: z.number().int().min(1).max(10),
        baseDelayMs: z.number().int().nonnegative(),
        maxDelayMs: z.number().int().nonnegative(),
      })
      .partial()
      .default({}),
    smokeTestTimeoutMs: timeoutMs.default(120_000),
    modelDigests: z
      .record(z.string(), z.string().regex(/^[a-f0-9]{64}$/, 'expected a sha256 hex digest'))
      .default({})
      .describe('Pinned tree digests keyed by "<kind>:<identifier>"'),
    parameters: z
      .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
      .default({})
      .describe('Build parameter overrides; command line values take precedence'),
  })
  .strict();

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;
type ParsedProjectConfig = z.output<typeof projectConfigSchema>;

export interface ProjectConfig
  extends Omit<ParsedProjectConfig, 'modelCacheRoot' | 'migrationsDir' | 'fetchRetry'> {
  /** Directory relative paths were resolved against */
  baseDir: string;
  modelCacheRoot: string;
  migrationsDir: string | undefined;
  fetchRetry: RetryPolicy;
}

/**
 * Validate raw config and resolve its paths against `baseDir`
 */
export function resolveProjectConfig(raw: unknown, baseDir: string): ProjectConfig {
  const parsed = projectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(formatZodError(parsed.error));
  }
  const config = parsed.data;
  const resolve = (p: string) => path.resolve(baseDir, p);
  const cacheRoot = resolve(config.cacheRoot);

  return {
    ...config,
    baseDir,
    frontendDir: resolve(config.frontendDir),
    backendDir: resolve(config.backendDir),
    cacheRoot,
    modelCacheRoot: config.modelCacheRoot ? resolve(config.modelCacheRoot) : path.join(cacheRoot, 'models'),
    outDir: resolve(config.outDir),
    migrationsDir: config.migrationsDir,
    fetchRetry: { ...DEFAULT_FETCH_RETRY, ...config.fetchRetry },
  };
}

/**
 * Load the project config. Without an explicit file, `stagecraft.config.json`
 * in `cwd` is used when present and defaults otherwise.
 */
export async function loadProjectConfig(file?: string, cwd: string = process.cwd()): Promise<ProjectConfig> {
  const configPath = path.resolve(cwd, file ?? PROJECT_CONFIG_FILENAME);
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (file === undefined && typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return resolveProjectConfig({}, cwd);
    }
    throw new ConfigurationError([`${configPath}: ${errorMessage(err)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError([`${configPath}: invalid JSON: ${errorMessage(err)}`]);
  }
  return resolveProjectConfig(raw, path.dirname(configPath));
}
