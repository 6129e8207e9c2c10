/**
 * ArtifactEngine type definitions
 */

import type { CommandRunner } from './command.js';
import type { Logger } from './logger.js';

/**
 * Artifact manifest file structure
 */
export interface ArtifactManifest {
  /** Manifest version */
  manifestVersion: string;
  /** Stage that produced the artifact */
  kind: string;
  /** Content/config fingerprint (directory name) */
  fingerprint: string;
  /** Stage input the fingerprint was computed from */
  input: Record<string, unknown>;
  /** Mount path → `${kind}:${fingerprint}` of each consumed artifact */
  deps: Record<string, string>;
  /** Toolchain the stage ran under */
  toolchain: string;
  /** Stage-defined metadata */
  metadata: Record<string, unknown>;
  createdAt: string;
  durationMs: number;
}

/**
 * Execution environment a stage declares.
 */
export interface Toolchain {
  name: string;
  /** Extra environment variables for every command the stage runs */
  env?: Record<string, string>;
  /** Directories placed ahead of the inherited PATH */
  path?: string[];
}

/**
 * Stage function result
 */
export interface StageResult {
  /** Entry relative path (relative to the stage workspace) */
  entry: string;
  metadata?: Record<string, unknown>;
}

/**
 * What a stage function sees while it runs.
 */
export interface StageContext {
  /** Stage workspace; deps are mounted inside it */
  dataDir: string;
  /** Mount path → absolute path of each consumed artifact entry */
  deps: Record<string, string>;
  /** Aborted on timeout, caller cancellation or a sibling stage failure */
  signal: AbortSignal;
  logger: Logger;
  /** Runner bound to the workspace and toolchain */
  runner: CommandRunner;
}

export type StageFn<TInput> = (input: TInput, context: StageContext) => Promise<StageResult>;

/**
 * Stage call parameters
 */
export interface ExecuteParams<TInput> {
  /** Input parameters (part of the fingerprint) */
  input: TInput;
  /** Rebuild this stage even when a cached artifact exists */
  skipCache?: boolean;
  /** Cancels the whole run */
  signal?: AbortSignal;
}

/**
 * Stage config object (returned by .config(), used for deps)
 */
export interface StageConfig<TInput> {
  kind: string;
  input: TInput;
  skipCache?: boolean;
}

/**
 * Callable stage handle
 */
export interface Stage<TInput> {
  /** Execute and return the artifact entry path */
  (params: ExecuteParams<TInput>): Promise<string>;
  config(params: Omit<ExecuteParams<TInput>, 'signal'>): StageConfig<TInput>;
  kind: string;
}

/**
 * createStage parameters
 */
export interface CreateStageParams<TInput> {
  kind: string;
  /** Artifacts mounted into the workspace, keyed by relative mount path */
  deps?: Record<string, StageConfig<unknown>>;
  toolchain?: Toolchain;
  /** Wall-clock budget for the stage function itself */
  timeoutMs?: number;
  fn: StageFn<TInput>;
}

export type StageEventType = 'stage:start' | 'stage:cached' | 'stage:complete' | 'stage:failed';

export interface StageEvent {
  type: StageEventType;
  kind: string;
  fingerprint: string;
  at: number;
  error?: Error;
}

/**
 * ArtifactEngine configuration
 */
export interface ArtifactEngineOptions {
  /** Artifact store root directory */
  root: string;
  /** Whether to clean temp directory on error, default true */
  cleanTempOnError?: boolean;
  /** Runner handed (scoped) to every stage; defaults to child processes */
  runner?: CommandRunner;
  logger?: Logger;
  onEvent?: (event: StageEvent) => void;
}

/**
 * Internal use: registered stage info
 */
export interface RegisteredStage {
  kind: string;
  deps: Record<string, StageConfig<unknown>>;
  toolchain: Toolchain;
  timeoutMs: number | undefined;
  fn(input: Record<string, unknown>, context: StageContext): Promise<StageResult>;
}

/**
 * Stage graph as planned for one input, without executing anything.
 */
export interface StagePlanNode {
  kind: string;
  fingerprint: string;
  toolchain: string;
  cached: boolean;
  deps: Record<string, StagePlanNode>;
}

/**
 * Dependency link discovered in an artifact's workspace
 */
export interface ArtifactDepLink {
  /** Relative path inside data-space */
  linkPath: string;
  targetKind: string;
  targetFingerprint: string;
  /** Target artifact directory */
  targetPath: string;
}

/**
 * Artifact node summary for graph views
 */
export interface ArtifactNodeInfo {
  kind: string;
  fingerprint: string;
  dataPath: string;
  entryPath: string | null;
  manifest: ArtifactManifest;
  deps: ArtifactDepLink[];
}
