/**
 * ArtifactEngine: content-addressed stage execution
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  ArtifactEngineOptions,
  CreateStageParams,
  ExecuteParams,
  RegisteredStage,
  Stage,
  StageConfig,
  StageContext,
  StageEvent,
  StageEventType,
  StagePlanNode,
  Toolchain,
} from './types.js';
import {
  generateFingerprint,
  stableStringify,
  buildDataPath,
  buildTempPath,
  artifactExists,
  readDataLink,
  writeManifest,
  createDataLink,
  createDepLink,
  atomicRename,
  removeDir,
  createManifest,
  assertSafeRelativePath,
  DATA_SPACE_DIRNAME,
} from './artifact.js';
import { CommandFailedError, createProcessRunner, scopeRunner } from './command.js';
import type { CommandRunner } from './command.js';
import { ConfigurationError, StageError, errorMessage, isBuildError } from './errors.js';
import type { BuildError } from './errors.js';
import { logger as rootLogger } from './logger.js';
import type { Logger } from './logger.js';

export const HOST_TOOLCHAIN: Toolchain = { name: 'host' };

function assertValidKind(kind: string): string {
  const trimmed = kind.trim();
  if (!trimmed) {
    throw new Error('Stage kind must be a non-empty string');
  }
  if (kind !== trimmed) {
    throw new Error(`Stage kind "${kind}" must not have leading/trailing whitespace`);
  }
  if (trimmed === '.' || trimmed === '..' || trimmed.startsWith('.')) {
    throw new Error(`Stage kind "${kind}" is not allowed`);
  }
  if (kind.includes('/') || kind.includes('\\')) {
    throw new Error(`Stage kind "${kind}" must not contain path separators`);
  }
  return kind;
}

function safeResolveWithin(baseDir: string, relativePath: string, name: string): string {
  assertSafeRelativePath(relativePath, name);
  const resolvedBase = path.resolve(baseDir);
  const resolvedTarget = path.resolve(baseDir, relativePath);
  const relative = path.relative(resolvedBase, resolvedTarget);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`${name} must resolve within ${baseDir}`);
  }
  return resolvedTarget;
}

/**
 * Failure state shared by every stage of one top-level call. The first
 * failure aborts the controller so running siblings stop.
 */
class RunScope {
  readonly controller = new AbortController();
  firstError: BuildError | undefined;

  constructor(parent?: AbortSignal) {
    if (parent?.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', () => this.controller.abort(parent.reason), { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  fail(err: BuildError): void {
    this.firstError ??= err;
    if (!this.controller.signal.aborted) {
      this.controller.abort(err);
    }
  }
}

interface StageTimeout {
  readonly timeoutMs: number;
}

function isStageTimeout(value: unknown): value is StageTimeout {
  return typeof value === 'object' && value !== null && 'timeoutMs' in value && !(value instanceof Error);
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. A stage
 * function that ignores its signal is abandoned, not awaited.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      // the abandoned stage fn may still reject later
      promise.catch(() => undefined);
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

export class ArtifactEngine {
  private readonly root: string;
  private readonly cleanTempOnError: boolean;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly onEvent: ((event: StageEvent) => void) | undefined;
  private readonly stages: Map<string, RegisteredStage> = new Map();
  private readonly inFlight: Map<string, Promise<string>> = new Map();

  constructor(options: ArtifactEngineOptions) {
    this.root = options.root;
    this.cleanTempOnError = options.cleanTempOnError ?? true;
    this.runner = options.runner ?? createProcessRunner();
    this.logger = options.logger ?? rootLogger.child({ component: 'engine' });
    this.onEvent = options.onEvent;
  }

  get storeRoot(): string {
    return this.root;
  }

  /**
   * Register a stage and return its callable handle
   */
  createStage<TInput extends Record<string, unknown>>(params: CreateStageParams<TInput>): Stage<TInput> {
    const kind = assertValidKind(params.kind);
    const deps = params.deps ?? {};
    for (const depPath of Object.keys(deps)) {
      assertSafeRelativePath(depPath, 'depPath');
    }

    this.stages.set(kind, {
      kind,
      deps,
      toolchain: params.toolchain ?? HOST_TOOLCHAIN,
      timeoutMs: params.timeoutMs,
      fn: params.fn,
    });

    const stage = async (executeParams: ExecuteParams<TInput>): Promise<string> => {
      const scope = new RunScope(executeParams.signal);
      try {
        return await this.execute(kind, executeParams.input, executeParams.skipCache ?? false, scope);
      } catch (err) {
        throw scope.firstError ?? err;
      }
    };

    stage.config = (configParams: Omit<ExecuteParams<TInput>, 'signal'>): StageConfig<TInput> => ({
      kind,
      input: configParams.input,
      skipCache: configParams.skipCache ?? false,
    });

    stage.kind = kind;

    return stage;
  }

  /**
   * Fingerprint of a stage invocation, including every upstream fingerprint
   */
  fingerprint(kind: string, input: Record<string, unknown>): string {
    return this.fingerprintOf(this.lookup(kind), input, []);
  }

  /**
   * Read cache only (without execution)
   * @returns entry path, or null when the artifact is absent or incomplete
   */
  async get(kind: string, input: Record<string, unknown>): Promise<string | null> {
    const dataPath = buildDataPath(this.root, kind, this.fingerprint(kind, input));
    if (await artifactExists(dataPath)) {
      return this.tryReadEntryPath(dataPath);
    }
    return null;
  }

  /**
   * Delete an artifact (idempotent)
   */
  async remove(kind: string, input: Record<string, unknown>): Promise<void> {
    await removeDir(buildDataPath(this.root, kind, this.fingerprint(kind, input)));
  }

  /**
   * Resolve the stage graph for an input without executing anything
   */
  async plan(kind: string, input: Record<string, unknown>): Promise<StagePlanNode> {
    const registered = this.lookup(kind);
    const fingerprint = this.fingerprint(kind, input);
    const deps: Record<string, StagePlanNode> = {};
    for (const [depPath, config] of Object.entries(registered.deps)) {
      deps[depPath] = await this.plan(config.kind, this.inputOf(config));
    }
    return {
      kind,
      fingerprint,
      toolchain: registered.toolchain.name,
      cached: (await this.tryReadEntryPath(buildDataPath(this.root, kind, fingerprint))) !== null,
      deps,
    };
  }

  private lookup(kind: string): RegisteredStage {
    const registered = this.stages.get(kind);
    if (!registered) {
      throw new Error(`Stage not registered: ${kind}`);
    }
    return registered;
  }

  private inputOf(config: StageConfig<unknown>): Record<string, unknown> {
    const { input } = config;
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      throw new Error(`Stage "${config.kind}" input must be an object`);
    }
    return { ...input };
  }

  private fingerprintOf(registered: RegisteredStage, input: Record<string, unknown>, trail: string[]): string {
    const key = `${registered.kind}:${stableStringify(input)}`;
    if (trail.includes(key)) {
      throw new ConfigurationError([
        `stage graph has a cycle: ${[...trail, key].map((k) => k.split(':')[0]).join(' -> ')}`,
      ]);
    }
    const depIds: Record<string, string> = {};
    for (const [depPath, config] of Object.entries(registered.deps)) {
      const dep = this.lookup(config.kind);
      depIds[depPath] = `${dep.kind}:${this.fingerprintOf(dep, this.inputOf(config), [...trail, key])}`;
    }
    return generateFingerprint(registered.kind, input, depIds);
  }

  private emit(type: StageEventType, kind: string, fingerprint: string, error?: Error): void {
    const event: StageEvent = { type, kind, fingerprint, at: Date.now() };
    if (error) event.error = error;
    this.onEvent?.(event);
  }

  /**
   * Concurrent requests for the same artifact share one execution
   */
  private execute(kind: string, input: Record<string, unknown>, skipCache: boolean, scope: RunScope): Promise<string> {
    const fingerprint = this.fingerprint(kind, input);
    const key = `${kind}:${fingerprint}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }
    const run = this.executeOnce(this.lookup(kind), input, fingerprint, skipCache, scope).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async executeOnce(
    registered: RegisteredStage,
    input: Record<string, unknown>,
    fingerprint: string,
    skipCache: boolean,
    scope: RunScope
  ): Promise<string> {
    const { kind } = registered;
    const dataPath = buildDataPath(this.root, kind, fingerprint);
    const log = this.logger.child({ stage: kind, fingerprint: fingerprint.slice(0, 12) });

    if (await artifactExists(dataPath)) {
      if (skipCache) {
        // the rename below fails against a non-empty target
        await removeDir(dataPath);
      } else {
        const cachedEntry = await this.tryReadEntryPath(dataPath);
        if (cachedEntry) {
          log.debug('artifact reused');
          this.emit('stage:cached', kind, fingerprint);
          return cachedEntry;
        }
        log.warn('cached artifact is incomplete, rebuilding');
        await removeDir(dataPath);
      }
    }

    const tempPath = buildTempPath(this.root, kind, fingerprint);
    const dataSpacePath = path.join(tempPath, DATA_SPACE_DIRNAME);
    await fs.mkdir(dataSpacePath, { recursive: true });

    const stageController = new AbortController();
    const onRunAbort = () => stageController.abort(scope.signal.reason);
    scope.signal.addEventListener('abort', onRunAbort, { once: true });
    let timer: NodeJS.Timeout | undefined;

    try {
      const { mounts, depIds } = await this.processDeps(dataSpacePath, registered.deps, scope);
      scope.signal.throwIfAborted();

      if (registered.timeoutMs !== undefined) {
        const reason: StageTimeout = { timeoutMs: registered.timeoutMs };
        timer = setTimeout(() => stageController.abort(reason), registered.timeoutMs);
      }
      if (scope.signal.aborted) stageController.abort(scope.signal.reason);

      const context: StageContext = {
        dataDir: dataSpacePath,
        deps: mounts,
        signal: stageController.signal,
        logger: log,
        runner: scopeRunner(this.runner, {
          cwd: dataSpacePath,
          toolchain: registered.toolchain,
          signal: stageController.signal,
        }),
      };

      const startedAt = Date.now();
      log.info('stage started', { toolchain: registered.toolchain.name });
      this.emit('stage:start', kind, fingerprint);

      const result = await raceAbort(registered.fn(input, context), stageController.signal);
      clearTimeout(timer);

      const manifest = createManifest({
        kind,
        fingerprint,
        input,
        deps: depIds,
        toolchain: registered.toolchain.name,
        metadata: result.metadata ?? {},
        durationMs: Date.now() - startedAt,
      });
      await createDataLink(tempPath, result.entry);
      await fs.stat(path.join(dataSpacePath, result.entry));
      await writeManifest(tempPath, manifest);

      const renamed = await atomicRename(tempPath, dataPath);
      if (!renamed) {
        // another process promoted the same fingerprint first
        log.debug('artifact promoted concurrently, discarding local result');
        await removeDir(tempPath);
      }

      const entryPath = await readDataLink(dataPath);
      log.info('stage complete', { durationMs: manifest.durationMs });
      this.emit('stage:complete', kind, fingerprint);
      return entryPath;
    } catch (err) {
      const failure = this.toBuildError(kind, fingerprint, err, stageController.signal);
      if (failure.stage === kind) {
        log.error('stage failed', { code: failure.code, error: failure.message });
        this.emit('stage:failed', kind, fingerprint, failure);
      }
      scope.fail(failure);
      if (this.cleanTempOnError) {
        await removeDir(tempPath);
      }
      throw failure;
    } finally {
      clearTimeout(timer);
      scope.signal.removeEventListener('abort', onRunAbort);
    }
  }

  private toBuildError(kind: string, fingerprint: string, err: unknown, stageSignal: AbortSignal): BuildError {
    if (isBuildError(err)) {
      return err.attachStage(kind);
    }
    if (stageSignal.aborted && isStageTimeout(stageSignal.reason)) {
      return new StageError({
        stage: kind,
        fingerprint,
        reason: 'timeout',
        message: `exceeded ${stageSignal.reason.timeoutMs}ms`,
        cause: err,
      });
    }
    if (stageSignal.aborted) {
      return new StageError({
        stage: kind,
        fingerprint,
        reason: 'aborted',
        message: errorMessage(stageSignal.reason),
        cause: err,
      });
    }
    return new StageError({
      stage: kind,
      fingerprint,
      reason: 'failed',
      message: errorMessage(err),
      diagnostics: err instanceof CommandFailedError ? err.diagnostics : undefined,
      cause: err,
    });
  }

  /**
   * Entry path behind dataLink, or null when the artifact is incomplete
   */
  private async tryReadEntryPath(dataPath: string): Promise<string | null> {
    try {
      const entryPath = await readDataLink(dataPath);
      await fs.stat(entryPath);
      return entryPath;
    } catch {
      return null;
    }
  }

  /**
   * Execute every dep concurrently and mount it into the workspace. All
   * deps settle before this returns, so nothing keeps running after a
   * failure is reported.
   */
  private async processDeps(
    dataSpacePath: string,
    deps: Record<string, StageConfig<unknown>>,
    scope: RunScope
  ): Promise<{ mounts: Record<string, string>; depIds: Record<string, string> }> {
    const mounts: Record<string, string> = {};
    const depIds: Record<string, string> = {};

    const results = await Promise.allSettled(
      Object.entries(deps).map(async ([depPath, config]) => {
        const input = this.inputOf(config);
        await this.execute(config.kind, input, config.skipCache ?? false, scope);

        const depFingerprint = this.fingerprint(config.kind, input);
        const mountPath = safeResolveWithin(dataSpacePath, depPath, 'depPath');
        await createDepLink(mountPath, buildDataPath(this.root, config.kind, depFingerprint));
        mounts[depPath] = mountPath;
        depIds[depPath] = `${config.kind}:${depFingerprint}`;
      })
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        throw scope.firstError ?? result.reason;
      }
    }
    return { mounts, depIds };
  }
}
