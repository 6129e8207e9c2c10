/**
 * Pipeline wiring: configuration -> stage graph -> exported image
 */

import * as path from 'path';
import {
  ArtifactEngine,
  createProcessRunner,
  logger as rootLogger,
  sourceDigest,
} from '@stagecraft/core';
import type { CommandRunner, Logger, Stage, StageConfig, StageEvent, StagePlanNode } from '@stagecraft/core';
import type { BuildConfiguration } from './config/parameters.js';
import { describeConfiguration } from './config/resolver.js';
import type { ProjectConfig } from './config/projectConfig.js';
import { selectDependencySet } from './dependencySelection.js';
import type { DependencySelection } from './dependencySelection.js';
import { planModelRequests } from './models/modelPlan.js';
import type { ModelRequest } from './models/modelPlan.js';
import { FsModelCache } from './models/modelCache.js';
import type { ModelCache } from './models/modelCache.js';
import { CommandModelFetcher } from './models/fetchers.js';
import type { ModelFetcher } from './models/fetchers.js';
import { createImageConfig, runtimeLayout } from './assembly/imageConfig.js';
import type { ImageConfig } from './assembly/imageConfig.js';
import { defaultOwnership } from './assembly/permissions.js';
import type { OwnershipApplier } from './assembly/permissions.js';
import { exportArtifact } from './assembly/exportArtifact.js';
import { createFrontendStage } from './stages/frontend.stage.js';
import type { FrontendInput } from './stages/frontend.stage.js';
import { backendEnvironmentInput, createBackendEnvironmentStage } from './stages/backendEnvironment.stage.js';
import type { BackendEnvironmentInput } from './stages/backendEnvironment.stage.js';
import { createModelPrefetchStage } from './stages/modelPrefetch.stage.js';
import type { ModelPrefetchInput } from './stages/modelPrefetch.stage.js';
import { buildInclusionDirectives, createSingleBinaryStage } from './stages/singleBinary.stage.js';
import type { SingleBinaryInput } from './stages/singleBinary.stage.js';
import { createAssembleStage } from './stages/assemble.stage.js';
import type { AssembleInput } from './stages/assemble.stage.js';

export interface PipelineOptions {
  config: BuildConfiguration;
  project: ProjectConfig;
  runner?: CommandRunner;
  /** Defaults to running the model libraries from the model stage's own environment */
  fetcher?: ModelFetcher;
  modelCache?: ModelCache;
  ownership?: OwnershipApplier;
  logger?: Logger;
  onEvent?: (event: StageEvent) => void;
  /** Rebuild every stage even when a cached artifact exists */
  rebuild?: boolean;
}

export interface PipelineStages {
  frontend: Stage<FrontendInput>;
  backend: Stage<BackendEnvironmentInput>;
  models: Stage<ModelPrefetchInput>;
  binary: Stage<SingleBinaryInput> | undefined;
  assemble: Stage<AssembleInput>;
}

export interface BuildPipeline {
  config: BuildConfiguration;
  project: ProjectConfig;
  engine: ArtifactEngine;
  modelCache: ModelCache;
  ownership: OwnershipApplier;
  selection: DependencySelection;
  modelRequests: ModelRequest[];
  image: ImageConfig;
  stages: PipelineStages;
  assembleInput: AssembleInput;
}

/** Paths under `root` among `candidates`, relative to `root` */
function nestedPaths(root: string, candidates: readonly string[]): string[] {
  return candidates
    .map((candidate) => path.relative(root, candidate))
    .filter((relative) => relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative))
    .map((relative) => relative.split(path.sep).join('/'));
}

/**
 * Register every stage of the build on a fresh engine. Source trees are
 * digested here so that their content, not their location, keys the
 * frontend and backend artifacts.
 */
export async function definePipeline(options: PipelineOptions): Promise<BuildPipeline> {
  const { config, project } = options;
  const logger = options.logger ?? rootLogger.child({ component: 'pipeline' });
  const runner = options.runner ?? createProcessRunner();
  const ownership = options.ownership ?? defaultOwnership();
  const rebuild = options.rebuild ?? false;

  const engine = new ArtifactEngine({
    root: project.cacheRoot,
    runner,
    logger: logger.child({ component: 'engine' }),
    onEvent: options.onEvent,
  });
  const modelCache =
    options.modelCache ??
    new FsModelCache({
      root: project.modelCacheRoot,
      fetcher: options.fetcher ?? new CommandModelFetcher({ runner, python: project.python }),
      retry: project.fetchRetry,
      logger: logger.child({ component: 'model-cache' }),
    });

  const generated = [project.cacheRoot, project.modelCacheRoot, project.outDir];
  const frontendExcluded = nestedPaths(project.frontendDir, [project.backendDir, ...generated]);
  const backendExcluded = nestedPaths(project.backendDir, generated);
  const [frontendDigest, backendDigest] = await Promise.all([
    sourceDigest(project.frontendDir, frontendExcluded),
    sourceDigest(project.backendDir, backendExcluded),
  ]);

  const selection = selectDependencySet(config);
  const modelRequests = planModelRequests(config, project.modelDigests);
  const downloads = path.join(project.cacheRoot, 'downloads');

  const frontend = createFrontendStage(engine, {
    sourceDir: project.frontendDir,
    excludedPaths: frontendExcluded,
    npmCacheDir: path.join(downloads, 'npm'),
    retry: project.fetchRetry,
    timeoutMs: project.timeouts.frontend,
  });
  const backend = createBackendEnvironmentStage(engine, {
    sourceDir: project.backendDir,
    excludedPaths: backendExcluded,
    python: project.python,
    uvCacheDir: path.join(downloads, 'uv'),
    retry: project.fetchRetry,
    timeoutMs: project.timeouts['backend-environment'],
  });
  const models = createModelPrefetchStage(engine, {
    cache: modelCache,
    python: project.python,
    uvCacheDir: path.join(downloads, 'uv'),
    retry: project.fetchRetry,
    timeoutMs: project.timeouts['model-prefetch'],
  });

  const frontendConfig = frontend.config({
    input: { sourceDigest: frontendDigest, buildHash: config.buildHash },
    skipCache: rebuild,
  });
  const backendConfig = backend.config({
    input: backendEnvironmentInput(selection, backendDigest, project.requirementsFile),
    skipCache: rebuild,
  });
  const modelsConfig = models.config({ input: { requests: modelRequests }, skipCache: rebuild });

  let binary: Stage<SingleBinaryInput> | undefined;
  let runtimeBackend: StageConfig<unknown> = backendConfig;
  if (config.profile === 'single-binary') {
    binary = createSingleBinaryStage(engine, {
      backend: backendConfig,
      models: modelsConfig,
      timeoutMs: project.timeouts['single-binary'],
    });
    const binaryInput: SingleBinaryInput = {
      entry: project.backendEntry,
      startScript: project.startScript,
      directives: buildInclusionDirectives(selection),
      smokeTestTimeoutMs: project.smokeTestTimeoutMs,
      ...(project.migrationsDir !== undefined && { migrationsDir: project.migrationsDir }),
    };
    runtimeBackend = binary.config({ input: binaryInput, skipCache: rebuild });
  }

  const image = createImageConfig(config, selection, {
    port: project.port,
    startScriptName: project.startScript,
  });
  const assemble = createAssembleStage(engine, {
    frontend: frontendConfig,
    backend: runtimeBackend,
    models: modelsConfig,
    ownership,
    timeoutMs: project.timeouts.assemble,
  });
  const assembleInput: AssembleInput = {
    profile: config.profile,
    revision: config.buildHash,
    startScript: runtimeLayout(config, project.startScript).startScript,
    image,
  };

  return {
    config,
    project,
    engine,
    modelCache,
    ownership,
    selection,
    modelRequests,
    image,
    stages: { frontend, backend, models, binary, assemble },
    assembleInput,
  };
}

export interface BuildPlan {
  configuration: Record<string, string | number | boolean>;
  selection: DependencySelection;
  modelRequests: ModelRequest[];
  image: ImageConfig;
  graph: StagePlanNode;
}

/** Describe what a build would do without executing any stage */
export async function planBuild(options: PipelineOptions): Promise<BuildPlan> {
  const pipeline = await definePipeline(options);
  return {
    configuration: describeConfiguration(pipeline.config),
    selection: pipeline.selection,
    modelRequests: pipeline.modelRequests,
    image: pipeline.image,
    graph: await pipeline.engine.plan(pipeline.stages.assemble.kind, pipeline.assembleInput),
  };
}

export interface BuildResult {
  /** Assembled image directory inside the artifact store */
  imageDir: string;
  outDir: string;
  fingerprint: string;
  image: ImageConfig;
  durationMs: number;
}

/**
 * Run the whole build and publish the image to `project.outDir`. Either a
 * complete, verified tree is published or the error propagates.
 */
export async function runBuild(options: PipelineOptions & { signal?: AbortSignal }): Promise<BuildResult> {
  const startedAt = Date.now();
  const logger = options.logger ?? rootLogger.child({ component: 'pipeline' });
  const pipeline = await definePipeline({ ...options, logger });
  logger.info('build started', {
    profile: pipeline.config.profile,
    accelerator: pipeline.selection.accelerator,
    models: pipeline.modelRequests.length,
  });

  const imageDir = await pipeline.stages.assemble({
    input: pipeline.assembleInput,
    skipCache: options.rebuild ?? false,
    signal: options.signal,
  });
  const exported = await exportArtifact(imageDir, pipeline.project.outDir, pipeline.ownership);
  const durationMs = Date.now() - startedAt;
  logger.info('build complete', { outDir: exported.outDir, durationMs });

  return {
    imageDir,
    outDir: exported.outDir,
    fingerprint: pipeline.engine.fingerprint(pipeline.stages.assemble.kind, pipeline.assembleInput),
    image: exported.image,
    durationMs,
  };
}
