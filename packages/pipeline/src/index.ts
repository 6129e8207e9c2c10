/**
 * @stagecraft/pipeline - the staged build of one web application image
 */

export {
  DISABLED,
  BUILD_PARAMETERS,
  PARAMETER_NAMES,
  buildConfigurationSchema,
  isDisabled,
} from './config/parameters.js';
export type {
  BuildConfiguration,
  BuildParameter,
  ParameterName,
  DeploymentProfile,
  BaseFlavor,
} from './config/parameters.js';
export {
  resolveBuildConfiguration,
  parseOverrideArgs,
  mergeOverrides,
  describeConfiguration,
  formatZodError,
} from './config/resolver.js';
export type { BuildOverrides } from './config/resolver.js';
export {
  PROJECT_CONFIG_FILENAME,
  projectConfigSchema,
  resolveProjectConfig,
  loadProjectConfig,
} from './config/projectConfig.js';
export type { ProjectConfig, ProjectConfigInput } from './config/projectConfig.js';

export {
  ACCELERATOR_INDEX_BASE,
  ACCELERATOR_CAPABLE_PACKAGES,
  selectDependencySet,
  parseFrozenRequirements,
  findForbiddenDistributions,
} from './dependencySelection.js';
export type { DependencySelection, AcceleratorPackage, InstalledDistribution } from './dependencySelection.js';

export {
  MODEL_KINDS,
  MODEL_DATA_LAYOUT,
  modelRequestSchema,
  planModelRequests,
  modelCacheKey,
  describeModel,
  digestPinKey,
} from './models/modelPlan.js';
export type { ModelKind, ModelRequest } from './models/modelPlan.js';
export { CommandModelFetcher, MODEL_LIBRARIES, modelLibraries } from './models/fetchers.js';
export type { ModelFetcher, CommandModelFetcherOptions, FetchOptions } from './models/fetchers.js';
export { FsModelCache, MODEL_CACHE_VERSION } from './models/modelCache.js';
export type { ModelCache, ModelCacheEntry, MaterializeResult, FsModelCacheOptions } from './models/modelCache.js';
export { prefetchModels } from './models/prefetch.js';
export type { PrefetchOptions, PrefetchResult } from './models/prefetch.js';

export { runtimeEnvironment, RUNTIME_DATA_DIR } from './runtimeEnv.js';

export {
  fsOwnership,
  RecordedOwnership,
  defaultOwnership,
  normalizedMode,
  normalizeTree,
  verifyTree,
  FORBIDDEN_NAMES,
} from './assembly/permissions.js';
export type { RuntimeIdentity, Owner, OwnershipApplier, NormalizeSummary } from './assembly/permissions.js';
export { createImageConfig, createRuntimeIdentity, runtimeLayout, imageConfigSchema, BASE_IMAGES } from './assembly/imageConfig.js';
export type { ImageConfig, RuntimeLayout } from './assembly/imageConfig.js';
export { exportArtifact, OWNERSHIP_FILENAME } from './assembly/exportArtifact.js';
export type { ExportResult } from './assembly/exportArtifact.js';

export { createFrontendStage, FRONTEND_STAGE } from './stages/frontend.stage.js';
export { createBackendEnvironmentStage, BACKEND_ENVIRONMENT_STAGE } from './stages/backendEnvironment.stage.js';
export { createModelPrefetchStage, MODEL_PREFETCH_STAGE } from './stages/modelPrefetch.stage.js';
export { createSingleBinaryStage, SINGLE_BINARY_STAGE, BINARY_NAME } from './stages/singleBinary.stage.js';
export {
  createAssembleStage,
  readImageConfig,
  ASSEMBLE_STAGE,
  IMAGE_CONFIG_FILENAME,
  ROOTFS_DIRNAME,
} from './stages/assemble.stage.js';

export { definePipeline, planBuild, runBuild } from './pipeline.js';
export type { PipelineOptions, PipelineStages, BuildPipeline, BuildPlan, BuildResult } from './pipeline.js';
