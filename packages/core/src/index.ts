/**
 * @stagecraft/core - content-addressed stage execution
 *
 * - Same input and same upstream artifacts → same artifact
 * - Every stage output is an immutable directory in the store
 * - A failed or cancelled stage never leaves a promoted artifact
 */

export { ArtifactEngine, HOST_TOOLCHAIN } from './engine.js';

export type {
  ArtifactManifest,
  ArtifactDepLink,
  ArtifactNodeInfo,
  ArtifactEngineOptions,
  CreateStageParams,
  ExecuteParams,
  Stage,
  StageConfig,
  StageContext,
  StageEvent,
  StageEventType,
  StageFn,
  StagePlanNode,
  StageResult,
  Toolchain,
} from './types.js';

export {
  generateFingerprint,
  stableStringify,
  sha256Hex,
  getShard,
  buildDataPath,
  buildTempPath,
  artifactExists,
  pathExists,
  readManifest,
  readDataLink,
  atomicRename,
  removeDir,
  MANIFEST_VERSION,
  FS_DATA_VERSION,
  DATA_SPACE_DIRNAME,
  DATA_LINK_FILENAME,
  TEMP_PREFIX,
} from './artifact.js';

export {
  listArtifacts,
  readArtifactNode,
  removeArtifact,
  pruneTempDirs,
  pruneTempEntries,
  DEFAULT_TEMP_MAX_AGE_MS,
} from './artifactGraph.js';
export type { PruneOptions } from './artifactGraph.js';

export {
  BuildError,
  ConfigurationError,
  StageError,
  ModelFetchError,
  PackagingError,
  isBuildError,
  errorMessage,
} from './errors.js';
export type {
  BuildErrorCode,
  BuildErrorJSON,
  StageFailureReason,
  ModelFetchFailure,
} from './errors.js';

export { withRetry, computeBackoff, sleep, RetryExhaustedError, DEFAULT_FETCH_RETRY } from './retry.js';
export type { RetryPolicy, RetryOptions } from './retry.js';

export {
  createProcessRunner,
  scopeRunner,
  toolchainEnv,
  formatCommand,
  CommandFailedError,
} from './command.js';
export type { CommandRunner, CommandSpec, CommandResult } from './command.js';

export { walkTree, treeDigest, sourceDigest, isEmptyTree, copyTree, copySourceTree } from './tree.js';
export type { TreeEntry, TreeEntryType, CopyTreeOptions } from './tree.js';

export { shouldIgnore, createSourceFilter, DEFAULT_IGNORE_PATTERNS } from './ignorePatterns.js';

export {
  createLogger,
  createPrettyLogHandler,
  setLogHandler,
  setLogLevel,
  parseLogLevel,
  logger,
  LogLevel,
} from './logger.js';
export type { Logger, LogEntry, LogHandler } from './logger.js';
