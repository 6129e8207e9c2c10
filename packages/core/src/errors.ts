/**
 * Build error taxonomy.
 *
 * Every fatal condition of a build is one of these classes. None of them is
 * retried at stage level; `ModelFetchError` is only raised after the
 * fetch-level retry budget is spent.
 */

export type BuildErrorCode =
  | 'CONFIG.INVALID'
  | 'STAGE.FAILED'
  | 'STAGE.TIMEOUT'
  | 'STAGE.ABORTED'
  | 'MODEL.FETCH'
  | 'MODEL.INTEGRITY'
  | 'PACKAGING.SMOKE_TEST';

export interface BuildErrorJSON {
  name: string;
  code: BuildErrorCode;
  message: string;
  stage?: string;
  details: Record<string, unknown>;
}

export abstract class BuildError extends Error {
  abstract readonly code: BuildErrorCode;
  /** Stage the error surfaced in, once known. */
  stage: string | undefined;
  readonly details: Record<string, unknown>;

  protected constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.details = details;
  }

  /** Record the originating stage. The innermost stage wins. */
  attachStage(stage: string): this {
    this.stage ??= stage;
    return this;
  }

  toJSON(): BuildErrorJSON {
    const json: BuildErrorJSON = {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
    if (this.stage !== undefined) json.stage = this.stage;
    return json;
  }
}

export function isBuildError(value: unknown): value is BuildError {
  return value instanceof BuildError;
}

export class ConfigurationError extends BuildError {
  readonly code = 'CONFIG.INVALID';
  readonly issues: readonly string[];

  constructor(issues: string[], message = `Invalid build configuration: ${issues.join('; ')}`) {
    super(message, { issues });
    this.issues = issues;
  }
}

export type StageFailureReason = 'failed' | 'timeout' | 'aborted';

const STAGE_CODES: Record<StageFailureReason, BuildErrorCode> = {
  failed: 'STAGE.FAILED',
  timeout: 'STAGE.TIMEOUT',
  aborted: 'STAGE.ABORTED',
};

export interface StageErrorParams {
  stage: string;
  reason: StageFailureReason;
  message: string;
  fingerprint?: string;
  /** Tail of the failing command's output, when a command failed. */
  diagnostics?: string;
  cause?: unknown;
}

export class StageError extends BuildError {
  readonly code: BuildErrorCode;
  readonly reason: StageFailureReason;
  readonly diagnostics: string | undefined;

  constructor(params: StageErrorParams) {
    super(
      `Stage "${params.stage}" ${params.reason === 'failed' ? 'failed' : params.reason === 'timeout' ? 'timed out' : 'was aborted'}: ${params.message}`,
      { fingerprint: params.fingerprint, reason: params.reason },
      params.cause
    );
    this.code = STAGE_CODES[params.reason];
    this.reason = params.reason;
    this.diagnostics = params.diagnostics;
    this.stage = params.stage;
  }
}

export type ModelFetchFailure = 'network' | 'integrity';

export interface ModelFetchErrorParams {
  kind: string;
  model: string;
  reason: ModelFetchFailure;
  message: string;
  attempts?: number;
  cause?: unknown;
}

export class ModelFetchError extends BuildError {
  readonly code: BuildErrorCode;
  readonly kind: string;
  readonly model: string;
  readonly reason: ModelFetchFailure;

  constructor(params: ModelFetchErrorParams) {
    super(
      `Failed to fetch ${params.kind} model "${params.model}": ${params.message}`,
      { kind: params.kind, model: params.model, reason: params.reason, attempts: params.attempts },
      params.cause
    );
    this.code = params.reason === 'integrity' ? 'MODEL.INTEGRITY' : 'MODEL.FETCH';
    this.kind = params.kind;
    this.model = params.model;
    this.reason = params.reason;
  }
}

export class PackagingError extends BuildError {
  readonly code = 'PACKAGING.SMOKE_TEST';
  readonly missingModule: string | undefined;
  readonly output: string;

  constructor(message: string, params: { missingModule?: string; output: string; cause?: unknown }) {
    super(message, { missingModule: params.missingModule }, params.cause);
    this.missingModule = params.missingModule;
    this.output = params.output;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
