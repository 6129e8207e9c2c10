/**
 * Build parameters: the variant matrix every build is resolved from.
 */

import { z } from 'zod';

/** Value of an optional parameter that is switched off. */
export const DISABLED = '';

const MAX_NUMERIC_ID = 2 ** 31 - 1;

const flag = z.union(
  [z.boolean(), z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')],
  { error: 'expected true or false' }
);

const numericId = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)], { error: 'expected a numeric id' })
  .pipe(
    z
      .number()
      .int('expected an integer')
      .min(1, 'must be non-zero: the runtime identity is never privileged')
      .max(MAX_NUMERIC_ID, `must be at most ${MAX_NUMERIC_ID}`)
  );

const modelIdentifier = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._\-/]*$/, 'expected a model identifier such as "org/model-name"');

const optionalModelIdentifier = z.union([z.literal(DISABLED), modelIdentifier], {
  error: 'expected a model identifier or "" to disable',
});

export const buildConfigurationSchema = z.object({
  useCuda: flag.describe('Install accelerator (CUDA) builds of accelerator-capable libraries'),
  cudaVersion: z
    .string()
    .regex(/^cu\d+$/, 'expected a CUDA variant tag such as "cu128"')
    .describe('CUDA variant tag used to select the accelerator package index'),
  useOllama: flag.describe('Bundle the external inference runtime'),
  embeddingModel: modelIdentifier.describe('Embedding model prefetched into the image'),
  rerankingModel: optionalModelIdentifier.describe('Reranking model, or "" when reranking is disabled'),
  whisperModel: optionalModelIdentifier.describe('Speech transcription model, or "" to skip it'),
  tiktokenEncoding: z
    .string()
    .regex(/^[a-z0-9_]+$/, 'expected an encoding name such as "cl100k_base"')
    .describe('Tokenizer encoding prefetched into the image'),
  uid: numericId.describe('Numeric user id of the runtime identity'),
  gid: numericId.describe('Numeric group id of the runtime identity'),
  buildHash: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, 'expected a revision tag of letters, digits, ".", "_" or "-"')
    .describe('Build revision tag'),
  profile: z.enum(['environment', 'single-binary']).describe('Deployment profile'),
  baseFlavor: z.enum(['python-slim', 'debian-slim']).describe('Base runtime flavor of the final image'),
});

export type BuildConfiguration = Readonly<z.output<typeof buildConfigurationSchema>>;
export type ParameterName = keyof BuildConfiguration;
export type DeploymentProfile = BuildConfiguration['profile'];
export type BaseFlavor = BuildConfiguration['baseFlavor'];

export interface BuildParameter {
  /** Build-arg style name accepted in overrides and reported on failure */
  buildArg: string;
  defaultValue: string | number | boolean;
  /** Accepts `DISABLED` */
  optional: boolean;
}

export const BUILD_PARAMETERS = {
  useCuda: { buildArg: 'USE_CUDA', defaultValue: false, optional: false },
  cudaVersion: { buildArg: 'USE_CUDA_VER', defaultValue: 'cu128', optional: false },
  useOllama: { buildArg: 'USE_OLLAMA', defaultValue: false, optional: false },
  embeddingModel: {
    buildArg: 'USE_EMBEDDING_MODEL',
    defaultValue: 'sentence-transformers/all-MiniLM-L6-v2',
    optional: false,
  },
  rerankingModel: { buildArg: 'USE_RERANKING_MODEL', defaultValue: DISABLED, optional: true },
  whisperModel: { buildArg: 'USE_WHISPER_MODEL', defaultValue: 'base', optional: true },
  tiktokenEncoding: { buildArg: 'USE_TIKTOKEN_ENCODING_NAME', defaultValue: 'cl100k_base', optional: false },
  uid: { buildArg: 'UID', defaultValue: 1000, optional: false },
  gid: { buildArg: 'GID', defaultValue: 1000, optional: false },
  buildHash: { buildArg: 'BUILD_HASH', defaultValue: 'dev-build', optional: false },
  profile: { buildArg: 'PROFILE', defaultValue: 'environment', optional: false },
  baseFlavor: { buildArg: 'BASE_FLAVOR', defaultValue: 'python-slim', optional: false },
} as const satisfies Record<ParameterName, BuildParameter>;

export const PARAMETER_NAMES = Object.keys(buildConfigurationSchema.shape).filter(
  (key): key is ParameterName => key in BUILD_PARAMETERS
);

export function isDisabled(value: string): boolean {
  return value === DISABLED;
}
