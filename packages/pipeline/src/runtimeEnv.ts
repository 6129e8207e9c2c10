/**
 * Runtime environment contract handed to the application
 */

import type { BuildConfiguration } from './config/parameters.js';
import { MODEL_DATA_LAYOUT } from './models/modelPlan.js';

/** Runtime data directory inside the final tree */
export const RUNTIME_DATA_DIR = '/app/backend/data';

export const BUNDLED_OLLAMA_URL = '/ollama';
export const HOST_OLLAMA_URL = 'http://host.docker.internal:11434';

/** Supplied at deploy time; the built image only declares it */
export const SECRET_PLACEHOLDERS = ['APP_SECRET_KEY'] as const;

export interface RuntimeEnvironmentOptions {
  port: number;
  /** Value for the thread-count tuning variables */
  threads?: number;
}

export function runtimeEnvironment(
  config: BuildConfiguration,
  options: RuntimeEnvironmentOptions
): Record<string, string> {
  const threads = String(options.threads ?? 1);
  const dataPath = (relative: string) => `${RUNTIME_DATA_DIR}/${relative}`;

  const env: Record<string, string> = {
    ENV: 'prod',
    PORT: String(options.port),

    OLLAMA_BASE_URL: config.useOllama ? BUNDLED_OLLAMA_URL : HOST_OLLAMA_URL,
    OPENAI_API_BASE_URL: '',
    USE_CUDA_DOCKER: String(config.useCuda),
    USE_CUDA_DOCKER_VER: config.cudaVersion,
    USE_OLLAMA_DOCKER: String(config.useOllama),

    SCARF_NO_ANALYTICS: 'true',
    DO_NOT_TRACK: 'true',
    ANONYMIZED_TELEMETRY: 'false',
    HF_HUB_DISABLE_TELEMETRY: '1',

    // disabled models keep the empty sentinel rather than being left out
    RAG_EMBEDDING_MODEL: config.embeddingModel,
    RAG_RERANKING_MODEL: config.rerankingModel,
    WHISPER_MODEL: config.whisperModel,
    TIKTOKEN_ENCODING_NAME: config.tiktokenEncoding,

    SENTENCE_TRANSFORMERS_HOME: dataPath(MODEL_DATA_LAYOUT.embedding),
    HF_HOME: dataPath(MODEL_DATA_LAYOUT.embedding),
    WHISPER_MODEL_DIR: dataPath(MODEL_DATA_LAYOUT.whisper),
    TIKTOKEN_CACHE_DIR: dataPath(MODEL_DATA_LAYOUT.tiktoken),

    OMP_NUM_THREADS: threads,
    MKL_NUM_THREADS: threads,
    TOKENIZERS_PARALLELISM: 'false',
  };

  for (const name of SECRET_PLACEHOLDERS) {
    env[name] = '';
  }
  return env;
}
