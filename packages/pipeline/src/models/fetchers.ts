/**
 * Model fetchers: materialize one model into a directory.
 */

import type { CommandRunner } from '@stagecraft/core';
import type { ModelKind, ModelRequest } from './modelPlan.js';

export interface FetchOptions {
  signal?: AbortSignal;
  /** Runner for this fetch, e.g. one scoped to the calling stage */
  runner?: CommandRunner;
  /** Interpreter for this fetch */
  python?: string;
}

export interface ModelFetcher {
  /** Download `request` into `targetDir` (which exists and is empty). */
  fetch(request: ModelRequest, targetDir: string, options?: FetchOptions): Promise<void>;
}

/** Distribution whose loader each snippet imports */
export const MODEL_LIBRARIES: Record<ModelKind, string> = {
  embedding: 'sentence-transformers',
  reranking: 'sentence-transformers',
  whisper: 'faster-whisper',
  tiktoken: 'tiktoken',
};

/** Libraries needed to fetch `requests`, deduplicated, in request order */
export function modelLibraries(requests: readonly ModelRequest[]): string[] {
  return [...new Set(requests.map((request) => MODEL_LIBRARIES[request.kind]))];
}

// argv: id, device, target directory, precision
const SNIPPETS: Record<ModelKind, string> = {
  embedding: [
    'import sys',
    'from sentence_transformers import SentenceTransformer',
    'SentenceTransformer(sys.argv[1], device=sys.argv[2], cache_folder=sys.argv[3])',
  ].join('\n'),
  reranking: [
    'import sys',
    'from sentence_transformers import CrossEncoder',
    'CrossEncoder(sys.argv[1], device=sys.argv[2], cache_folder=sys.argv[3])',
  ].join('\n'),
  whisper: [
    'import sys',
    'from faster_whisper import WhisperModel',
    'WhisperModel(sys.argv[1], device=sys.argv[2], compute_type=sys.argv[4], download_root=sys.argv[3])',
  ].join('\n'),
  tiktoken: ['import sys', 'import tiktoken', 'tiktoken.get_encoding(sys.argv[1])'].join('\n'),
};

export interface CommandModelFetcherOptions {
  runner: CommandRunner;
  /** Interpreter with the model libraries installed, unless a fetch names its own */
  python: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Fetches models by running the model libraries' own loaders, which download
 * into the target directory as a side effect.
 */
export class CommandModelFetcher implements ModelFetcher {
  constructor(private readonly options: CommandModelFetcherOptions) {}

  async fetch(request: ModelRequest, targetDir: string, options: FetchOptions = {}): Promise<void> {
    const env: Record<string, string> = {
      ...this.options.env,
      HF_HUB_DISABLE_TELEMETRY: '1',
      HF_HOME: targetDir,
    };
    if (request.kind === 'tiktoken') env.TIKTOKEN_CACHE_DIR = targetDir;

    const runner = options.runner ?? this.options.runner;
    await runner.run({
      command: options.python ?? this.options.python,
      args: ['-c', SNIPPETS[request.kind], request.id, request.device, targetDir, request.precision],
      env,
      timeoutMs: this.options.timeoutMs,
      signal: options.signal,
    });
  }
}
