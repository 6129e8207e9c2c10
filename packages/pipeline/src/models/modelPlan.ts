/**
 * Model requests derived from the build configuration
 */

import { z } from 'zod';
import { generateFingerprint } from '@stagecraft/core';
import type { BuildConfiguration } from '../config/parameters.js';
import { isDisabled } from '../config/parameters.js';

export const MODEL_KINDS = ['embedding', 'whisper', 'tiktoken', 'reranking'] as const;

export const modelRequestSchema = z.object({
  kind: z.enum(MODEL_KINDS),
  id: z.string().min(1),
  device: z.literal('cpu'),
  precision: z.enum(['float32', 'int8', 'bpe']),
  /** Pinned tree digest */
  sha256: z.string().optional(),
});

export type ModelKind = (typeof MODEL_KINDS)[number];
export type ModelRequest = z.infer<typeof modelRequestSchema>;

/**
 * Where each kind lands inside the runtime data directory. Embedding and
 * reranking models share one hub cache.
 */
export const MODEL_DATA_LAYOUT: Record<ModelKind, string> = {
  embedding: 'cache/embedding/models',
  reranking: 'cache/embedding/models',
  whisper: 'cache/whisper/models',
  tiktoken: 'cache/tiktoken',
};

export function digestPinKey(kind: ModelKind, id: string): string {
  return `${kind}:${id}`;
}

/**
 * Requests in fetch order: embedding, whisper, tiktoken, reranking.
 * Disabled models are left out.
 */
export function planModelRequests(
  config: BuildConfiguration,
  digests: Readonly<Record<string, string>> = {}
): ModelRequest[] {
  const candidates: Array<Pick<ModelRequest, 'kind' | 'id' | 'precision'>> = [
    { kind: 'embedding', id: config.embeddingModel, precision: 'float32' },
    { kind: 'whisper', id: config.whisperModel, precision: 'int8' },
    { kind: 'tiktoken', id: config.tiktokenEncoding, precision: 'bpe' },
    { kind: 'reranking', id: config.rerankingModel, precision: 'float32' },
  ];

  return candidates
    .filter((candidate) => !isDisabled(candidate.id))
    .map((candidate) => {
      const request: ModelRequest = { ...candidate, device: 'cpu' };
      const pinned = digests[digestPinKey(candidate.kind, candidate.id)];
      if (pinned !== undefined) request.sha256 = pinned;
      return request;
    });
}

/**
 * Cache key: identical (kind, id, device, precision) always maps to the same
 * entry. A pinned digest is an expectation about the entry, not part of it.
 */
export function modelCacheKey(request: ModelRequest): string {
  return generateFingerprint(request.kind, {
    id: request.id,
    device: request.device,
    precision: request.precision,
  });
}

export function describeModel(request: ModelRequest): string {
  return `${request.kind}:${request.id}`;
}
