import { describe, it, expect } from 'vitest';
import { resolveBuildConfiguration } from '../config/resolver.js';
import { describeModel, modelCacheKey, planModelRequests } from '../models/modelPlan.js';

describe('planModelRequests', () => {
  it('should request the default models on CPU', () => {
    expect(planModelRequests(resolveBuildConfiguration())).toEqual([
      { kind: 'embedding', id: 'sentence-transformers/all-MiniLM-L6-v2', device: 'cpu', precision: 'float32' },
      { kind: 'whisper', id: 'base', device: 'cpu', precision: 'int8' },
      { kind: 'tiktoken', id: 'cl100k_base', device: 'cpu', precision: 'bpe' },
    ]);
  });

  it('should leave disabled models out', () => {
    const config = resolveBuildConfiguration({ USE_WHISPER_MODEL: '', USE_RERANKING_MODEL: 'BAAI/bge-reranker-base' });

    expect(planModelRequests(config).map(describeModel)).toEqual([
      'embedding:sentence-transformers/all-MiniLM-L6-v2',
      'tiktoken:cl100k_base',
      'reranking:BAAI/bge-reranker-base',
    ]);
  });

  it('should attach pinned digests', () => {
    const pin = 'a'.repeat(64);
    const requests = planModelRequests(resolveBuildConfiguration(), { 'tiktoken:cl100k_base': pin });

    expect(requests.find((r) => r.kind === 'tiktoken')?.sha256).toBe(pin);
    expect(requests.find((r) => r.kind === 'embedding')).not.toHaveProperty('sha256');
  });
});

describe('modelCacheKey', () => {
  it('should not depend on the pinned digest', () => {
    const [request] = planModelRequests(resolveBuildConfiguration());
    if (!request) throw new Error('no request planned');

    expect(modelCacheKey({ ...request, sha256: 'b'.repeat(64) })).toBe(modelCacheKey(request));
    expect(modelCacheKey({ ...request, precision: 'int8' })).not.toBe(modelCacheKey(request));
    expect(modelCacheKey(request)).toMatch(/^[a-f0-9]{64}$/);
  });
});
