import { describe, it, expect } from 'vitest';
import { resolveBuildConfiguration } from '../config/resolver.js';
import { runtimeEnvironment } from '../runtimeEnv.js';

describe('runtimeEnvironment', () => {
  it('should keep a disabled model as an empty value', () => {
    const env = runtimeEnvironment(resolveBuildConfiguration(), { port: 8080 });

    expect(env).toHaveProperty('RAG_RERANKING_MODEL', '');
    expect(env.RAG_EMBEDDING_MODEL).toBe('sentence-transformers/all-MiniLM-L6-v2');
    expect(env.WHISPER_MODEL).toBe('base');
  });

  it('should point the model libraries at the runtime data directory', () => {
    const env = runtimeEnvironment(resolveBuildConfiguration(), { port: 8080 });

    expect(env.SENTENCE_TRANSFORMERS_HOME).toBe('/app/backend/data/cache/embedding/models');
    expect(env.HF_HOME).toBe('/app/backend/data/cache/embedding/models');
    expect(env.WHISPER_MODEL_DIR).toBe('/app/backend/data/cache/whisper/models');
    expect(env.TIKTOKEN_CACHE_DIR).toBe('/app/backend/data/cache/tiktoken');
  });

  it('should select the inference runtime endpoint', () => {
    expect(runtimeEnvironment(resolveBuildConfiguration(), { port: 8080 }).OLLAMA_BASE_URL).toBe(
      'http://host.docker.internal:11434'
    );
    expect(runtimeEnvironment(resolveBuildConfiguration({ USE_OLLAMA: true }), { port: 8080 }).OLLAMA_BASE_URL).toBe(
      '/ollama'
    );
  });

  it('should declare secrets without values', () => {
    const env = runtimeEnvironment(resolveBuildConfiguration(), { port: 3000, threads: 4 });

    expect(env.APP_SECRET_KEY).toBe('');
    expect(env.PORT).toBe('3000');
    expect(env.OMP_NUM_THREADS).toBe('4');
    expect(env.USE_CUDA_DOCKER).toBe('false');
  });
});
