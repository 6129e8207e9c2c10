import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ModelFetchError, pathExists, removeDir, setLogLevel, LogLevel } from '@stagecraft/core';
import type { StageEvent } from '@stagecraft/core';
import { resolveBuildConfiguration } from '../config/resolver.js';
import { resolveProjectConfig } from '../config/projectConfig.js';
import type { ProjectConfig } from '../config/projectConfig.js';
import { RecordedOwnership } from '../assembly/permissions.js';
import { readImageConfig } from '../stages/assemble.stage.js';
import { definePipeline, planBuild, runBuild } from '../pipeline.js';
import type { PipelineOptions } from '../pipeline.js';
import { FakeFetcher, createProjectFixture, createToolchainRunner, makeTempDir, writeFiles } from './helpers.js';
import type { FakeRunner } from './helpers.js';

setLogLevel(LogLevel.Error);

describe('build pipeline', () => {
  let root: string;
  let project: ProjectConfig;
  let runner: FakeRunner;
  let fetcher: FakeFetcher;
  let events: StageEvent[];

  beforeEach(async () => {
    root = await makeTempDir('pipeline');
    await createProjectFixture(root);
    project = resolveProjectConfig({ fetchRetry: { attempts: 1, baseDelayMs: 0, maxDelayMs: 0 } }, root);
    runner = createToolchainRunner();
    fetcher = new FakeFetcher();
    events = [];
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function options(overrides: Record<string, unknown> = {}, rebuild = false): PipelineOptions {
    return {
      config: resolveBuildConfiguration(overrides),
      project,
      runner,
      fetcher,
      ownership: new RecordedOwnership(),
      onEvent: (event) => events.push(event),
      rebuild,
    };
  }

  function started(): string[] {
    return events.filter((e) => e.type === 'stage:start').map((e) => e.kind).sort();
  }

  it('should build and publish the environment profile image', async () => {
    const result = await runBuild(options({ BUILD_HASH: 'rev-1' }));
    const app = path.join(project.outDir, 'rootfs', 'app');

    expect(result.outDir).toBe(project.outDir);
    expect(started()).toEqual(['assemble', 'backend-environment', 'frontend', 'model-prefetch']);
    expect(await fs.readFile(path.join(app, 'build', 'index.html'), 'utf-8')).toBe('<html>rev-1</html>');
    expect(await fs.readFile(path.join(app, 'backend', 'app', 'main.py'), 'utf-8')).toBe('print("serving")\n');
    expect(
      await fs.readFile(path.join(app, 'backend', 'data', 'cache', 'embedding', 'models', 'snapshots', 'weights.bin'), 'utf-8')
    ).toBe('embedding:sentence-transformers/all-MiniLM-L6-v2:float32');
    expect(fetcher.calls).toEqual([
      'embedding:sentence-transformers/all-MiniLM-L6-v2',
      'whisper:base',
      'tiktoken:cl100k_base',
    ]);

    const image = await readImageConfig(project.outDir);
    expect(image.cmd).toEqual(['/app/backend/start.sh']);
    expect(image.labels['org.opencontainers.image.revision']).toBe('rev-1');
    expect(result.image).toEqual(image);
  });

  it('should reuse every artifact when nothing changed', async () => {
    const first = await runBuild(options());
    const commands = runner.calls.length;
    events = [];

    const second = await runBuild(options());

    expect(second.fingerprint).toBe(first.fingerprint);
    expect(events.map((e) => `${e.type}:${e.kind}`)).toEqual(['stage:cached:assemble']);
    expect(runner.calls).toHaveLength(commands);
    expect(fetcher.calls).toHaveLength(3);
  });

  it('should rebuild only what depends on a changed source', async () => {
    await runBuild(options());
    events = [];

    await writeFiles(root, { 'src/main.ts': 'export const app = 2;\n' });
    await runBuild(options());

    expect(started()).toEqual(['assemble', 'frontend']);
    expect(
      events.filter((e) => e.type === 'stage:cached').map((e) => e.kind).sort()
    ).toEqual(['backend-environment', 'model-prefetch']);
  });

  it('should ignore its own cache and output when digesting sources', async () => {
    await runBuild(options());
    await writeFiles(path.join(project.cacheRoot, 'downloads', 'npm'), { 'index.json': '{}' });
    events = [];

    await runBuild(options());

    expect(started()).toEqual([]);
  });

  it('should build with the default cache and output inside the project root', async () => {
    project = resolveProjectConfig({}, root);
    expect(path.relative(root, project.cacheRoot)).toBe(path.join('.stagecraft', 'cache'));
    expect(path.relative(root, project.outDir)).toBe(path.join('.stagecraft', 'image'));

    const copied: string[][] = [];
    runner.on(/^npm run build$/, async (spec) => {
      copied.push((await fs.readdir(spec.cwd ?? '')).sort());
      await writeFiles(spec.cwd ?? '', { 'build/index.html': '<html>default layout</html>' });
      return {};
    });

    await runBuild(options({ BUILD_HASH: 'rev-1' }));
    const app = path.join(project.outDir, 'rootfs', 'app');

    expect(started()).toEqual(['assemble', 'backend-environment', 'frontend', 'model-prefetch']);
    expect(copied).toHaveLength(1);
    expect(copied[0]).toContain('package.json');
    expect(copied[0]).not.toContain('.stagecraft');
    expect(await fs.readFile(path.join(app, 'build', 'index.html'), 'utf-8')).toBe('<html>default layout</html>');

    events = [];
    await runBuild(options({ BUILD_HASH: 'rev-1' }));
    expect(started()).toEqual([]);
  });

  it('should rerun every stage without refetching models on rebuild', async () => {
    await runBuild(options());
    events = [];

    await runBuild(options({}, true));

    expect(started()).toEqual(['assemble', 'backend-environment', 'frontend', 'model-prefetch']);
    expect(fetcher.calls).toHaveLength(3);
  });

  it('should package the single-binary profile', async () => {
    await runBuild(options({ PROFILE: 'single-binary', BASE_FLAVOR: 'debian-slim' }));
    const app = path.join(project.outDir, 'rootfs', 'app');

    expect(started()).toEqual(['assemble', 'backend-environment', 'frontend', 'model-prefetch', 'single-binary']);
    expect(await fs.readFile(path.join(app, 'backend_app'), 'utf-8')).toBe('binary');
    expect(await pathExists(path.join(app, 'start.sh'))).toBe(true);
    expect(runner.lines).toContain('backend_app --smoke-test');
    expect((await readImageConfig(project.outDir)).cmd).toEqual(['/app/start.sh']);
  });

  it('should publish nothing when a model cannot be fetched', async () => {
    fetcher.fail('whisper:base', 'empty');

    const failure = await runBuild(options()).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ModelFetchError);
    expect(failure).toMatchObject({ stage: 'model-prefetch', model: 'base' });
    expect(await pathExists(project.outDir)).toBe(false);
  });

  it('should plan the stage graph without running anything', async () => {
    const plan = await planBuild(options({ PROFILE: 'single-binary' }));

    expect(plan.graph.kind).toBe('assemble');
    expect(Object.keys(plan.graph.deps)).toEqual(['deps/frontend', 'deps/backend', 'deps/models']);
    expect(plan.graph.deps['deps/backend']?.kind).toBe('single-binary');
    expect(Object.keys(plan.graph.deps['deps/backend']?.deps ?? {})).toEqual(['deps/backend', 'deps/models']);
    expect(plan.graph.cached).toBe(false);
    expect(plan.configuration.PROFILE).toBe('single-binary');
    expect(plan.modelRequests).toHaveLength(3);
    expect(runner.calls).toEqual([]);
    expect(fetcher.calls).toEqual([]);
  });

  it('should key the backend environment by dependency selection', async () => {
    const cpu = await planBuild(options());
    const cuda = await planBuild(options({ USE_CUDA: true }));

    expect(cuda.graph.deps['deps/backend']?.fingerprint).not.toBe(cpu.graph.deps['deps/backend']?.fingerprint);
    expect(cuda.graph.deps['deps/frontend']?.fingerprint).toBe(cpu.graph.deps['deps/frontend']?.fingerprint);
    expect(cuda.graph.deps['deps/models']?.fingerprint).toBe(cpu.graph.deps['deps/models']?.fingerprint);
  });

  it('should register the packaging stage only for the single-binary profile', async () => {
    expect((await definePipeline(options())).stages.binary).toBeUndefined();
    expect((await definePipeline(options({ PROFILE: 'single-binary' }))).stages.binary?.kind).toBe('single-binary');
  });
});
