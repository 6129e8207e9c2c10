import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ArtifactEngine, pathExists, removeDir, setLogLevel, LogLevel } from '@stagecraft/core';
import type { StageEvent } from '@stagecraft/core';
import { resolveBuildConfiguration } from '../config/resolver.js';
import type { BuildConfiguration } from '../config/parameters.js';
import { selectDependencySet } from '../dependencySelection.js';
import { createImageConfig, runtimeLayout } from '../assembly/imageConfig.js';
import { RecordedOwnership } from '../assembly/permissions.js';
import { ASSEMBLE_STAGE, createAssembleStage, readImageConfig } from '../stages/assemble.stage.js';
import type { AssembleInput } from '../stages/assemble.stage.js';
import { makeTempDir, writeFiles } from './helpers.js';

setLogLevel(LogLevel.Error);

describe('assemble stage', () => {
  let root: string;
  let events: StageEvent[];
  let engine: ArtifactEngine;
  let ownership: RecordedOwnership;

  beforeEach(async () => {
    root = await makeTempDir('assemble');
    events = [];
    engine = new ArtifactEngine({ root: path.join(root, 'store'), onEvent: (event) => events.push(event) });
    ownership = new RecordedOwnership();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function fixtureStage(kind: string, entry: string, files: Record<string, string>) {
    return engine.createStage({
      kind,
      fn: async (_input, { dataDir }) => {
        await writeFiles(path.join(dataDir, entry), files);
        return { entry };
      },
    });
  }

  function defineStage(config: BuildConfiguration) {
    const frontend = fixtureStage('frontend-fixture', 'out', {
      'build/index.html': '<html></html>',
      'build/.env': 'TOKEN=test-secret',
      'package.json': '{"version":"1.2.0"}',
      'CHANGELOG.md': '# Changelog\n',
    });
    const backend =
      config.profile === 'single-binary'
        ? fixtureStage('binary-fixture', 'dist', { backend_app: 'binary', 'start.sh': '#!/bin/sh\n' })
        : fixtureStage('backend-fixture', 'backend', {
            'app/main.py': 'print("serving")\n',
            'start.sh': '#!/bin/sh\n',
            '.venv/bin/python': '#!/usr/bin/env python3\n',
            '.git/HEAD': 'ref: refs/heads/main\n',
          });
    const models = fixtureStage('models-fixture', 'data', { 'cache/tiktoken/cl100k_base': 'bpe' });

    const stage = createAssembleStage(engine, {
      frontend: frontend.config({ input: {} }),
      backend: backend.config({ input: {} }),
      models: models.config({ input: {} }),
      ownership,
    });
    const input: AssembleInput = {
      profile: config.profile,
      revision: config.buildHash,
      startScript: runtimeLayout(config).startScript,
      image: createImageConfig(config, selectDependencySet(config), { port: 8080 }),
    };
    return { stage, input };
  }

  it('should compose the environment profile tree', async () => {
    const config = resolveBuildConfiguration({ UID: 4242, GID: 4343, BUILD_HASH: 'rev-7' });
    const { stage, input } = defineStage(config);

    const imageDir = await stage({ input });
    const app = path.join(imageDir, 'rootfs', 'app');

    expect((await fs.readdir(app)).sort()).toEqual(['CHANGELOG.md', 'backend', 'build', 'package.json', 'version.json']);
    expect(await fs.readFile(path.join(app, 'build', 'index.html'), 'utf-8')).toBe('<html></html>');
    expect(await pathExists(path.join(app, 'build', '.env'))).toBe(false);
    expect(await pathExists(path.join(app, 'backend', '.git'))).toBe(false);
    expect(await pathExists(path.join(app, 'backend', '.venv', 'bin', 'python'))).toBe(true);
    expect(await fs.readFile(path.join(app, 'backend', 'data', 'cache', 'tiktoken', 'cl100k_base'), 'utf-8')).toBe('bpe');
    expect(JSON.parse(await fs.readFile(path.join(app, 'version.json'), 'utf-8'))).toEqual({
      revision: 'rev-7',
      profile: 'environment',
    });
    expect((await fs.stat(path.join(app, 'backend', 'start.sh'))).mode & 0o111).toBe(0o111);
  });

  it('should record the runtime identity for the tree and write the image config', async () => {
    const config = resolveBuildConfiguration({ UID: 4242, GID: 4343 });
    const { stage, input } = defineStage(config);

    const imageDir = await stage({ input });
    const rootfs = path.join(imageDir, 'rootfs');

    // owners are recorded against the workspace the stage ran in
    const owners = Object.entries(ownership.entries(path.parse(root).root));
    expect(owners.some(([target]) => target.endsWith('rootfs/app/backend/app/main.py'))).toBe(true);
    expect(new Set(owners.map(([, owner]) => `${owner.uid}:${owner.gid}`))).toEqual(new Set(['4242:4343']));
    expect((await fs.stat(path.join(rootfs, 'app', 'backend'))).mode & 0o2020).toBe(0o2020);

    const image = await readImageConfig(imageDir);
    expect(image).toEqual(input.image);
    expect(image.user).toBe('4242:4343');
    expect(image.cmd).toEqual(['/app/backend/start.sh']);
    expect(image.workdir).toBe('/app/backend');
    expect(image.entrypoint).toEqual(['/usr/bin/tini', '--']);
  });

  it('should place the executable at the top of the single-binary tree', async () => {
    const config = resolveBuildConfiguration({ PROFILE: 'single-binary', BASE_FLAVOR: 'debian-slim' });
    const { stage, input } = defineStage(config);

    const imageDir = await stage({ input });
    const app = path.join(imageDir, 'rootfs', 'app');

    expect((await fs.readdir(app)).sort()).toEqual([
      'CHANGELOG.md',
      'backend',
      'backend_app',
      'build',
      'package.json',
      'start.sh',
      'version.json',
    ]);
    expect(await fs.readdir(path.join(app, 'backend'))).toEqual(['data']);
    expect(input.image.base).toBe('debian:bookworm-slim');
    expect(input.image.cmd).toEqual(['/app/start.sh']);
  });

  it('should start only after every input stage completed', async () => {
    const { stage, input } = defineStage(resolveBuildConfiguration());

    await stage({ input });

    const assembleStart = events.findIndex((e) => e.kind === ASSEMBLE_STAGE && e.type === 'stage:start');
    const completions = events.filter((e) => e.type === 'stage:complete' && e.kind !== ASSEMBLE_STAGE);
    expect(completions.map((e) => e.kind).sort()).toEqual(['backend-fixture', 'frontend-fixture', 'models-fixture']);
    for (const completion of completions) {
      expect(events.indexOf(completion)).toBeLessThan(assembleStart);
    }
  });
});
