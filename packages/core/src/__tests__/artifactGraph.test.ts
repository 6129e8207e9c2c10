import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs/promises';
import { ArtifactEngine } from '../engine.js';
import { listArtifacts, readArtifactNode, removeArtifact, pruneTempDirs, DEFAULT_TEMP_MAX_AGE_MS } from '../artifactGraph.js';
import { removeDir, FS_DATA_VERSION, createManifest, writeManifest } from '../artifact.js';
import { setLogLevel, LogLevel } from '../logger.js';

setLogLevel(LogLevel.Error);

describe('artifact graph', () => {
  let tempRoot: string;
  let engine: ArtifactEngine;

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'artifact-graph-'));
    engine = new ArtifactEngine({ root: tempRoot });
  });

  afterEach(async () => {
    await removeDir(tempRoot);
  });

  function defineGraph() {
    const leaf = engine.createStage({
      kind: 'leaf',
      fn: async (_input, { dataDir }) => {
        await fs.writeFile(path.join(dataDir, 'leaf.txt'), 'leaf');
        return { entry: 'leaf.txt' };
      },
    });

    return engine.createStage({
      kind: 'parent',
      deps: {
        'deps/leaf': leaf.config({ input: {} }),
      },
      fn: async (input: { message: string }, { dataDir }) => {
        await fs.writeFile(path.join(dataDir, 'parent.txt'), `parent-${input.message}`);
        return { entry: 'parent.txt' };
      },
    });
  }

  it('should surface manifests, entries and deps', async () => {
    const parent = defineGraph();
    const entryPath = await parent({ input: { message: 'hello' } });
    expect(await fs.readFile(entryPath, 'utf-8')).toBe('parent-hello');

    const nodes = await listArtifacts(tempRoot);
    expect(nodes).toHaveLength(2);

    const parentNode = nodes.find((n) => n.kind === 'parent');
    expect(parentNode?.entryPath?.endsWith('/parent.txt')).toBe(true);
    expect(parentNode?.manifest.input).toEqual({ message: 'hello' });
    expect(parentNode?.deps).toHaveLength(1);
    expect(parentNode?.deps[0]?.linkPath).toBe(path.join('deps', 'leaf'));
    expect(parentNode?.deps[0]?.targetKind).toBe('leaf');
    expect(parentNode?.deps[0]?.targetFingerprint).toBe(engine.fingerprint('leaf', {}));
  });

  it('should read a single node and return null for unknown fingerprints', async () => {
    await defineGraph()({ input: { message: 'x' } });
    const fingerprint = engine.fingerprint('leaf', {});

    const node = await readArtifactNode(tempRoot, 'leaf', fingerprint);
    expect(node?.fingerprint).toBe(fingerprint);
    expect(node?.deps).toEqual([]);
    expect(await readArtifactNode(tempRoot, 'leaf', 'f'.repeat(64))).toBeNull();
  });

  it('should ignore lingering temp dirs and prune them', async () => {
    await defineGraph()({ input: { message: 'x' } });

    const tmpDir = path.join(tempRoot, 'fs-data', FS_DATA_VERSION, 'leaf', '00', '.tmp-deadbeef-deadbeef');
    await fs.mkdir(tmpDir, { recursive: true });
    await writeManifest(tmpDir, createManifest({ kind: 'leaf', fingerprint: 'deadbeef', input: {} }));

    const nodes = await listArtifacts(tempRoot);
    expect(nodes.map((n) => n.fingerprint)).not.toContain('.tmp-deadbeef-deadbeef');
    expect(nodes).toHaveLength(2);

    const stale = new Date(Date.now() - 2 * DEFAULT_TEMP_MAX_AGE_MS);
    await fs.utimes(tmpDir, stale, stale);
    expect(await pruneTempDirs(tempRoot)).toEqual([path.join('leaf', '00', '.tmp-deadbeef-deadbeef')]);
    await expect(fs.stat(tmpDir)).rejects.toThrow();
  });

  it('should keep temp dirs younger than the age limit', async () => {
    const shard = path.join(tempRoot, 'fs-data', FS_DATA_VERSION, 'leaf', '00');
    await fs.mkdir(path.join(shard, '.tmp-running'), { recursive: true });
    await fs.mkdir(path.join(shard, '.tmp-abandoned'), { recursive: true });
    const hourAgo = new Date(Date.now() - 60 * 60 * 1000);
    await fs.utimes(path.join(shard, '.tmp-abandoned'), hourAgo, hourAgo);

    expect(await pruneTempDirs(tempRoot)).toEqual([]);
    expect(await pruneTempDirs(tempRoot, { olderThanMs: 30 * 60 * 1000 })).toEqual([
      path.join('leaf', '00', '.tmp-abandoned'),
    ]);
    expect(await fs.readdir(shard)).toEqual(['.tmp-running']);
  });

  it('should remove one artifact and leave the rest', async () => {
    await defineGraph()({ input: { message: 'x' } });

    await removeArtifact(tempRoot, 'leaf', engine.fingerprint('leaf', {}));

    const nodes = await listArtifacts(tempRoot);
    expect(nodes.map((n) => n.kind)).toEqual(['parent']);
  });

  it('should reject ids containing path separators', async () => {
    await expect(removeArtifact(tempRoot, 'leaf', '../escape')).rejects.toThrow('Invalid artifact id');
  });

  it('should return nothing for an empty store', async () => {
    expect(await listArtifacts(tempRoot)).toEqual([]);
    expect(await pruneTempDirs(tempRoot)).toEqual([]);
  });
});
