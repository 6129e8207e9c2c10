/**
 * Artifact graph helpers
 */

import * as fsp from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import {
  FS_DATA_VERSION,
  DATA_LINK_FILENAME,
  DATA_SPACE_DIRNAME,
  TEMP_PREFIX,
  buildDataPath,
  artifactExists,
  readManifest,
  readDataLink,
  removeDir,
} from './artifact.js';
import type { ArtifactDepLink, ArtifactNodeInfo } from './types.js';

/**
 * Parse a symlink target to dep info
 */
function parseDepLinkTarget(targetPath: string, root: string): Omit<ArtifactDepLink, 'linkPath'> | null {
  // Target must point to dataLink under fs-data/<version>/<kind>/<shard>/<fingerprint>/
  const fsDataRoot = path.join(root, 'fs-data', FS_DATA_VERSION);
  const relative = path.relative(fsDataRoot, targetPath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }

  const segments = relative.split(path.sep);
  if (segments.length !== 4) return null;
  const [kind, shard, fingerprint, fileName] = segments;
  if (fileName !== DATA_LINK_FILENAME) return null;
  if (!kind || !shard || !fingerprint) return null;

  return {
    targetKind: kind,
    targetFingerprint: fingerprint,
    targetPath: path.join(fsDataRoot, kind, shard, fingerprint),
  };
}

async function readDirents(dir: string): Promise<Dirent[]> {
  try {
    return await fsp.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }
}

/**
 * Dep mounts are symlinks at the top of data-space or one directory below
 * (`deps/frontend`); deeper trees belong to the stage's own output.
 */
async function discoverDepLinks(dataPath: string, root: string): Promise<ArtifactDepLink[]> {
  const dataSpacePath = path.join(dataPath, DATA_SPACE_DIRNAME);
  const depLinks: ArtifactDepLink[] = [];

  const visit = async (dir: string, depth: number): Promise<void> => {
    for (const dirent of await readDirents(dir)) {
      const fullPath = path.join(dir, dirent.name);
      if (dirent.isSymbolicLink()) {
        const linkTarget = await fsp.readlink(fullPath);
        const parsed = parseDepLinkTarget(path.resolve(path.dirname(fullPath), linkTarget), root);
        if (parsed) {
          depLinks.push({ linkPath: path.relative(dataSpacePath, fullPath), ...parsed });
        }
      } else if (dirent.isDirectory() && depth < 1) {
        await visit(fullPath, depth + 1);
      }
    }
  };

  await visit(dataSpacePath, 0);
  return depLinks.sort((a, b) => a.linkPath.localeCompare(b.linkPath));
}

/**
 * Read artifact node info
 */
export async function readArtifactNode(
  root: string,
  kind: string,
  fingerprint: string
): Promise<ArtifactNodeInfo | null> {
  const dataPath = buildDataPath(root, kind, fingerprint);
  if (!(await artifactExists(dataPath))) {
    return null;
  }

  const manifest = await readManifest(dataPath);
  let entryPath: string | null = null;
  try {
    entryPath = await readDataLink(dataPath);
    await fsp.stat(entryPath);
  } catch {
    entryPath = null;
  }

  return {
    kind,
    fingerprint,
    dataPath,
    entryPath,
    manifest,
    deps: await discoverDepLinks(dataPath, root),
  };
}

/**
 * List all promoted artifacts under root
 */
export async function listArtifacts(root: string): Promise<ArtifactNodeInfo[]> {
  const fsDataRoot = path.join(root, 'fs-data', FS_DATA_VERSION);
  const nodes: ArtifactNodeInfo[] = [];

  for (const kindDir of await readDirents(fsDataRoot)) {
    if (!kindDir.isDirectory()) continue;
    const kind = kindDir.name;

    for (const shardDir of await readDirents(path.join(fsDataRoot, kind))) {
      if (!shardDir.isDirectory()) continue;

      for (const idDir of await readDirents(path.join(fsDataRoot, kind, shardDir.name))) {
        if (!idDir.isDirectory()) continue;
        // temp dirs may linger after a crash
        if (idDir.name.startsWith(TEMP_PREFIX)) continue;
        const node = await readArtifactNode(root, kind, idDir.name);
        if (node) {
          nodes.push(node);
        }
      }
    }
  }

  return nodes;
}

/**
 * Delete one artifact by fingerprint (idempotent)
 */
export async function removeArtifact(root: string, kind: string, fingerprint: string): Promise<void> {
  if (kind.includes('/') || kind.includes('\\') || fingerprint.includes('/') || fingerprint.includes('\\')) {
    throw new Error(`Invalid artifact id ${kind}:${fingerprint}`);
  }
  await removeDir(buildDataPath(root, kind, fingerprint));
}

/** Temp directories younger than this may belong to a build still running */
export const DEFAULT_TEMP_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export interface PruneOptions {
  /** Minimum age, by modification time, of a removed directory */
  olderThanMs?: number;
  now?: number;
}

/**
 * Remove `.tmp-` directories under `<layoutRoot>/<kind>/<shard>/` that are
 * older than the age limit. Returned paths are relative to `layoutRoot`.
 */
export async function pruneTempEntries(layoutRoot: string, options: PruneOptions = {}): Promise<string[]> {
  const cutoff = (options.now ?? Date.now()) - (options.olderThanMs ?? DEFAULT_TEMP_MAX_AGE_MS);
  const removed: string[] = [];
  for (const kindDir of await readDirents(layoutRoot)) {
    if (!kindDir.isDirectory()) continue;
    for (const shardDir of await readDirents(path.join(layoutRoot, kindDir.name))) {
      if (!shardDir.isDirectory()) continue;
      const shardPath = path.join(layoutRoot, kindDir.name, shardDir.name);
      for (const entry of await readDirents(shardPath)) {
        if (!entry.name.startsWith(TEMP_PREFIX)) continue;
        const tempPath = path.join(shardPath, entry.name);
        if ((await fsp.lstat(tempPath)).mtimeMs > cutoff) continue;
        await removeDir(tempPath);
        removed.push(path.join(kindDir.name, shardDir.name, entry.name));
      }
    }
  }
  return removed;
}

/**
 * Remove temp directories left in the artifact store by interrupted runs
 */
export async function pruneTempDirs(root: string, options: PruneOptions = {}): Promise<string[]> {
  return pruneTempEntries(path.join(root, 'fs-data', FS_DATA_VERSION), options);
}
