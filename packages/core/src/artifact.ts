/**
 * On-disk artifact layout
 *
 * fs-data/<version>/<kind>/<shard>/<fingerprint>/
 *   .artifact-manifest.json
 *   data-space/        stage workspace (deps mounted as symlinks)
 *   dataLink ->        data-space/<entry>
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ArtifactManifest } from './types.js';

export const MANIFEST_FILENAME = '.artifact-manifest.json';

export const DATA_LINK_FILENAME = 'dataLink';

/** Stage workspace directory name */
export const DATA_SPACE_DIRNAME = 'data-space';

export const MANIFEST_VERSION = '1.0.0';

/** Store layout version; bump to invalidate every artifact */
export const FS_DATA_VERSION = '1.0.0';

export const TEMP_PREFIX = '.tmp-';

export function assertSafeRelativePath(value: string, name: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`${name} must be a non-empty relative path`);
  }
  if (value.includes('\0')) {
    throw new Error(`${name} must not contain null bytes`);
  }
  if (path.isAbsolute(value)) {
    throw new Error(`${name} must be a relative path`);
  }
  const segments = value.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..')) {
    throw new Error(`${name} must not contain ".." segments`);
  }
  return value;
}

/**
 * Serialize with object keys sorted at every level. Array order is kept:
 * argument lists and install orders are significant.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}';
}

export function sha256Hex(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Fingerprint of a stage invocation: kind, input and the fingerprints of
 * every consumed artifact.
 */
export function generateFingerprint(
  kind: string,
  input: Record<string, unknown>,
  deps: Record<string, string> = {}
): string {
  return sha256Hex(stableStringify({ kind, input, deps }));
}

/** Shard directory: first two hex characters of a fingerprint or cache key */
export function getShard(fingerprint: string): string {
  return fingerprint.slice(0, 2);
}

/**
 * Directory an artifact is promoted to
 * @param root store root (`cacheRoot`)
 */
export function buildDataPath(root: string, kind: string, fingerprint: string): string {
  return path.join(root, 'fs-data', FS_DATA_VERSION, kind, getShard(fingerprint), fingerprint);
}

/**
 * Fresh temp directory in the artifact's shard, so promotion is a
 * same-device rename. Concurrent builds of one fingerprint get distinct paths.
 */
export function buildTempPath(root: string, kind: string, fingerprint: string): string {
  const random = Math.random().toString(36).slice(2, 10);
  const shardDir = path.dirname(buildDataPath(root, kind, fingerprint));
  return path.join(shardDir, `${TEMP_PREFIX}${fingerprint}-${random}`);
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * An artifact exists once its manifest is in place; the manifest is written
 * last, before promotion.
 */
export async function artifactExists(dataPath: string): Promise<boolean> {
  return pathExists(path.join(dataPath, MANIFEST_FILENAME));
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArtifactManifest(value: unknown): value is ArtifactManifest {
  if (!isRecord(value)) return false;
  return (
    typeof value.manifestVersion === 'string' &&
    typeof value.kind === 'string' &&
    typeof value.fingerprint === 'string' &&
    isRecord(value.input) &&
    isStringRecord(value.deps) &&
    typeof value.toolchain === 'string' &&
    isRecord(value.metadata) &&
    typeof value.createdAt === 'string' &&
    typeof value.durationMs === 'number'
  );
}

export async function readManifest(dataPath: string): Promise<ArtifactManifest> {
  const manifestPath = path.join(dataPath, MANIFEST_FILENAME);
  const content = await fs.readFile(manifestPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse manifest at ${manifestPath}: ${message}`);
  }
  if (!isArtifactManifest(parsed)) {
    throw new Error(`Malformed manifest at ${manifestPath}`);
  }
  return parsed;
}

export async function writeManifest(dataPath: string, manifest: ArtifactManifest): Promise<void> {
  const manifestPath = path.join(dataPath, MANIFEST_FILENAME);
  await fs.writeFile(manifestPath, JSON.stringify(manifest, null, 2), 'utf-8');
}

/**
 * Point the artifact's dataLink at the entry its stage returned. The link
 * is relative, so the artifact survives the rename from its temp path.
 * @param dataPath artifact directory (temp or final)
 * @param entry relative to data-space
 */
export async function createDataLink(dataPath: string, entry: string): Promise<void> {
  const linkPath = path.join(dataPath, DATA_LINK_FILENAME);
  const safeEntry = assertSafeRelativePath(entry, 'entry');
  await fs.symlink(path.join(DATA_SPACE_DIRNAME, safeEntry), linkPath);
}

/**
 * Absolute entry path behind dataLink. A link that escapes data-space is
 * rejected rather than followed.
 */
export async function readDataLink(dataPath: string): Promise<string> {
  const linkPath = path.join(dataPath, DATA_LINK_FILENAME);
  const target = await fs.readlink(linkPath);
  const resolved = path.resolve(dataPath, target);

  const dataSpacePath = path.resolve(dataPath, DATA_SPACE_DIRNAME);
  const relative = path.relative(dataSpacePath, resolved);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`dataLink points outside of data-space: ${resolved}`);
  }

  return resolved;
}

/**
 * Mount a consumed artifact into a stage workspace: a relative symlink from
 * the mount point to that artifact's dataLink, so the mount resolves to its
 * entry.
 * @param mountPath absolute path inside the consuming stage's data-space
 * @param targetDataPath final directory of the consumed artifact
 */
export async function createDepLink(mountPath: string, targetDataPath: string): Promise<void> {
  await fs.mkdir(path.dirname(mountPath), { recursive: true });
  const target = path.relative(path.dirname(mountPath), path.join(targetDataPath, DATA_LINK_FILENAME));
  await fs.symlink(target, mountPath);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Promote a finished temp directory by rename; the first writer of a path
 * wins and later ones find it taken.
 * @returns true if this call won, false if the target already existed
 */
export async function atomicRename(tempPath: string, targetPath: string): Promise<boolean> {
  try {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.rename(tempPath, targetPath);
    return true;
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code === 'EEXIST' || code === 'ENOTEMPTY') {
      return false;
    }
    throw err;
  }
}

/** Recursive delete; a missing path is not an error */
export async function removeDir(dirPath: string): Promise<void> {
  await fs.rm(dirPath, { recursive: true, force: true });
}

export function createManifest(params: {
  kind: string;
  fingerprint: string;
  input: Record<string, unknown>;
  deps?: Record<string, string>;
  toolchain?: string;
  metadata?: Record<string, unknown>;
  durationMs?: number;
}): ArtifactManifest {
  return {
    manifestVersion: MANIFEST_VERSION,
    kind: params.kind,
    fingerprint: params.fingerprint,
    input: params.input,
    deps: params.deps ?? {},
    toolchain: params.toolchain ?? 'host',
    metadata: params.metadata ?? {},
    createdAt: new Date().toISOString(),
    durationMs: params.durationMs ?? 0,
  };
}
