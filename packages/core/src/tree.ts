/**
 * Filesystem tree helpers shared by stages, the model cache and assembly.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createSourceFilter } from './ignorePatterns.js';

export type TreeEntryType = 'file' | 'directory' | 'symlink';

export interface TreeEntry {
  /** Path relative to the walked root, `/`-separated */
  relativePath: string;
  absolutePath: string;
  type: TreeEntryType;
}

function entryType(dirent: Dirent): TreeEntryType | null {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return null;
}

/**
 * Depth-first walk in sorted order. Symlinks are reported, never followed.
 * The root itself is not included.
 */
export async function* walkTree(
  root: string,
  options: { ignore?: (relativePath: string) => boolean } = {}
): AsyncGenerator<TreeEntry> {
  const stack: string[] = [''];
  while (stack.length) {
    const relativeDir = stack.pop() ?? '';
    const dirents = await fs.readdir(path.join(root, relativeDir), { withFileTypes: true });
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const subdirs: string[] = [];
    for (const dirent of dirents) {
      const type = entryType(dirent);
      if (!type) continue;
      const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;
      if (options.ignore?.(relativePath)) continue;
      yield { relativePath, absolutePath: path.join(root, relativePath), type };
      if (type === 'directory') subdirs.push(relativePath);
    }
    // reversed so the stack pops them in sorted order
    stack.push(...subdirs.reverse());
  }
}

async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * Content digest of a tree: relative paths, entry types, file contents and
 * symlink targets. Timestamps, owners and modes do not contribute.
 */
export async function treeDigest(
  root: string,
  options: { ignore?: (relativePath: string) => boolean } = {}
): Promise<string> {
  const hash = createHash('sha256');
  for await (const entry of walkTree(root, options)) {
    if (entry.type === 'file') {
      hash.update(`f ${entry.relativePath} ${await hashFile(entry.absolutePath)}\n`);
    } else if (entry.type === 'symlink') {
      hash.update(`l ${entry.relativePath} ${await fs.readlink(entry.absolutePath)}\n`);
    } else {
      hash.update(`d ${entry.relativePath}\n`);
    }
  }
  return hash.digest('hex');
}

/** Digest of a source tree with the default ignore patterns applied. */
export async function sourceDigest(root: string, excludedPaths: readonly string[] = []): Promise<string> {
  return treeDigest(root, { ignore: createSourceFilter(excludedPaths) });
}

export async function isEmptyTree(root: string): Promise<boolean> {
  for await (const entry of walkTree(root)) {
    if (entry.type !== 'directory') return false;
  }
  return true;
}

export interface CopyTreeOptions {
  /** Relative paths (from `source`) to leave out */
  ignore?: (relativePath: string) => boolean;
}

/** `/`-separated path of `target` below `root`, or null when it is not below it */
function nestedPath(root: string, target: string): string | null {
  const relative = path.relative(root, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return null;
  return relative.split(path.sep).join('/');
}

/**
 * Copy `source` into `destination`, merging into an existing directory.
 * A symlinked `source` (a mounted artifact) is resolved first; symlinks
 * inside the tree are copied verbatim. A `destination` inside `source` is
 * left out of the copy.
 */
export async function copyTree(source: string, destination: string, options: CopyTreeOptions = {}): Promise<void> {
  const realSource = await fs.realpath(source);
  await fs.mkdir(destination, { recursive: true });
  const nested = nestedPath(realSource, await fs.realpath(destination));
  const ignore = (relativePath: string): boolean =>
    (nested !== null && (relativePath === nested || relativePath.startsWith(`${nested}/`))) ||
    (options.ignore?.(relativePath) ?? false);

  for await (const entry of walkTree(realSource, { ignore })) {
    const target = path.join(destination, entry.relativePath);
    if (entry.type === 'directory') {
      await fs.mkdir(target, { recursive: true });
    } else if (entry.type === 'symlink') {
      await fs.rm(target, { force: true });
      await fs.symlink(await fs.readlink(entry.absolutePath), target);
    } else {
      await fs.copyFile(entry.absolutePath, target);
    }
  }
}

/**
 * Copy a source tree, skipping VCS metadata, caches, build output and the
 * `excludedPaths` subtrees.
 */
export async function copySourceTree(
  source: string,
  destination: string,
  excludedPaths: readonly string[] = []
): Promise<void> {
  await copyTree(source, destination, { ignore: createSourceFilter(excludedPaths) });
}
