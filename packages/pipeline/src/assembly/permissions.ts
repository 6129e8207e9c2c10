/**
 * Ownership and permission normalization of the assembled tree
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { walkTree } from '@stagecraft/core';
import type { TreeEntryType } from '@stagecraft/core';

export interface RuntimeIdentity {
  uid: number;
  gid: number;
  user: string;
  group: string;
  home: string;
}

export interface Owner {
  uid: number;
  gid: number;
}

/**
 * How ownership is applied and read back. Changing ownership to another
 * user needs privileges; unprivileged builds record it instead and leave
 * it to the image writer.
 */
export interface OwnershipApplier {
  chown(target: string, owner: Owner): Promise<void>;
  owner(target: string): Promise<Owner>;
}

export const fsOwnership: OwnershipApplier = {
  async chown(target, owner) {
    await fs.lchown(target, owner.uid, owner.gid);
  },
  async owner(target) {
    const stats = await fs.lstat(target);
    return { uid: stats.uid, gid: stats.gid };
  },
};

export class RecordedOwnership implements OwnershipApplier {
  private readonly owners = new Map<string, Owner>();

  async chown(target: string, owner: Owner): Promise<void> {
    this.owners.set(path.resolve(target), { ...owner });
  }

  async owner(target: string): Promise<Owner> {
    const recorded = this.owners.get(path.resolve(target));
    if (recorded) return recorded;
    const stats = await fs.lstat(target);
    return { uid: stats.uid, gid: stats.gid };
  }

  /** Recorded owners keyed by path relative to `root` */
  entries(root: string): Record<string, Owner> {
    const result: Record<string, Owner> = {};
    for (const [target, owner] of [...this.owners].sort(([a], [b]) => a.localeCompare(b))) {
      const relative = path.relative(root, target);
      if (!relative.startsWith('..') && !path.isAbsolute(relative)) {
        result[relative.split(path.sep).join('/') || '.'] = owner;
      }
    }
    return result;
  }
}

/** Privileged-only ownership changes are applied directly; others are recorded. */
export function defaultOwnership(): OwnershipApplier {
  return process.getuid?.() === 0 ? fsOwnership : new RecordedOwnership();
}

const SETGID = 0o2000;
const GROUP_WRITE = 0o020;
const EXECUTE_ALL = 0o111;

/**
 * Group bits mirror the user bits plus write; directories also get setgid so
 * files created at runtime inherit the group.
 */
export function normalizedMode(type: Exclude<TreeEntryType, 'symlink'>, mode: number, executable = false): number {
  let result = mode & 0o7777;
  if (executable) result |= EXECUTE_ALL;
  const userBits = (result >> 6) & 0o7;
  result = (result & ~0o070) | (userBits << 3) | GROUP_WRITE;
  if (type === 'directory') result |= SETGID;
  return result;
}

export interface NormalizeOptions {
  /** Paths relative to root that must be executable */
  executables?: readonly string[];
}

export interface NormalizeSummary {
  directories: number;
  files: number;
  symlinks: number;
}

async function normalizeEntry(
  target: string,
  type: TreeEntryType,
  identity: RuntimeIdentity,
  ownership: OwnershipApplier,
  executable: boolean
): Promise<void> {
  await ownership.chown(target, { uid: identity.uid, gid: identity.gid });
  if (type === 'symlink') return;
  const stats = await fs.stat(target);
  await fs.chmod(target, normalizedMode(type, stats.mode, executable));
}

/**
 * Hand the whole tree, root included, to the runtime identity
 */
export async function normalizeTree(
  root: string,
  identity: RuntimeIdentity,
  ownership: OwnershipApplier,
  options: NormalizeOptions = {}
): Promise<NormalizeSummary> {
  const executables = new Set(options.executables ?? []);
  const summary: NormalizeSummary = { directories: 1, files: 0, symlinks: 0 };

  await normalizeEntry(root, 'directory', identity, ownership, false);
  for await (const entry of walkTree(root)) {
    await normalizeEntry(entry.absolutePath, entry.type, identity, ownership, executables.has(entry.relativePath));
    if (entry.type === 'directory') summary.directories++;
    else if (entry.type === 'file') summary.files++;
    else summary.symlinks++;
  }

  for (const executable of executables) {
    if (!(await fs.stat(path.join(root, executable)).then((s) => s.isFile()))) {
      throw new Error(`Entry point ${executable} is not a file`);
    }
  }
  return summary;
}

/** Names that must never reach the final tree */
export const FORBIDDEN_NAMES = ['.git', '.svn', '.hg', '.npmrc', '.netrc', '.env', '.pypirc', 'pip.conf'];

/**
 * Every violation of the final-tree invariants, as readable lines
 */
export async function verifyTree(
  root: string,
  identity: RuntimeIdentity,
  ownership: OwnershipApplier
): Promise<string[]> {
  const violations: string[] = [];

  const check = async (target: string, relativePath: string, type: TreeEntryType) => {
    const owner = await ownership.owner(target);
    if (owner.uid !== identity.uid || owner.gid !== identity.gid) {
      violations.push(`${relativePath}: owned by ${owner.uid}:${owner.gid}, expected ${identity.uid}:${identity.gid}`);
    }
    if (type === 'directory') {
      const { mode } = await fs.stat(target);
      if ((mode & (SETGID | GROUP_WRITE)) !== (SETGID | GROUP_WRITE)) {
        violations.push(`${relativePath}: directory mode ${(mode & 0o7777).toString(8)} lacks g+w or setgid`);
      }
    }
  };

  await check(root, '.', 'directory');
  for await (const entry of walkTree(root)) {
    const name = path.posix.basename(entry.relativePath);
    if (FORBIDDEN_NAMES.includes(name)) {
      violations.push(`${entry.relativePath}: not allowed in the runtime tree`);
    }
    await check(entry.absolutePath, entry.relativePath, entry.type);
  }
  return violations;
}
