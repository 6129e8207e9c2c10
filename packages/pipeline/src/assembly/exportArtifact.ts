/**
 * Publish an assembled image directory to its output location
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { StageError, copyTree, pathExists, removeDir } from '@stagecraft/core';
import { ROOTFS_DIRNAME, readImageConfig } from '../stages/assemble.stage.js';
import type { ImageConfig } from './imageConfig.js';
import { RecordedOwnership, normalizeTree, verifyTree } from './permissions.js';
import type { OwnershipApplier } from './permissions.js';

export const EXPORT_STAGE = 'export';
export const OWNERSHIP_FILENAME = 'ownership.json';

export interface ExportResult {
  outDir: string;
  image: ImageConfig;
}

function suffix(): string {
  return `${process.pid}-${Math.random().toString(36).slice(2, 10)}`;
}

/**
 * Copy the image next to `outDir`, re-apply ownership and modes (a copy
 * does not carry them), verify, then swap it into place. On failure
 * `outDir` is left as it was.
 */
export async function exportArtifact(
  imageDir: string,
  outDir: string,
  ownership: OwnershipApplier
): Promise<ExportResult> {
  const target = path.resolve(outDir);
  const staging = `${target}.tmp-${suffix()}`;
  const image = await readImageConfig(imageDir);

  try {
    await copyTree(imageDir, staging);
    const rootfs = path.join(staging, ROOTFS_DIRNAME);
    const entryScript = image.cmd[0];
    await normalizeTree(rootfs, image.identity, ownership, {
      executables: entryScript ? [entryScript.replace(/^\//, '')] : [],
    });

    const violations = await verifyTree(rootfs, image.identity, ownership);
    if (violations.length) {
      throw new StageError({
        stage: EXPORT_STAGE,
        reason: 'failed',
        message: `exported tree failed verification (${violations.length} violation(s))`,
        diagnostics: violations.join('\n'),
      });
    }
    if (ownership instanceof RecordedOwnership) {
      await fs.writeFile(
        path.join(staging, OWNERSHIP_FILENAME),
        `${JSON.stringify({ root: ROOTFS_DIRNAME, owners: ownership.entries(rootfs) }, null, 2)}\n`,
        'utf-8'
      );
    }

    if (await pathExists(target)) {
      const previous = `${target}.old-${suffix()}`;
      await fs.rename(target, previous);
      try {
        await fs.rename(staging, target);
      } catch (err) {
        await fs.rename(previous, target);
        throw err;
      }
      await removeDir(previous);
    } else {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.rename(staging, target);
    }
  } catch (err) {
    await removeDir(staging);
    throw err;
  }

  return { outDir: target, image };
}
