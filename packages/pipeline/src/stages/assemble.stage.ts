import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { copyTree, pathExists } from '@stagecraft/core';
import type { ArtifactEngine, Stage, StageConfig, StageContext, StageResult } from '@stagecraft/core';
import { imageConfigSchema } from '../assembly/imageConfig.js';
import type { ImageConfig } from '../assembly/imageConfig.js';
import { FORBIDDEN_NAMES, normalizeTree, verifyTree } from '../assembly/permissions.js';
import type { OwnershipApplier } from '../assembly/permissions.js';
import { BINARY_NAME } from './singleBinary.stage.js';

export const ASSEMBLE_STAGE = 'assemble';
export const IMAGE_DIRNAME = 'image';
export const ROOTFS_DIRNAME = 'rootfs';
export const IMAGE_CONFIG_FILENAME = 'image.json';
export const VERSION_FILENAME = 'version.json';

const FRONTEND_MOUNT = 'deps/frontend';
const BACKEND_MOUNT = 'deps/backend';
const MODELS_MOUNT = 'deps/models';

export const assembleInputSchema = z
  .object({
    profile: z.enum(['environment', 'single-binary']),
    revision: z.string(),
    startScript: z.string().describe('Entry script, relative to the root filesystem'),
    image: imageConfigSchema,
  })
  .describe('Compose stage outputs into the final root filesystem');

export type AssembleInput = z.infer<typeof assembleInputSchema>;

export interface AssembleStageOptions {
  frontend: StageConfig<unknown>;
  /** Backend environment or single binary, per profile */
  backend: StageConfig<unknown>;
  models: StageConfig<unknown>;
  ownership: OwnershipApplier;
  timeoutMs?: number;
}

/** VCS metadata and build-only credentials never reach the runtime tree */
function excludedFromRuntime(relativePath: string): boolean {
  return relativePath.split('/').some((segment) => FORBIDDEN_NAMES.includes(segment));
}

function mountOf(deps: Record<string, string>, mount: string): string {
  const mounted = deps[mount];
  if (!mounted) throw new Error(`${ASSEMBLE_STAGE} needs ${mount} mounted`);
  return mounted;
}

export async function readImageConfig(imageDir: string): Promise<ImageConfig> {
  const raw: unknown = JSON.parse(await fs.readFile(path.join(imageDir, IMAGE_CONFIG_FILENAME), 'utf-8'));
  return imageConfigSchema.parse(raw);
}

/**
 * Stage fn: copy every input into `image/rootfs`, hand the tree to the
 * runtime identity and write `image/image.json`.
 */
export function assembleStageFn(ownership: OwnershipApplier) {
  return async (input: AssembleInput, { dataDir, deps, logger }: StageContext): Promise<StageResult> => {
    const imagePath = path.join(dataDir, IMAGE_DIRNAME);
    const rootfs = path.join(imagePath, ROOTFS_DIRNAME);
    const appPath = path.join(rootfs, 'app');
    const frontend = mountOf(deps, FRONTEND_MOUNT);
    const backend = mountOf(deps, BACKEND_MOUNT);

    await copyTree(path.join(frontend, 'build'), path.join(appPath, 'build'), { ignore: excludedFromRuntime });
    for (const file of ['CHANGELOG.md', 'package.json']) {
      if (await pathExists(path.join(frontend, file))) {
        await fs.copyFile(path.join(frontend, file), path.join(appPath, file));
      }
    }

    if (input.profile === 'single-binary') {
      await fs.copyFile(path.join(backend, BINARY_NAME), path.join(appPath, BINARY_NAME));
      await fs.copyFile(path.join(backend, 'start.sh'), path.join(appPath, 'start.sh'));
    } else {
      await copyTree(backend, path.join(appPath, 'backend'), { ignore: excludedFromRuntime });
    }
    await copyTree(mountOf(deps, MODELS_MOUNT), path.join(appPath, 'backend', 'data'));

    await fs.writeFile(
      path.join(appPath, VERSION_FILENAME),
      `${JSON.stringify({ revision: input.revision, profile: input.profile }, null, 2)}\n`,
      'utf-8'
    );

    const identity = input.image.identity;
    const summary = await normalizeTree(rootfs, identity, ownership, { executables: [input.startScript] });
    const violations = await verifyTree(rootfs, identity, ownership);
    if (violations.length) {
      throw new Error(`assembled tree failed verification:\n${violations.join('\n')}`);
    }

    await fs.writeFile(path.join(imagePath, IMAGE_CONFIG_FILENAME), `${JSON.stringify(input.image, null, 2)}\n`, 'utf-8');
    logger.info('root filesystem assembled', { ...summary, user: input.image.user });

    return { entry: IMAGE_DIRNAME, metadata: { ...summary, revision: input.revision, profile: input.profile } };
  };
}

export function createAssembleStage(engine: ArtifactEngine, options: AssembleStageOptions): Stage<AssembleInput> {
  return engine.createStage<AssembleInput>({
    kind: ASSEMBLE_STAGE,
    deps: {
      [FRONTEND_MOUNT]: options.frontend,
      [BACKEND_MOUNT]: options.backend,
      [MODELS_MOUNT]: options.models,
    },
    timeoutMs: options.timeoutMs,
    fn: assembleStageFn(options.ownership),
  });
}
