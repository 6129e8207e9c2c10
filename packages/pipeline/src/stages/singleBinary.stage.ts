import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CommandFailedError, PackagingError, copyTree, pathExists, removeDir } from '@stagecraft/core';
import type { ArtifactEngine, Stage, StageConfig, StageContext, StageResult } from '@stagecraft/core';
import type { DependencySelection } from '../dependencySelection.js';
import { VENV_DIRNAME } from './backendEnvironment.stage.js';

export const SINGLE_BINARY_STAGE = 'single-binary';
export const BINARY_NAME = 'backend_app';
export const SMOKE_TEST_FLAG = '--smoke-test';

const BACKEND_MOUNT = 'deps/backend';
const MODELS_MOUNT = 'deps/models';

export const singleBinaryInputSchema = z
  .object({
    entry: z.string().describe('Backend entry module, relative to the backend tree'),
    startScript: z.string(),
    directives: z.array(z.string()).describe('Inclusion directives for dynamically loaded modules'),
    migrationsDir: z.string().optional(),
    smokeTestTimeoutMs: z.number().int().positive(),
  })
  .describe('Package the backend environment and model cache into one executable');

export type SingleBinaryInput = z.infer<typeof singleBinaryInputSchema>;

/**
 * Hidden-import and collect-all directives for every module the packaging
 * tool cannot find by static analysis
 */
export function buildInclusionDirectives(selection: DependencySelection, extraModules: readonly string[] = []): string[] {
  const modules = [...new Set([...selection.dynamicModules, ...extraModules])];
  return [
    ...modules.flatMap((module) => ['--hidden-import', module]),
    ...modules.flatMap((module) => ['--collect-all', module]),
  ];
}

/** Module named by a "No module named" failure, if any */
export function parseMissingModule(output: string): string | undefined {
  return /No module named ['"]([^'"]+)['"]/.exec(output)?.[1];
}

export interface SingleBinaryStageOptions {
  backend: StageConfig<unknown>;
  models: StageConfig<unknown>;
  timeoutMs?: number;
}

export function singleBinaryStageFn() {
  return async (input: SingleBinaryInput, { dataDir, deps, runner, logger }: StageContext): Promise<StageResult> => {
    const backendMount = deps[BACKEND_MOUNT];
    const modelsMount = deps[MODELS_MOUNT];
    if (!backendMount || !modelsMount) {
      throw new Error(`${SINGLE_BINARY_STAGE} needs ${BACKEND_MOUNT} and ${MODELS_MOUNT} mounted`);
    }

    // the packager writes next to the sources; work on a copy of the consumed artifact
    const workPath = path.join(dataDir, 'work');
    await copyTree(backendMount, workPath);
    const distPath = path.join(dataDir, 'dist');

    const addData = ['--add-data', `${await fs.realpath(modelsMount)}${path.delimiter}data`];
    if (input.migrationsDir) {
      addData.push('--add-data', `${path.join(workPath, input.migrationsDir)}${path.delimiter}${input.migrationsDir}`);
    }

    await runner.run({
      command: path.join(workPath, VENV_DIRNAME, 'bin', 'pyinstaller'),
      args: [
        '--onefile',
        input.entry,
        '--name',
        BINARY_NAME,
        '--clean',
        '--strip',
        '--noconfirm',
        '--distpath',
        distPath,
        '--workpath',
        path.join(dataDir, 'pyinstaller-build'),
        '--specpath',
        workPath,
        ...input.directives,
        ...addData,
      ],
      cwd: 'work',
    });

    const binaryPath = path.join(distPath, BINARY_NAME);
    if (!(await pathExists(binaryPath))) {
      throw new PackagingError(`packaging produced no ${BINARY_NAME} executable`, { output: '' });
    }

    try {
      await runner.run({
        command: binaryPath,
        args: [SMOKE_TEST_FLAG],
        cwd: 'dist',
        timeoutMs: input.smokeTestTimeoutMs,
      });
    } catch (err) {
      if (!(err instanceof CommandFailedError)) throw err;
      const missingModule = parseMissingModule(err.diagnostics);
      throw new PackagingError(
        missingModule
          ? `smoke test failed: module "${missingModule}" was not packaged`
          : `smoke test failed: ${err.message}`,
        { missingModule, output: err.diagnostics, cause: err }
      );
    }
    logger.info('smoke test passed', { binary: BINARY_NAME });

    await fs.copyFile(path.join(workPath, input.startScript), path.join(distPath, 'start.sh'));
    await fs.chmod(path.join(distPath, 'start.sh'), 0o755);
    await removeDir(workPath);
    await removeDir(path.join(dataDir, 'pyinstaller-build'));

    return { entry: 'dist', metadata: { binary: BINARY_NAME, directives: input.directives.length } };
  };
}

export function createSingleBinaryStage(
  engine: ArtifactEngine,
  options: SingleBinaryStageOptions
): Stage<SingleBinaryInput> {
  return engine.createStage<SingleBinaryInput>({
    kind: SINGLE_BINARY_STAGE,
    deps: {
      [BACKEND_MOUNT]: options.backend,
      [MODELS_MOUNT]: options.models,
    },
    toolchain: { name: 'python' },
    timeoutMs: options.timeoutMs,
    fn: singleBinaryStageFn(),
  });
}
