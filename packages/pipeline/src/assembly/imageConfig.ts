/**
 * Image configuration written next to the assembled root filesystem
 */

import { z } from 'zod';
import type { BaseFlavor, BuildConfiguration } from '../config/parameters.js';
import type { DependencySelection } from '../dependencySelection.js';
import { runtimeEnvironment } from '../runtimeEnv.js';
import type { RuntimeIdentity } from './permissions.js';

export const BASE_IMAGES: Record<BaseFlavor, string> = {
  'python-slim': 'python:3.11-slim-bookworm',
  'debian-slim': 'debian:bookworm-slim',
};

export const ENTRYPOINT = ['/usr/bin/tini', '--'];

export const RUNTIME_USER = 'app';
export const RUNTIME_HOME = '/app';

export const imageConfigSchema = z.object({
  base: z.string(),
  packages: z.array(z.string()),
  tools: z.array(z.string()),
  user: z.string(),
  identity: z.object({
    user: z.string(),
    group: z.string(),
    uid: z.number().int(),
    gid: z.number().int(),
    home: z.string(),
  }),
  workdir: z.string(),
  entrypoint: z.array(z.string()),
  cmd: z.array(z.string()),
  exposedPorts: z.array(z.number().int()),
  env: z.record(z.string(), z.string()),
  labels: z.record(z.string(), z.string()),
});

export type ImageConfig = z.infer<typeof imageConfigSchema>;

export function createRuntimeIdentity(config: BuildConfiguration): RuntimeIdentity {
  return { uid: config.uid, gid: config.gid, user: RUNTIME_USER, group: RUNTIME_USER, home: RUNTIME_HOME };
}

/** Layout-dependent paths of the final tree */
export interface RuntimeLayout {
  /** Entry script, relative to the root filesystem */
  startScript: string;
  workdir: string;
}

export function runtimeLayout(config: BuildConfiguration, startScriptName = 'start.sh'): RuntimeLayout {
  return config.profile === 'single-binary'
    ? { startScript: 'app/start.sh', workdir: '/app' }
    : { startScript: `app/backend/${startScriptName}`, workdir: '/app/backend' };
}

export function createImageConfig(
  config: BuildConfiguration,
  selection: DependencySelection,
  options: { port: number; startScriptName?: string }
): ImageConfig {
  const identity = createRuntimeIdentity(config);
  const layout = runtimeLayout(config, options.startScriptName);
  return {
    base: BASE_IMAGES[config.baseFlavor],
    packages: selection.runtimePackages,
    tools: selection.runtimeTools,
    user: `${identity.uid}:${identity.gid}`,
    identity,
    workdir: layout.workdir,
    entrypoint: [...ENTRYPOINT],
    cmd: [`/${layout.startScript}`],
    exposedPorts: [options.port],
    env: runtimeEnvironment(config, { port: options.port }),
    labels: {
      'org.opencontainers.image.revision': config.buildHash,
      'stagecraft.profile': config.profile,
      'stagecraft.base-flavor': config.baseFlavor,
      'stagecraft.accelerator': selection.accelerator,
    },
  };
}
