/**
 * Dependency-set selection: a pure function of the build configuration.
 */

import type { BuildConfiguration } from './config/parameters.js';
import { isDisabled } from './config/parameters.js';

export const ACCELERATOR_INDEX_BASE = 'https://download.pytorch.org/whl';

/** Libraries published in CPU and accelerator builds */
export const ACCELERATOR_CAPABLE_PACKAGES = ['torch', 'torchvision', 'torchaudio'] as const;

export interface AcceleratorPackage {
  name: string;
  /** `cpu` or a CUDA tag such as `cu128` */
  variant: string;
}

export interface DependencySelection {
  accelerator: 'cpu' | 'cuda';
  /** Index the accelerator-capable packages are installed from */
  acceleratorIndexUrl: string;
  acceleratorPackages: AcceleratorPackage[];
  /** Installed after the requirements file */
  extraPackages: string[];
  /** OS packages of the final image */
  runtimePackages: string[];
  /** Additional runtimes bundled into the final image */
  runtimeTools: string[];
  /** Modules the packaging tool cannot discover by static analysis */
  dynamicModules: string[];
  /**
   * Distribution patterns a CPU-only environment must not contain. `*` is a
   * wildcard; a pattern starting with `+` matches a local version suffix.
   */
  forbiddenDistributions: string[];
}

const RUNTIME_PACKAGES = [
  'bash',
  'ca-certificates',
  'curl',
  'ffmpeg',
  'git',
  'jq',
  'libgcc-s1',
  'libopenblas0',
  'libstdc++6',
  'tini',
];

const CPU_FORBIDDEN_DISTRIBUTIONS = ['nvidia-*', 'triton', '+cu*'];

export function selectDependencySet(config: BuildConfiguration): DependencySelection {
  const variant = config.useCuda ? config.cudaVersion : 'cpu';

  const extraPackages: string[] = [];
  if (config.profile === 'single-binary') extraPackages.push('pyinstaller');

  const dynamicModules = ['torch', 'sentence_transformers', 'tiktoken'];
  if (!isDisabled(config.whisperModel)) dynamicModules.splice(2, 0, 'faster_whisper');
  if (!isDisabled(config.rerankingModel)) dynamicModules.push('transformers');

  return {
    accelerator: config.useCuda ? 'cuda' : 'cpu',
    acceleratorIndexUrl: `${ACCELERATOR_INDEX_BASE}/${variant}`,
    acceleratorPackages: ACCELERATOR_CAPABLE_PACKAGES.map((name) => ({ name, variant })),
    extraPackages,
    runtimePackages: [...RUNTIME_PACKAGES],
    // the external runtime's extras are the runtime itself, bundled into the
    // image; the backend talks to it over HTTP and needs no client packages
    runtimeTools: config.useOllama ? ['ollama'] : [],
    dynamicModules,
    forbiddenDistributions: config.useCuda ? [] : [...CPU_FORBIDDEN_DISTRIBUTIONS],
  };
}

export interface InstalledDistribution {
  name: string;
  version: string;
}

/**
 * Parse `name==version` lines as written by `pip freeze`
 */
export function parseFrozenRequirements(text: string): InstalledDistribution[] {
  const distributions: InstalledDistribution[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const match = /^([A-Za-z0-9][A-Za-z0-9._-]*)(?:\[[^\]]*\])?\s*==\s*(\S+)$/.exec(trimmed);
    if (match?.[1] && match[2]) {
      distributions.push({ name: match[1].toLowerCase(), version: match[2] });
    }
  }
  return distributions;
}

function wildcardToRegex(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`, 'i');
}

/**
 * Distributions matching a forbidden pattern, as `name==version`
 */
export function findForbiddenDistributions(
  installed: readonly InstalledDistribution[],
  patterns: readonly string[]
): string[] {
  const versionPatterns = patterns.filter((p) => p.startsWith('+')).map((p) => wildcardToRegex(p.slice(1)));
  const namePatterns = patterns.filter((p) => !p.startsWith('+')).map(wildcardToRegex);

  return installed
    .filter(({ name, version }) => {
      const local = version.includes('+') ? version.slice(version.indexOf('+') + 1) : undefined;
      return (
        namePatterns.some((regex) => regex.test(name)) ||
        (local !== undefined && versionPatterns.some((regex) => regex.test(local)))
      );
    })
    .map(({ name, version }) => `${name}==${version}`);
}
