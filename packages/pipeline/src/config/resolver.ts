/**
 * Configuration Resolver: defaults + overrides -> frozen BuildConfiguration
 */

import { ConfigurationError } from '@stagecraft/core';
import type { ZodError } from 'zod';
import {
  BUILD_PARAMETERS,
  PARAMETER_NAMES,
  buildConfigurationSchema,
  DISABLED,
} from './parameters.js';
import type { BuildConfiguration, ParameterName } from './parameters.js';

export type BuildOverrides = Record<string, unknown>;

export function formatZodError(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.map(String).join('.') : '';
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

const NAME_BY_BUILD_ARG = new Map<string, ParameterName>(
  PARAMETER_NAMES.map((name) => [BUILD_PARAMETERS[name].buildArg, name])
);

function parameterNameOf(key: string): ParameterName | undefined {
  return PARAMETER_NAMES.find((name) => name === key) ?? NAME_BY_BUILD_ARG.get(key);
}

/**
 * Resolve every build parameter to a concrete value.
 *
 * Overrides may be keyed by parameter name (`useCuda`) or build-arg name
 * (`USE_CUDA`). Optional parameters left unset, or set to null, resolve to
 * `DISABLED`. All problems are collected into one `ConfigurationError`.
 */
export function resolveBuildConfiguration(overrides: BuildOverrides = {}): BuildConfiguration {
  const issues: string[] = [];
  const raw: Record<string, unknown> = {};
  const sources = new Map<ParameterName, string>();

  for (const [key, value] of Object.entries(overrides)) {
    const name = parameterNameOf(key);
    if (!name) {
      issues.push(`${key}: unknown build parameter`);
      continue;
    }
    const previous = sources.get(name);
    if (previous !== undefined) {
      issues.push(`${key}: conflicts with ${previous}`);
      continue;
    }
    sources.set(name, key);
    if (value === undefined) continue;
    if (value === null) {
      if (BUILD_PARAMETERS[name].optional) {
        raw[name] = DISABLED;
      } else {
        issues.push(`${name}: required parameter has no value`);
      }
      continue;
    }
    raw[name] = value;
  }

  for (const name of PARAMETER_NAMES) {
    if (!(name in raw)) raw[name] = BUILD_PARAMETERS[name].defaultValue;
  }

  const parsed = buildConfigurationSchema.safeParse(raw);
  if (!parsed.success) {
    issues.push(...formatZodError(parsed.error));
  }
  if (issues.length || !parsed.success) {
    throw new ConfigurationError(issues);
  }

  const config = parsed.data;
  if (config.profile === 'environment' && config.baseFlavor === 'debian-slim') {
    throw new ConfigurationError([
      'baseFlavor: the environment profile needs an interpreter in the base image; use python-slim or the single-binary profile',
    ]);
  }
  return Object.freeze(config);
}

/**
 * Parse `KEY=VALUE` pairs as given on the command line. Values stay strings;
 * the resolver coerces them.
 */
export function parseOverrideArgs(pairs: readonly string[]): BuildOverrides {
  const overrides: BuildOverrides = {};
  const issues: string[] = [];
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator === -1 ? '' : pair.slice(0, separator).trim();
    if (!key) {
      issues.push(`${pair}: expected KEY=VALUE`);
      continue;
    }
    overrides[key] = pair.slice(separator + 1);
  }
  if (issues.length) {
    throw new ConfigurationError(issues);
  }
  return overrides;
}

/**
 * Layer `winning` over `base`. A parameter named in `winning` drops every
 * value `base` holds for it, under either of its names.
 */
export function mergeOverrides(base: BuildOverrides, winning: BuildOverrides): BuildOverrides {
  const overridden = new Set(Object.keys(winning).map((key) => parameterNameOf(key) ?? key));
  const merged: BuildOverrides = {};
  for (const [key, value] of Object.entries(base)) {
    if (!overridden.has(parameterNameOf(key) ?? key)) merged[key] = value;
  }
  return { ...merged, ...winning };
}

/**
 * Configuration values as reported to the operator, keyed by build-arg name.
 * Build parameters never carry secrets.
 */
export function describeConfiguration(config: BuildConfiguration): Record<string, string | number | boolean> {
  const described: Record<string, string | number | boolean> = {};
  for (const name of PARAMETER_NAMES) {
    described[BUILD_PARAMETERS[name].buildArg] = config[name];
  }
  return described;
}
