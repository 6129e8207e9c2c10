/**
 * Plain-text renderings for the CLI
 */

import { CommandFailedError, PackagingError, StageError, errorMessage, isBuildError } from '@stagecraft/core';
import type { StagePlanNode } from '@stagecraft/core';
import { describeConfiguration, describeModel } from '@stagecraft/pipeline';
import type { BuildConfiguration, BuildPlan, BuildResult } from '@stagecraft/pipeline';
import type { ArtifactGraph, ModelEntrySummary } from '@stagecraft/cache-inspector';

const INDENT = '  ';

function shortId(fingerprint: string): string {
  return fingerprint.slice(0, 12);
}

function indentBlock(text: string, depth = 2): string[] {
  return text
    .trimEnd()
    .split('\n')
    .map((line) => `${INDENT.repeat(depth)}${line}`);
}

export function renderConfiguration(config: BuildConfiguration): string[] {
  return Object.entries(describeConfiguration(config)).map(([key, value]) => `${INDENT}${key}=${String(value)}`);
}

export function renderStageTree(node: StagePlanNode, mount?: string, depth = 1): string[] {
  const label = mount ? `${mount} -> ${node.kind}` : node.kind;
  const line = `${INDENT.repeat(depth)}${label} ${shortId(node.fingerprint)} [${node.toolchain}]${node.cached ? ' cached' : ''}`;
  return [line, ...Object.entries(node.deps).flatMap(([depPath, dep]) => renderStageTree(dep, depPath, depth + 1))];
}

export function renderPlan(plan: BuildPlan): string[] {
  const { selection } = plan;
  return [
    'configuration:',
    ...Object.entries(plan.configuration).map(([key, value]) => `${INDENT}${key}=${String(value)}`),
    `dependencies: ${selection.accelerator} (${selection.acceleratorIndexUrl})`,
    ...selection.acceleratorPackages.map((pkg) => `${INDENT}${pkg.name} (${pkg.variant})`),
    ...selection.extraPackages.map((pkg) => `${INDENT}${pkg}`),
    'models:',
    ...(plan.modelRequests.length
      ? plan.modelRequests.map((request) => `${INDENT}${describeModel(request)} (${request.precision})`)
      : [`${INDENT}none`]),
    `image: ${plan.image.base} user=${plan.image.user} port=${plan.image.exposedPorts.join(',')}`,
    'stages:',
    ...renderStageTree(plan.graph),
  ];
}

export function renderBuildResult(result: BuildResult): string[] {
  return [
    `image written to ${result.outDir}`,
    `${INDENT}fingerprint ${shortId(result.fingerprint)}`,
    `${INDENT}entrypoint ${[...result.image.entrypoint, ...result.image.cmd].join(' ')}`,
    `${INDENT}took ${(result.durationMs / 1000).toFixed(1)}s`,
  ];
}

export function renderCacheListing(graph: ArtifactGraph, models: ModelEntrySummary[]): string[] {
  return [
    `artifacts (${graph.nodes.length}):`,
    ...graph.nodes.map(
      (node) => `${INDENT}${node.kind} ${node.fingerprint} ${node.manifest.createdAt}${node.entryPath ? '' : ' (no entry)'}`
    ),
    `models (${models.length}):`,
    ...models.map((entry) => `${INDENT}${entry.request.kind} ${entry.key} ${entry.model}`),
  ];
}

function diagnosticsOf(err: unknown): string | undefined {
  if (err instanceof StageError) return err.diagnostics;
  if (err instanceof PackagingError) return err.output || undefined;
  if (err instanceof CommandFailedError) return err.stderr || err.stdout || undefined;
  return undefined;
}

/**
 * Failure report: error code and message, the stage it surfaced in, the tail
 * of the failing command's output and the configuration of the build.
 */
export function formatErrorReport(err: unknown, config?: BuildConfiguration): string[] {
  const lines = isBuildError(err) ? [`error ${err.code}: ${err.message}`] : [`error: ${errorMessage(err)}`];
  if (isBuildError(err) && err.stage !== undefined) {
    lines.push(`${INDENT}stage: ${err.stage}`);
  }
  const diagnostics = diagnosticsOf(err);
  if (diagnostics) {
    lines.push(`${INDENT}output:`, ...indentBlock(diagnostics));
  }
  if (config) {
    lines.push('configuration:', ...renderConfiguration(config));
  }
  return lines;
}
