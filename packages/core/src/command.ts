/**
 * Command runner used by stages to invoke toolchains.
 */

import { execFile } from 'child_process';
import * as path from 'path';
import type { Toolchain } from './types.js';

export interface CommandSpec {
  command: string;
  args?: string[];
  cwd?: string;
  /** Merged over the runner's base environment. */
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

const DIAGNOSTIC_TAIL_LINES = 40;

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(params: {
    command: string;
    exitCode: number | null;
    stdout: string;
    stderr: string;
    timedOut?: boolean;
  }) {
    const status = params.timedOut ? 'timed out' : `exited with code ${params.exitCode ?? 'unknown'}`;
    super(`Command "${params.command}" ${status}`);
    this.name = 'CommandFailedError';
    this.command = params.command;
    this.exitCode = params.exitCode;
    this.stdout = params.stdout;
    this.stderr = params.stderr;
    this.timedOut = params.timedOut ?? false;
  }

  /** Last lines of combined output. */
  get diagnostics(): string {
    const combined = [this.stdout, this.stderr].filter(Boolean).join('\n');
    return combined.trimEnd().split('\n').slice(-DIAGNOSTIC_TAIL_LINES).join('\n');
  }
}

export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...(spec.args ?? [])].join(' ');
}

function readStringField(err: object, field: 'stdout' | 'stderr'): string {
  if (field in err) {
    const value: unknown = Reflect.get(err, field);
    if (typeof value === 'string') return value;
  }
  return '';
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Runs commands as child processes (no shell). Output is captured, never
 * streamed; failures become `CommandFailedError`.
 */
export function createProcessRunner(baseEnv: NodeJS.ProcessEnv = process.env): CommandRunner {
  return {
    run(spec) {
      return new Promise<CommandResult>((resolve, reject) => {
        execFile(
          spec.command,
          spec.args ?? [],
          {
            cwd: spec.cwd,
            env: { ...baseEnv, ...spec.env },
            signal: spec.signal,
            timeout: spec.timeoutMs ?? 0,
            maxBuffer: 50 * 1024 * 1024,
            encoding: 'utf-8',
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ stdout, stderr });
              return;
            }
            if (isAbortError(error)) {
              reject(error);
              return;
            }
            reject(
              new CommandFailedError({
                command: formatCommand(spec),
                exitCode: typeof error.code === 'number' ? error.code : null,
                stdout: stdout || readStringField(error, 'stdout'),
                stderr: stderr || readStringField(error, 'stderr'),
                timedOut: Boolean(error.killed && spec.timeoutMs && !spec.signal?.aborted),
              })
            );
          }
        );
      });
    },
  };
}

export interface RunnerScope {
  cwd: string;
  toolchain: Toolchain;
  signal: AbortSignal;
  inheritedPath?: string;
}

/** Toolchain environment with its PATH entries ahead of the inherited PATH. */
export function toolchainEnv(toolchain: Toolchain, inheritedPath = process.env.PATH ?? ''): Record<string, string> {
  const env: Record<string, string> = { ...toolchain.env };
  const entries = [...(toolchain.path ?? []), ...inheritedPath.split(path.delimiter)].filter(Boolean);
  env.PATH = entries.join(path.delimiter);
  return env;
}

/**
 * Bind a runner to one stage: relative `cwd` values resolve inside the stage
 * workspace, the toolchain environment is applied and the stage signal is
 * used unless the caller passes its own.
 */
export function scopeRunner(base: CommandRunner, scope: RunnerScope): CommandRunner {
  const env = toolchainEnv(scope.toolchain, scope.inheritedPath);
  return {
    run(spec) {
      return base.run({
        ...spec,
        cwd: spec.cwd ? path.resolve(scope.cwd, spec.cwd) : scope.cwd,
        env: { ...env, ...spec.env },
        signal: spec.signal ?? scope.signal,
      });
    },
  };
}
