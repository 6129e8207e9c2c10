/**
 * In-process stand-ins for the toolchains and model hubs a build talks to
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { formatCommand } from '@stagecraft/core';
import type { CommandResult, CommandRunner, CommandSpec, RetryPolicy } from '@stagecraft/core';
import type { FetchOptions, ModelFetcher } from '../models/fetchers.js';
import { describeModel } from '../models/modelPlan.js';
import type { ModelRequest } from '../models/modelPlan.js';

export const NO_DELAY_RETRY: RetryPolicy = { attempts: 2, baseDelayMs: 0, maxDelayMs: 0 };

export type CommandHandler = (spec: CommandSpec) => Promise<Partial<CommandResult>>;

/** `spec` as a readable line, with the command reduced to its basename */
export function commandLine(spec: CommandSpec): string {
  return formatCommand({ command: path.basename(spec.command), args: spec.args });
}

/**
 * Records every command and answers from handlers matched against
 * `commandLine(spec)`. Later handlers take precedence.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];
  private readonly handlers: Array<{ pattern: RegExp; handle: CommandHandler }> = [];

  on(pattern: RegExp, handle: CommandHandler): this {
    this.handlers.unshift({ pattern, handle });
    return this;
  }

  get lines(): string[] {
    return this.calls.map(commandLine);
  }

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    const line = commandLine(spec);
    const handler = this.handlers.find(({ pattern }) => pattern.test(line));
    if (!handler) throw new Error(`unexpected command: ${line}`);
    const result = await handler.handle(spec);
    return { stdout: '', stderr: '', ...result };
  }
}

export const FROZEN_CPU_SET = 'fastapi==0.110.0\ntorch==2.4.0+cpu\n';

function argAfter(spec: CommandSpec, flag: string): string {
  const args = spec.args ?? [];
  const value = args[args.indexOf(flag) + 1];
  if (args.indexOf(flag) === -1 || value === undefined) throw new Error(`${commandLine(spec)}: missing ${flag}`);
  return value;
}

function cwdOf(spec: CommandSpec): string {
  if (!spec.cwd) throw new Error(`${commandLine(spec)}: no cwd`);
  return spec.cwd;
}

/**
 * Toolchain behaviour just deep enough for every stage: the frontend build
 * writes build/, uv creates .venv, the packager writes the binary.
 */
export function createToolchainRunner(options: { frozen?: string } = {}): FakeRunner {
  return new FakeRunner()
    .on(/^npm ci\b/, async () => ({}))
    .on(/^npm run build$/, async (spec) => {
      const buildDir = path.join(cwdOf(spec), 'build');
      await fs.mkdir(buildDir, { recursive: true });
      await fs.writeFile(path.join(buildDir, 'index.html'), `<html>${spec.env?.APP_BUILD_HASH ?? ''}</html>`);
      return {};
    })
    .on(/^uv venv\b/, async (spec) => {
      const binDir = path.join(cwdOf(spec), '.venv', 'bin');
      await fs.mkdir(binDir, { recursive: true });
      await fs.writeFile(path.join(binDir, 'python'), '#!/usr/bin/env python3\n');
      return {};
    })
    .on(/^uv pip install\b/, async () => ({}))
    .on(/^uv pip freeze\b/, async () => ({ stdout: options.frozen ?? FROZEN_CPU_SET }))
    .on(/^pyinstaller\b/, async (spec) => {
      const distDir = argAfter(spec, '--distpath');
      await fs.mkdir(distDir, { recursive: true });
      await fs.writeFile(path.join(distDir, 'backend_app'), 'binary', { mode: 0o755 });
      return {};
    })
    .on(/^backend_app --smoke-test$/, async () => ({ stdout: 'ok' }));
}

export type FetchOutcome = 'empty' | Error;

/**
 * Writes one small file per model. Outcomes can be scripted per model as
 * `kind:id`: an `'empty'` outcome produces no files, an Error is thrown.
 */
export class FakeFetcher implements ModelFetcher {
  readonly calls: string[] = [];
  /** Options each fetch was called with, in call order */
  readonly options: FetchOptions[] = [];
  private readonly scripted = new Map<string, FetchOutcome[]>();
  private readonly persistent = new Map<string, FetchOutcome>();

  /** The next fetches of `model` end with `outcomes`, later ones succeed */
  script(model: string, ...outcomes: FetchOutcome[]): this {
    this.scripted.set(model, outcomes);
    return this;
  }

  /** Every fetch of `model` ends with `outcome` */
  fail(model: string, outcome: FetchOutcome): this {
    this.persistent.set(model, outcome);
    return this;
  }

  heal(model: string): this {
    this.persistent.delete(model);
    return this;
  }

  async fetch(request: ModelRequest, targetDir: string, options: FetchOptions = {}): Promise<void> {
    const model = describeModel(request);
    this.calls.push(model);
    this.options.push(options);
    const outcome = this.scripted.get(model)?.shift() ?? this.persistent.get(model);
    if (outcome === 'empty') return;
    if (outcome) throw outcome;

    await fs.mkdir(path.join(targetDir, 'snapshots'), { recursive: true });
    await fs.writeFile(path.join(targetDir, 'snapshots', 'weights.bin'), `${model}:${request.precision}`);
  }
}

export function modelRequest(kind: ModelRequest['kind'], id: string): ModelRequest {
  const precision = kind === 'whisper' ? 'int8' : kind === 'tiktoken' ? 'bpe' : 'float32';
  return { kind, id, device: 'cpu', precision };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/** Write `files` (relative path → content) below `root` */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    await fs.mkdir(path.dirname(path.join(root, relative)), { recursive: true });
    await fs.writeFile(path.join(root, relative), content);
  }
}

/** A project with the frontend at its root and the backend in backend/ */
export async function createProjectFixture(root: string): Promise<void> {
  await writeFiles(root, {
    'package.json': '{"name":"web-app","version":"1.2.0"}',
    'CHANGELOG.md': '# Changelog\n',
    'src/main.ts': 'export const app = 1;\n',
    '.git/HEAD': 'ref: refs/heads/main\n',
    'backend/requirements.txt': 'fastapi\n',
    'backend/app/main.py': 'print("serving")\n',
    'backend/start.sh': '#!/usr/bin/env bash\nexec python -m app.main\n',
  });
}
