/**
 * stagecraft command line
 */

import { once } from 'events';
import * as path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { ConfigurationError, DEFAULT_TEMP_MAX_AGE_MS, logger as rootLogger, parseLogLevel, setLogLevel } from '@stagecraft/core';
import type { Logger } from '@stagecraft/core';
import {
  MODEL_KINDS,
  loadProjectConfig,
  mergeOverrides,
  parseOverrideArgs,
  planBuild,
  resolveBuildConfiguration,
  runBuild,
} from '@stagecraft/pipeline';
import type { BuildConfiguration, ModelKind, PipelineOptions, ProjectConfig } from '@stagecraft/pipeline';
import { CacheInspector, DEFAULT_INSPECTOR_PORT, startCacheInspectorServer } from '@stagecraft/cache-inspector';
import { formatErrorReport, renderBuildResult, renderCacheListing, renderPlan } from './report.js';

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export interface CliOptions {
  io?: CliIO;
  /** Directory relative paths on the command line resolve against */
  cwd?: string;
  /** Collaborators handed to the pipeline (tests swap in fakes) */
  pipeline?: Pick<PipelineOptions, 'runner' | 'fetcher' | 'modelCache' | 'ownership'>;
  logger?: Logger;
}

interface ConfigOptions {
  config?: string;
  set: string[];
}

interface BuildOptions extends ConfigOptions {
  out?: string;
  cache: boolean;
}

interface JsonOption {
  json?: boolean;
}

/** Configuration of the build in progress, for the failure report */
interface RunState {
  config?: BuildConfiguration;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('expected a port between 1 and 65535');
  }
  return port;
}

function parseMinutes(value: string): number {
  const minutes = Number(value);
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new InvalidArgumentError('expected a whole number of minutes');
  }
  return minutes;
}

function isModelKind(value: string): value is ModelKind {
  return MODEL_KINDS.some((kind) => kind === value);
}

function createProgram(options: CliOptions, state: RunState): Command {
  const io = options.io ?? consoleIO;
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? rootLogger.child({ component: 'cli' });
  const printJson = (value: unknown) => io.stdout(JSON.stringify(value, null, 2));

  const loadProject = (file: string | undefined) => loadProjectConfig(file, cwd);
  const resolveConfig = (project: ProjectConfig, pairs: string[]) => {
    const config = resolveBuildConfiguration(mergeOverrides(project.parameters, parseOverrideArgs(pairs)));
    state.config = config;
    return config;
  };

  const program = new Command('stagecraft')
    .description('Staged, cacheable builds of a web application image')
    .option('--log-level <level>', 'debug, info, warn or error', 'info')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .hook('preAction', (command) => {
      const value = command.opts<{ logLevel: string }>().logLevel;
      const level = parseLogLevel(value);
      if (!level) throw new ConfigurationError([`--log-level: unknown level "${value}"`]);
      setLogLevel(level);
    });

  program
    .command('build')
    .description('Run every stage and write the image to the output directory')
    .option('-c, --config <file>', 'project config file (default: stagecraft.config.json)')
    .option('--set <KEY=VALUE>', 'override a build parameter (repeatable)', collect, [])
    .option('-o, --out <dir>', 'output directory')
    .option('--no-cache', 'rebuild every stage; the model cache is still used')
    .action(async (opts: BuildOptions) => {
      const loaded = await loadProject(opts.config);
      const project = opts.out ? { ...loaded, outDir: path.resolve(cwd, opts.out) } : loaded;
      const config = resolveConfig(project, opts.set);

      const controller = new AbortController();
      const abort = () => {
        logger.warn('interrupted, cancelling running stages');
        controller.abort(new Error('interrupted'));
      };
      process.once('SIGINT', abort);
      try {
        const result = await runBuild({
          ...options.pipeline,
          config,
          project,
          rebuild: !opts.cache,
          signal: controller.signal,
          onEvent: (event) => logger.debug(event.type, { stage: event.kind, fingerprint: event.fingerprint }),
        });
        renderBuildResult(result).forEach((line) => io.stdout(line));
      } finally {
        process.removeListener('SIGINT', abort);
      }
    });

  program
    .command('plan')
    .description('Show the resolved configuration and stage graph without building')
    .option('-c, --config <file>', 'project config file (default: stagecraft.config.json)')
    .option('--set <KEY=VALUE>', 'override a build parameter (repeatable)', collect, [])
    .option('--json', 'print the plan as JSON')
    .action(async (opts: ConfigOptions & JsonOption) => {
      const project = await loadProject(opts.config);
      const config = resolveConfig(project, opts.set);
      const plan = await planBuild({ ...options.pipeline, config, project });
      if (opts.json) {
        printJson(plan);
      } else {
        renderPlan(plan).forEach((line) => io.stdout(line));
      }
    });

  const cache = program.command('cache').description('Inspect and evict cached artifacts and models');

  cache
    .command('list')
    .description('List cached stage artifacts and model cache entries')
    .option('-c, --config <file>', 'project config file (default: stagecraft.config.json)')
    .option('--json', 'print the listing as JSON')
    .action(async (opts: Pick<ConfigOptions, 'config'> & JsonOption) => {
      const inspector = CacheInspector.forProject(await loadProject(opts.config));
      const [graph, models] = await Promise.all([inspector.getGraph(), inspector.listModels()]);
      if (opts.json) {
        printJson({ graph, models });
      } else {
        renderCacheListing(graph, models).forEach((line) => io.stdout(line));
      }
    });

  cache
    .command('evict')
    .description('Remove a stage artifact (<stage> <fingerprint>) or a model (<model kind> <key>)')
    .argument('<kind>', 'stage kind or model kind')
    .argument('<id>', 'artifact fingerprint or model cache key')
    .option('-c, --config <file>', 'project config file (default: stagecraft.config.json)')
    .action(async (kind: string, id: string, opts: Pick<ConfigOptions, 'config'>) => {
      const inspector = CacheInspector.forProject(await loadProject(opts.config));
      if (isModelKind(kind)) {
        if (!(await inspector.evictModel(kind, id))) throw new Error(`model cache entry not found: ${kind}:${id}`);
        io.stdout(`evicted ${kind}:${id}`);
        return;
      }
      const eviction = await inspector.evictArtifact(kind, id);
      if (!eviction.removed) throw new Error(`artifact not found: ${kind}:${id}`);
      io.stdout(`evicted ${kind}:${id}`);
      for (const dependent of eviction.dependents) io.stdout(`  was mounted by ${dependent}`);
    });

  cache
    .command('prune')
    .description('Remove temp directories left by interrupted builds and model fetches')
    .option('-c, --config <file>', 'project config file (default: stagecraft.config.json)')
    .option(
      '--older-than <minutes>',
      'only remove directories at least this old',
      parseMinutes,
      DEFAULT_TEMP_MAX_AGE_MS / 60_000
    )
    .action(async (opts: Pick<ConfigOptions, 'config'> & { olderThan: number }) => {
      const inspector = CacheInspector.forProject(await loadProject(opts.config));
      const { tempDirs, modelTempDirs } = await inspector.prune({ olderThanMs: opts.olderThan * 60_000 });
      const count = tempDirs.length + modelTempDirs.length;
      io.stdout(`removed ${count} temp director${count === 1 ? 'y' : 'ies'}`);
    });

  cache
    .command('serve')
    .description('Serve the cache inspector HTTP API')
    .option('-c, --config <file>', 'project config file (default: stagecraft.config.json)')
    .option('-p, --port <n>', 'port to listen on', parsePort, DEFAULT_INSPECTOR_PORT)
    .action(async (opts: Pick<ConfigOptions, 'config'> & { port: number }) => {
      const inspector = CacheInspector.forProject(await loadProject(opts.config), logger);
      const server = startCacheInspectorServer(inspector, { port: opts.port, logger });
      process.once('SIGINT', () => server.close());
      await once(server, 'close');
    });

  return program;
}

/**
 * Run the CLI and resolve to its exit code: 0 on success, 1 on any failure.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const state: RunState = {};
  const program = createProgram(options, state);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (err) {
    // usage errors and --help were already written by commander
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 1;
    formatErrorReport(err, state.config).forEach((line) => io.stderr(line));
    return 1;
  }
}
