import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { CommandFailedError, formatCommand, scopeRunner, toolchainEnv } from '../command.js';
import type { CommandRunner, CommandSpec } from '../command.js';

function recordingRunner(): { runner: CommandRunner; calls: CommandSpec[] } {
  const calls: CommandSpec[] = [];
  return {
    calls,
    runner: {
      run: async (spec) => {
        calls.push(spec);
        return { stdout: 'done', stderr: '' };
      },
    },
  };
}

describe('toolchainEnv', () => {
  it('should put toolchain directories ahead of the inherited PATH', () => {
    const env = toolchainEnv({ name: 'python', path: ['/opt/venv/bin'], env: { UV_LINK_MODE: 'copy' } }, '/usr/bin');
    expect(env).toEqual({
      UV_LINK_MODE: 'copy',
      PATH: ['/opt/venv/bin', '/usr/bin'].join(path.delimiter),
    });
  });
});

describe('scopeRunner', () => {
  const controller = new AbortController();
  const scope = {
    cwd: '/work/data-space',
    toolchain: { name: 'node', env: { NODE_ENV: 'production' } },
    signal: controller.signal,
    inheritedPath: '/usr/bin',
  };

  it('should resolve relative cwd inside the workspace', async () => {
    const { runner, calls } = recordingRunner();
    await scopeRunner(runner, scope).run({ command: 'npm', args: ['ci'], cwd: 'src' });

    expect(calls[0]?.cwd).toBe(path.resolve('/work/data-space', 'src'));
    expect(calls[0]?.signal).toBe(controller.signal);
  });

  it('should default cwd to the workspace and let call env win', async () => {
    const { runner, calls } = recordingRunner();
    await scopeRunner(runner, scope).run({ command: 'npm', env: { NODE_ENV: 'test' } });

    expect(calls[0]?.cwd).toBe('/work/data-space');
    expect(calls[0]?.env).toEqual({ NODE_ENV: 'test', PATH: '/usr/bin' });
  });
});

describe('CommandFailedError', () => {
  it('should describe the exit code', () => {
    const err = new CommandFailedError({ command: 'uv pip install', exitCode: 2, stdout: '', stderr: '' });
    expect(err.message).toBe('Command "uv pip install" exited with code 2');
  });

  it('should describe a timeout', () => {
    const err = new CommandFailedError({ command: 'pyinstaller', exitCode: null, stdout: '', stderr: '', timedOut: true });
    expect(err.message).toBe('Command "pyinstaller" timed out');
  });

  it('should keep only the last 40 lines of output', () => {
    const stderr = Array.from({ length: 50 }, (_, i) => `line ${i + 1}`).join('\n');
    const err = new CommandFailedError({ command: 'npm run build', exitCode: 1, stdout: '', stderr });
    const lines = err.diagnostics.split('\n');
    expect(lines).toHaveLength(40);
    expect(lines[0]).toBe('line 11');
    expect(lines[39]).toBe('line 50');
  });
});

describe('formatCommand', () => {
  it('should join command and args', () => {
    expect(formatCommand({ command: 'uv', args: ['venv', '--relocatable'] })).toBe('uv venv --relocatable');
  });
});
