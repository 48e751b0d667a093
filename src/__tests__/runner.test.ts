import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { delimiter, join, resolve } from 'node:path';
import { buildEnv, buildSearchPath, runCommand } from '../tools/runner.js';
import { ConfigurationError } from '../errors.js';
import type { ToolInvocation } from '../control-plane/types.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'texloop-runner-test-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function nodeInvocation(script: string, extra: Partial<ToolInvocation> = {}): ToolInvocation {
  return {
    tool: 'latex',
    program: process.execPath,
    args: ['-e', script],
    cwd: dir,
    searchPathVars: ['TEXINPUTS'],
    searchPath: ['', '/srv/styles'].join(delimiter),
    ...extra,
  };
}

describe('buildSearchPath', () => {
  it('starts with the empty entry for the default path', () => {
    expect(buildSearchPath(['/a', '/b'])).toBe(['', '/a', '/b'].join(delimiter));
  });

  it('puts the source directory first and does not repeat it', () => {
    expect(buildSearchPath(['/docs', '/styles'], '/docs')).toBe(['/docs', '', '/styles'].join(delimiter));
  });

  it('makes relative include directories absolute', () => {
    expect(buildSearchPath(['styles', '../shared'])).toBe(
      ['', join(process.cwd(), 'styles'), resolve(process.cwd(), '../shared')].join(delimiter)
    );
  });
});

describe('buildEnv', () => {
  it('sets every requested variable to the search path', () => {
    const env = buildEnv(
      nodeInvocation('', { searchPathVars: ['BIBINPUTS', 'BSTINPUTS'], searchPath: '/refs' }),
      { PATH: '/usr/bin' }
    );
    expect(env).toEqual({ PATH: '/usr/bin', BIBINPUTS: '/refs', BSTINPUTS: '/refs' });
  });
});

describe('runCommand', () => {
  it('returns the exit code', async () => {
    const outcome = await runCommand(nodeInvocation('process.exit(3)'));
    expect(outcome).toEqual({ exitCode: 3, timedOut: false });
  });

  it('runs in the workspace with the search path exported', async () => {
    const outcome = await runCommand(
      nodeInvocation("require('fs').writeFileSync('env.txt', process.env.TEXINPUTS)")
    );
    expect(outcome.exitCode).toBe(0);
    expect(await readFile(join(dir, 'env.txt'), 'utf-8')).toBe(['', '/srv/styles'].join(delimiter));
  });

  it('kills a tool that exceeds its timeout', async () => {
    const outcome = await runCommand(nodeInvocation('setTimeout(() => {}, 10000)', { timeoutMs: 100 }));
    expect(outcome.timedOut).toBe(true);
    expect(outcome.signal).toBe('SIGTERM');
    expect(outcome.exitCode).toBe(1);
  });

  it('reports a program that cannot be started as a configuration error', async () => {
    const promise = runCommand(nodeInvocation('', { program: join(dir, 'no-such-latex') }));
    await expect(promise).rejects.toBeInstanceOf(ConfigurationError);
    await expect(promise).rejects.toThrow(`latex cannot be executed at ${join(dir, 'no-such-latex')}: ENOENT`);
  });
});
