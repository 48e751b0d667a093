import { spawn } from 'node:child_process';
import { delimiter, resolve } from 'node:path';
import { ConfigurationError } from '../errors.js';
import type { CommandRunner, InvocationOutcome, ToolInvocation } from '../control-plane/types.js';

/**
 * Orders the search path: the source file's directory first, then the empty
 * entry (kpathsea expands it to the built-in default path), then the include
 * directories. Relative include directories are taken from the current
 * directory, since the tools run inside the workspace.
 */
export function buildSearchPath(searchPaths: string[], sourceDir?: string): string {
  const entries: string[] = [''];
  if (sourceDir) entries.unshift(sourceDir);
  for (const dir of searchPaths.map((d) => resolve(d))) {
    if (dir === sourceDir) continue;
    entries.push(dir);
  }
  return entries.join(delimiter);
}

export function buildEnv(
  invocation: ToolInvocation,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  for (const name of invocation.searchPathVars) {
    env[name] = invocation.searchPath;
  }
  return env;
}

/**
 * Spawns one tool with every standard stream on the null device. A nonzero
 * exit resolves normally; only a program that cannot be started rejects.
 */
export const runCommand: CommandRunner = (invocation) =>
  new Promise<InvocationOutcome>((resolve, reject) => {
    const child = spawn(invocation.program, invocation.args, {
      cwd: invocation.cwd,
      env: buildEnv(invocation),
      stdio: 'ignore',
    });

    let timedOut = false;
    const timer =
      invocation.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGTERM');
          }, invocation.timeoutMs)
        : undefined;

    child.once('error', (err: NodeJS.ErrnoException) => {
      if (timer) clearTimeout(timer);
      reject(
        new ConfigurationError(
          `${invocation.tool} cannot be executed at ${invocation.program}: ${err.code ?? err.message}`
        )
      );
    });

    child.once('close', (code, signal) => {
      if (timer) clearTimeout(timer);
      const outcome: InvocationOutcome = { exitCode: code ?? 1, timedOut };
      if (signal) outcome.signal = signal;
      resolve(outcome);
    });
  });
