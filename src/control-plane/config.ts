import { ConfigurationError } from '../errors.js';
import { TOOL_NAMES } from './types.js';
import type { ToolName, ToolPaths } from './types.js';

export const DEFAULT_TOOL_PATHS: Record<ToolName, string> = {
  latex: '/usr/bin/latex',
  pdflatex: '/usr/bin/pdflatex',
  dvips: '/usr/bin/dvips',
  ps2pdf: '/usr/bin/ps2pdf',
  dvipdfm: '/usr/bin/dvipdfm',
  bibtex: '/usr/bin/bibtex',
  makeindex: '/usr/bin/makeindex',
};

export function toolEnvVar(tool: ToolName): string {
  return `TEXLOOP_${tool.toUpperCase()}`;
}

/**
 * Reads TEXLOOP_<TOOL> variables over the defaults. A variable set to the
 * empty string marks that tool as unavailable.
 */
export function loadToolPaths(env: NodeJS.ProcessEnv = process.env): ToolPaths {
  const tools: ToolPaths = {};
  for (const tool of TOOL_NAMES) {
    const value = env[toolEnvVar(tool)];
    if (value === undefined) {
      tools[tool] = DEFAULT_TOOL_PATHS[tool];
    } else if (value.trim() !== '') {
      tools[tool] = value.trim();
    }
  }
  return tools;
}

const SUPPORTED_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set<NodeJS.Platform>([
  'linux',
  'darwin',
  'freebsd',
  'openbsd',
  'netbsd',
  'sunos',
  'aix',
  'cygwin',
  'win32',
]);

export function assertSupportedPlatform(platform: NodeJS.Platform): void {
  if (!SUPPORTED_PLATFORMS.has(platform)) {
    throw new ConfigurationError(`not available on ${platform}`);
  }
}
