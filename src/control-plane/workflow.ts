import { readFile, writeFile } from 'node:fs/promises';
import { scanFormatterLog, extractBibtexDiagnostics, extractMakeindexDiagnostics } from '../analysis/log-scanner.js';
import { ProcessingError, WorkspaceIOError } from '../errors.js';
import { artifactPath, backupFile, fileExists, readIfExists } from '../tools/workspace.js';
import type { Workspace } from '../tools/workspace.js';
import { timed } from '../utils/timer.js';
import {
  extractCitationLines,
  formatterRequired,
  resetConvergenceState,
  sameContent,
  statusBits,
} from './convergence.js';
import { requireToolPath } from './formats.js';
import type {
  CommandRunner,
  DriverConfig,
  InvocationOutcome,
  PipelineContext,
  PostprocessorName,
  ResolvedFormat,
  ToolName,
} from './types.js';

export interface StepEnvironment {
  ctx: PipelineContext;
  resolved: ResolvedFormat;
  ws: Workspace;
  config: DriverConfig;
  runner: CommandRunner;
  searchPath: string;
}

export type NextAction = 'format' | 'bibliography' | 'index' | 'stable';

async function invoke(
  env: StepEnvironment,
  tool: ToolName,
  args: string[],
  searchPathVars: string[]
): Promise<InvocationOutcome> {
  const { ctx, config } = env;
  const program = requireToolPath(config.tools, tool);

  config.logger.info(`  [run]  ${tool} ${args.join(' ')}`);
  const { value: outcome, durationMs } = await timed(() =>
    env.runner({
      tool,
      program,
      args,
      cwd: env.ws.dir,
      searchPathVars,
      searchPath: env.searchPath,
      timeoutMs: ctx.job.timeoutMs,
    })
  );

  ctx.invocations.push({
    tool,
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    timedOut: outcome.timedOut,
    durationMs,
  });

  if (outcome.timedOut) {
    config.logger.error(`  [FAIL] ${tool} timed out`);
    throw new ProcessingError(`${tool} timed out after ${ctx.job.timeoutMs}ms`);
  }
  if (outcome.exitCode === 0) {
    config.logger.info(`  [pass] ${tool} (${durationMs}ms)`);
  } else {
    config.logger.error(`  [FAIL] ${tool} exited with code ${outcome.exitCode}`);
  }
  return outcome;
}

async function readTextIfExists(path: string): Promise<string | null> {
  const data = await readIfExists(path);
  return data === null ? null : data.toString('utf-8');
}

/**
 * Runs the formatter once and scans its log. Any "!" error block or a
 * nonzero exit fails the job with the extracted lines attached.
 */
export async function runFormatter(env: StepEnvironment): Promise<void> {
  const { ctx, ws, resolved, config } = env;
  const formatter = resolved.formatter;

  resetConvergenceState(ctx.convergence);
  const outcome = await invoke(env, formatter, [`\\nonstopmode\\input{${ws.basename}}`], ['TEXINPUTS']);
  ctx.formatterRuns += 1;

  let errors: string;
  let log: string | null;
  try {
    log = await readFile(artifactPath(ws, 'log'), 'utf-8');
  } catch {
    log = null;
  }

  if (log === null) {
    errors = `failed to open ${ws.basename}.log for input`;
  } else {
    errors = scanFormatterLog(log, ws.basename, ctx.convergence).errors;
  }
  ctx.statusBits = statusBits(ctx.convergence);

  const flags = ctx.convergence;
  if (flags.undefinedCitations) config.logger.debug('undefined citations detected');
  if (flags.undefinedReferences) config.logger.debug('undefined references detected');
  if (flags.labelsChanged) config.logger.debug('labels have changed');

  if (errors !== '') {
    throw new ProcessingError(`${formatter} exited with errors:\n${errors}`, errors);
  }
  if (outcome.exitCode !== 0) {
    throw new ProcessingError(`${formatter} exited with errors (exit code ${outcome.exitCode})`);
  }
}

/**
 * Only worth running when the formatter saw undefined citations and the
 * \citation lines differ from those bibtex last processed.
 */
export async function bibliographyRequired(env: StepEnvironment): Promise<boolean> {
  const { ctx, ws } = env;
  if (!ctx.convergence.undefinedCitations) return false;

  const aux = await readTextIfExists(artifactPath(ws, 'aux'));
  if (aux === null) return false;

  const citations = Buffer.from(extractCitationLines(aux), 'utf-8');
  const citFile = artifactPath(ws, 'cit');
  try {
    await writeFile(citFile, citations);
  } catch (err) {
    throw new WorkspaceIOError(
      `failed to open ${citFile} for output: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const backup = await readIfExists(artifactPath(ws, 'cbk'));
  return !sameContent(citations, backup);
}

export async function runBibliography(env: StepEnvironment): Promise<void> {
  const { ctx, ws } = env;
  const outcome = await invoke(env, 'bibtex', [ws.basename], ['BIBINPUTS', 'BSTINPUTS']);

  if (outcome.exitCode !== 0) {
    const blg = await readTextIfExists(artifactPath(ws, 'blg'));
    const diagnostics = blg === null ? '' : extractBibtexDiagnostics(blg);
    throw new ProcessingError(
      `bibtex ${ws.basename} failed (${outcome.exitCode})`,
      diagnostics === '' ? undefined : diagnostics
    );
  }

  await backupFile(artifactPath(ws, 'cit'), artifactPath(ws, 'cbk'));
  ctx.convergence.undefinedCitations = false;
  ctx.convergence.rerunForced = true;
}

export async function indexRequired(env: StepEnvironment): Promise<boolean> {
  const { ws } = env;
  const raw = await readIfExists(artifactPath(ws, 'idx'));
  if (raw === null) return false;
  const backup = await readIfExists(artifactPath(ws, 'ibk'));
  return !sameContent(raw, backup);
}

export function makeindexArgs(basename: string, indexStyle?: string, indexOptions?: string): string[] {
  const args = (indexOptions ?? '').split(/\s+/).filter((a) => a !== '');
  if (indexStyle) args.push('-s', indexStyle);
  args.push(basename);
  return args;
}

export async function runIndex(env: StepEnvironment): Promise<void> {
  const { ctx, ws } = env;
  const args = makeindexArgs(ws.basename, ctx.job.indexStyle, ctx.job.indexOptions);
  const outcome = await invoke(env, 'makeindex', args, ['TEXINPUTS', 'INDEXSTYLE']);

  if (outcome.exitCode !== 0) {
    const ilg = await readTextIfExists(artifactPath(ws, 'ilg'));
    const diagnostics = ilg === null ? '' : extractMakeindexDiagnostics(ilg);
    throw new ProcessingError(
      `makeindex ${ws.basename} failed (${outcome.exitCode})`,
      diagnostics === '' ? undefined : diagnostics
    );
  }

  await backupFile(artifactPath(ws, 'idx'), artifactPath(ws, 'ibk'));
  ctx.convergence.rerunForced = true;
}

export function postprocessorArgs(tool: PostprocessorName, basename: string): string[] {
  switch (tool) {
    case 'dvips':
      return ['-o', `${basename}.ps`, basename];
    case 'ps2pdf':
      return [`${basename}.ps`, `${basename}.pdf`];
    case 'dvipdfm':
      return ['-o', `${basename}.pdf`, basename];
  }
}

export async function runPostprocessor(env: StepEnvironment, tool: PostprocessorName): Promise<void> {
  const { ws } = env;
  const outcome = await invoke(env, tool, postprocessorArgs(tool, ws.basename), ['TEXINPUTS']);
  if (outcome.exitCode !== 0) {
    throw new ProcessingError(`${tool} ${ws.basename} failed (${outcome.exitCode})`);
  }
}

/** Formatter first, then bibliography, then index; otherwise stable. */
export async function nextAction(env: StepEnvironment): Promise<NextAction> {
  const auxExists = await fileExists(artifactPath(env.ws, 'aux'));
  if (formatterRequired(env.ctx.convergence, auxExists)) return 'format';
  if (await bibliographyRequired(env)) return 'bibliography';
  if (await indexRequired(env)) return 'index';
  return 'stable';
}
