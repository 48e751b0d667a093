import { resolve } from 'node:path';
import { ConfigurationError, fromFailure, toPipelineError } from '../errors.js';
import { buildLedger } from '../ledger/ledger.js';
import { runCommand, buildSearchPath } from '../tools/runner.js';
import {
  cleanupWorkspace,
  createWorkspace,
  deliverOutput,
  loadSource,
  writeSource,
} from '../tools/workspace.js';
import type { Workspace } from '../tools/workspace.js';
import { generateJobId } from '../utils/id.js';
import { assertSupportedPlatform } from './config.js';
import { createConvergenceState } from './convergence.js';
import { assertToolsConfigured, resolveFormat } from './formats.js';
import {
  nextAction,
  runBibliography,
  runFormatter,
  runIndex,
  runPostprocessor,
} from './workflow.js';
import type { NextAction, StepEnvironment } from './workflow.js';
import type {
  CommandRunner,
  DriverConfig,
  Job,
  JobInput,
  PipelineContext,
  PipelineOutput,
  PipelineResult,
  PipelineState,
} from './types.js';

export const DEFAULT_MAX_RUNS = 10;
export const DEFAULT_EXTRA_RUNS = 0;

export interface PipelineDeps {
  runner?: CommandRunner;
  /** Parent directory for workspaces; the system temp directory by default. */
  tmpRoot?: string;
}

const STATE_FOR_ACTION: Record<NextAction, PipelineState> = {
  format: 'NeedsFormat',
  bibliography: 'NeedsBibliography',
  index: 'NeedsIndex',
  stable: 'Stable',
};

function checkCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

export function normalizeJob(input: JobInput): Job {
  return {
    ...input,
    maxRuns: input.maxRuns ?? DEFAULT_MAX_RUNS,
    extraRuns: input.extraRuns ?? DEFAULT_EXTRA_RUNS,
    searchPaths: input.searchPaths ?? [],
  };
}

/**
 * Formatter, bibliography and index runs until nothing signals more work or
 * the budget is spent. Bibliography and index runs do not use up budget.
 * Returns the number of formatter runs made.
 */
async function converge(env: StepEnvironment): Promise<number> {
  const { ctx, config } = env;
  let runs = 0;

  while (runs < ctx.job.maxRuns) {
    const action = await nextAction(env);
    ctx.state = STATE_FOR_ACTION[action];

    if (action === 'stable') break;
    if (action === 'format') {
      runs += 1;
      config.logger.debug(`formatter run ${runs}/${ctx.job.maxRuns}`);
      await runFormatter(env);
    } else if (action === 'bibliography') {
      await runBibliography(env);
    } else {
      await runIndex(env);
    }
  }

  if (ctx.state !== 'Stable') {
    ctx.state = STATE_FOR_ACTION[await nextAction(env)];
  }
  ctx.converged = ctx.state === 'Stable';
  if (!ctx.converged) {
    config.logger.warn(
      `document did not converge after ${ctx.job.maxRuns} formatter runs; using the last output`
    );
  }
  return runs;
}

/** Extra runs share the budget with the loop, and follow only a stable document. */
export function extraRunCount(
  job: Pick<Job, 'maxRuns' | 'extraRuns'>,
  runs: number,
  converged: boolean
): number {
  if (!converged) return 0;
  return Math.max(0, Math.min(job.extraRuns, job.maxRuns - runs));
}

async function execute(
  ctx: PipelineContext,
  config: DriverConfig,
  deps: PipelineDeps
): Promise<PipelineOutput> {
  const { job } = ctx;
  assertSupportedPlatform(config.platform);
  checkCount('maxRuns', job.maxRuns, 1);
  checkCount('extraRuns', job.extraRuns, 0);
  if (job.timeoutMs !== undefined) checkCount('timeoutMs', job.timeoutMs, 1);

  const resolved = resolveFormat(job.format, job.output);
  ctx.resolved = resolved;
  assertToolsConfigured(resolved, config.tools);

  let destination: string | undefined;
  if (resolved.output !== undefined) {
    if (!job.outputDir) throw new ConfigurationError('output directory is not set');
    destination = resolve(job.outputDir, resolved.output);
  }

  config.logger.info(
    `[texloop] job=${ctx.jobId} format=${resolved.format} formatter=${resolved.formatter}` +
      (resolved.postprocessors.length > 0 ? ` then ${resolved.postprocessors.join(', ')}` : '')
  );

  const source = await loadSource(job.source);
  const ws: Workspace = await createWorkspace(job.tmpdir, deps.tmpRoot);
  config.logger.debug(`workspace ${ws.dir}`);

  try {
    await writeSource(ws, source.text);

    const env: StepEnvironment = {
      ctx,
      resolved,
      ws,
      config,
      runner: deps.runner ?? runCommand,
      searchPath: buildSearchPath(job.searchPaths, source.sourceDir),
    };

    const runs = await converge(env);

    const extra = extraRunCount(job, runs, ctx.converged);
    if (extra < job.extraRuns) {
      config.logger.debug(`${extra} of ${job.extraRuns} extra runs fit in the run budget`);
    }
    for (let i = 0; i < extra; i++) {
      await runFormatter(env);
    }
    for (const tool of resolved.postprocessors) {
      await runPostprocessor(env, tool);
    }

    const output = await deliverOutput(ws, resolved.extension, destination);
    if (output.kind === 'written') {
      config.logger.debug(`wrote ${output.path}`);
    } else {
      config.logger.debug(`returning ${output.data.length} bytes of document data`);
    }
    return output;
  } finally {
    try {
      await cleanupWorkspace(ws);
    } catch (err) {
      config.logger.warn(
        `failed to remove ${ws.dir}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}

/**
 * Runs one job to completion. Pipeline failures come back as a failed
 * result, never as a rejection.
 */
export async function runPipeline(
  input: JobInput,
  config: DriverConfig,
  deps: PipelineDeps = {}
): Promise<PipelineResult> {
  const ctx: PipelineContext = {
    jobId: generateJobId(),
    job: normalizeJob(input),
    resolved: null,
    convergence: createConvergenceState(),
    state: 'NeedsFormat',
    invocations: [],
    formatterRuns: 0,
    converged: false,
    statusBits: 0,
  };

  try {
    const output = await execute(ctx, config, deps);
    return { ok: true, output, converged: ctx.converged, ledger: buildLedger(ctx, true) };
  } catch (err) {
    const error = toPipelineError(err);
    ctx.state = 'Failed';
    return { ok: false, error: error.toFailure(), ledger: buildLedger(ctx, false, error.message) };
  }
}

/** Bytes for in-memory output, "written" once the file is at its destination. */
export async function formatDocument(
  input: JobInput,
  config: DriverConfig,
  deps: PipelineDeps = {}
): Promise<Buffer | 'written'> {
  const result = await runPipeline(input, config, deps);
  if (!result.ok) {
    throw fromFailure(result.error);
  }
  return result.output.kind === 'bytes' ? result.output.data : 'written';
}
