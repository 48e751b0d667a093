import type { PipelineContext } from '../control-plane/types.js';
import type { RunLedger } from './types.js';

export function buildLedger(
  ctx: PipelineContext,
  passed: boolean,
  failureReason?: string
): RunLedger {
  return {
    jobId: ctx.jobId,
    timestamp: new Date().toISOString(),
    format: ctx.resolved?.format ?? null,
    formatter: ctx.resolved?.formatter ?? null,
    postprocessors: ctx.resolved ? [...ctx.resolved.postprocessors] : [],
    maxRuns: ctx.job.maxRuns,
    extraRuns: ctx.job.extraRuns,
    invocations: ctx.invocations.map((record) => ({ ...record })),
    formatterRuns: ctx.formatterRuns,
    finalState: ctx.state,
    converged: ctx.converged,
    statusBits: ctx.statusBits,
    passed,
    failureReason,
  };
}

export function summarizeLedger(ledger: RunLedger): string[] {
  const counts = new Map<string, number>();
  for (const record of ledger.invocations) {
    counts.set(record.tool, (counts.get(record.tool) ?? 0) + 1);
  }
  const runs = [...counts].map(([tool, n]) => `${tool}(${n})`).join(' ');
  const totalMs = ledger.invocations.reduce((sum, r) => sum + r.durationMs, 0);
  return [
    `runs: ${runs || 'none'}`,
    `state: ${ledger.finalState} converged=${ledger.converged} (${totalMs}ms)`,
  ];
}
