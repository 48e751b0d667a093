import type { Logger } from '../utils/logger.js';
import type { RunLedger } from '../ledger/types.js';

export type FormatterName = 'latex' | 'pdflatex';
export type PostprocessorName = 'dvips' | 'ps2pdf' | 'dvipdfm';
export type AuxiliaryToolName = 'bibtex' | 'makeindex';
export type ToolName = FormatterName | PostprocessorName | AuxiliaryToolName;

export const TOOL_NAMES: readonly ToolName[] = [
  'latex',
  'pdflatex',
  'dvips',
  'ps2pdf',
  'dvipdfm',
  'bibtex',
  'makeindex',
];

export type FormatName = 'dvi' | 'ps' | 'pdf' | 'pdf(ps)' | 'ps2pdf' | 'pdf(dvi)';

/** Executable path per tool. An absent or empty entry means the tool is unavailable. */
export type ToolPaths = Partial<Record<ToolName, string>>;

export interface ResolvedFormat {
  format: FormatName;
  formatter: FormatterName;
  postprocessors: PostprocessorName[];
  /** Extension of the artifact the pipeline leaves in the workspace. */
  extension: 'dvi' | 'ps' | 'pdf';
  /** Output file name, once a bare format name has been taken out of it. */
  output?: string;
}

export type JobSource = { text: string } | { path: string };

export interface Job {
  source: JobSource;
  format?: string;
  output?: string;
  outputDir?: string;
  maxRuns: number;
  extraRuns: number;
  indexStyle?: string;
  indexOptions?: string;
  tmpdir?: string;
  searchPaths: string[];
  timeoutMs?: number;
}

export type JobInput = Partial<Omit<Job, 'source'>> & Pick<Job, 'source'>;

export interface DriverConfig {
  tools: ToolPaths;
  logger: Logger;
  platform: NodeJS.Platform;
}

export type PipelineState =
  | 'NeedsFormat'
  | 'NeedsBibliography'
  | 'NeedsIndex'
  | 'Stable'
  | 'Failed';

export interface ConvergenceState {
  undefinedCitations: boolean;
  undefinedReferences: boolean;
  labelsChanged: boolean;
  rerunForced: boolean;
}

export interface ToolInvocation {
  tool: ToolName;
  program: string;
  args: string[];
  cwd: string;
  /** Environment variables that receive the joined search path. */
  searchPathVars: string[];
  searchPath: string;
  timeoutMs?: number;
}

export interface InvocationOutcome {
  exitCode: number;
  signal?: NodeJS.Signals;
  timedOut: boolean;
}

export type CommandRunner = (invocation: ToolInvocation) => Promise<InvocationOutcome>;

export type PipelineOutput =
  | { kind: 'bytes'; data: Buffer }
  | { kind: 'written'; path: string };

export type PipelineErrorKind = 'configuration' | 'format' | 'processing' | 'io';

export interface PipelineFailure {
  kind: PipelineErrorKind;
  message: string;
  log?: string;
}

export type PipelineResult =
  | { ok: true; output: PipelineOutput; converged: boolean; ledger: RunLedger }
  | { ok: false; error: PipelineFailure; ledger: RunLedger };

export interface InvocationRecord {
  tool: ToolName;
  exitCode: number;
  signal?: NodeJS.Signals;
  timedOut: boolean;
  durationMs: number;
}

export interface PipelineContext {
  jobId: string;
  job: Job;
  resolved: ResolvedFormat | null;
  convergence: ConvergenceState;
  state: PipelineState;
  invocations: InvocationRecord[];
  formatterRuns: number;
  converged: boolean;
  /** Status bits of the most recent formatter run. */
  statusBits: number;
}
