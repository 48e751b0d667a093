import type {
  FormatName,
  FormatterName,
  InvocationRecord,
  PipelineState,
  PostprocessorName,
} from '../control-plane/types.js';

export interface RunLedger {
  jobId: string;
  timestamp: string;
  format: FormatName | null;
  formatter: FormatterName | null;
  postprocessors: PostprocessorName[];
  maxRuns: number;
  extraRuns: number;
  invocations: InvocationRecord[];
  formatterRuns: number;
  finalState: PipelineState;
  converged: boolean;
  statusBits: number;
  passed: boolean;
  failureReason?: string;
}
