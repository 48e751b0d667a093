export { runPipeline, formatDocument, normalizeJob, DEFAULT_MAX_RUNS, DEFAULT_EXTRA_RUNS } from './control-plane/orchestrator.js';
export type { PipelineDeps } from './control-plane/orchestrator.js';
export { resolveFormat } from './control-plane/formats.js';
export { loadToolPaths, DEFAULT_TOOL_PATHS, assertSupportedPlatform } from './control-plane/config.js';
export { StatusFlag, statusBits, sameContent } from './control-plane/convergence.js';
export { scanFormatterLog } from './analysis/log-scanner.js';
export { runCommand } from './tools/runner.js';
export { createConsoleLogger, silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export {
  PipelineError,
  ConfigurationError,
  FormatError,
  ProcessingError,
  WorkspaceIOError,
} from './errors.js';
export type * from './control-plane/types.js';
export type { RunLedger } from './ledger/types.js';
