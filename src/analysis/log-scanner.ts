import {
  ERROR_LINE,
  LINE_DESIGNATOR,
  UNDEFINED_CITATION,
  UNDEFINED_REFERENCES,
  LABELS_CHANGED,
  BIBTEX_DIAGNOSTICS,
  MAKEINDEX_DIAGNOSTICS,
  missingListFile,
} from './patterns.js';
import type { ConvergenceState } from '../control-plane/types.js';

export interface LogScanResult {
  /** Fatal error lines joined by "\n"; empty when the run had none. */
  errors: string;
}

/**
 * Scans a formatter log, collecting error blocks and raising the rerun flags.
 *
 * TeX errors start with "!" and are followed, some lines later, by an
 * "l.<n>" designator. Every "!" line is kept, plus the first designator
 * after each of them.
 */
export function scanFormatterLog(
  log: string,
  basename: string,
  state: ConvergenceState
): LogScanResult {
  const missingFile = missingListFile(basename);
  const errors: string[] = [];
  let inError = false;

  for (const line of log.split(/\r?\n/)) {
    if (ERROR_LINE.test(line)) {
      errors.push(line);
      inError = true;
    } else if (inError && LINE_DESIGNATOR.test(line)) {
      errors.push(line);
      inError = false;
    } else if (UNDEFINED_CITATION.test(line)) {
      state.undefinedCitations = true;
    } else if (UNDEFINED_REFERENCES.test(line)) {
      // undefined citations alone explain this warning
      if (!state.undefinedCitations) state.undefinedReferences = true;
    } else if (missingFile.test(line)) {
      state.undefinedReferences = true;
    } else if (LABELS_CHANGED.test(line)) {
      state.labelsChanged = true;
    }
  }

  return { errors: errors.join('\n') };
}

function collect(log: string, patterns: RegExp[]): string {
  return log
    .split(/\r?\n/)
    .filter((line) => patterns.some((p) => p.test(line)))
    .join('\n');
}

export function extractBibtexDiagnostics(blg: string): string {
  return collect(blg, BIBTEX_DIAGNOSTICS);
}

export function extractMakeindexDiagnostics(ilg: string): string {
  return collect(ilg, MAKEINDEX_DIAGNOSTICS);
}
