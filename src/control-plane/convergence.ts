import { CITATION_COMMAND } from '../analysis/patterns.js';
import type { ConvergenceState } from './types.js';

/**
 * Historical status bits. Only UndefinedReferences and LabelsChanged are
 * derived from the flags; the rest are reserved and drive no transition.
 */
export const StatusFlag = {
  UndefinedReferences: 1,
  LabelsChanged: 2,
  NewToc: 4,
  NewCitations: 8,
  NewIndex: 16,
} as const;

export function createConvergenceState(): ConvergenceState {
  return {
    undefinedCitations: false,
    undefinedReferences: false,
    labelsChanged: false,
    rerunForced: false,
  };
}

/** Cleared on entry to every formatter run, before its log is scanned. */
export function resetConvergenceState(state: ConvergenceState): void {
  state.undefinedCitations = false;
  state.undefinedReferences = false;
  state.labelsChanged = false;
  state.rerunForced = false;
}

export function statusBits(state: ConvergenceState): number {
  let bits = 0;
  if (state.undefinedReferences) bits |= StatusFlag.UndefinedReferences;
  if (state.labelsChanged) bits |= StatusFlag.LabelsChanged;
  return bits;
}

export function formatterRequired(state: ConvergenceState, auxExists: boolean): boolean {
  return (
    state.undefinedReferences ||
    state.labelsChanged ||
    state.rerunForced ||
    !auxExists
  );
}

/** A missing backup never matches. */
export function sameContent(current: Buffer, backup: Buffer | null): boolean {
  return backup !== null && current.equals(backup);
}

/** Keeps the \citation lines of an .aux file, line endings included. */
export function extractCitationLines(aux: string): string {
  return aux
    .split(/(?<=\n)/)
    .filter((line) => CITATION_COMMAND.test(line))
    .join('');
}
