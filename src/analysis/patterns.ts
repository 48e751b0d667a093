/** TeX error line: starts with "!" */
export const ERROR_LINE = /^!/;

/** Line designator closing an error block, e.g. "l.12 \foo" */
export const LINE_DESIGNATOR = /^l\.\d/;

export const UNDEFINED_CITATION = /^LaTeX Warning: Citation .* on page \d+ undefined/;

export const UNDEFINED_REFERENCES = /LaTeX Warning: There were undefined references\./;

/** Matches both "Label(s) may have changed." and "Labels may have changed." */
export const LABELS_CHANGED = /^LaTeX Warning: Label(?:s|\(s\)) may have changed\./;

/** Auxiliary lines that bibtex reads from the .aux file. */
export const CITATION_COMMAND = /^\\citation/;

/** bibtex .blg lines worth showing when bibtex fails. */
export const BIBTEX_DIAGNOSTICS: RegExp[] = [
  /^I couldn't open /,
  /^I found no /,
  /^I was expecting /,
  /^Repeated entry/,
  /^---line \d+ of file /,
  /^\(There (?:was|were) \d+ error messages?\)/,
];

/** makeindex .ilg lines: "!! Input index error ..." and the "-- " detail below it. */
export const MAKEINDEX_DIAGNOSTICS: RegExp[] = [/^!! /, /^\s+-- /, /^Can't (?:find|create) /];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** "No file <basename>.toc" and its .lof/.lot siblings. */
export function missingListFile(basename: string): RegExp {
  return new RegExp(`No file ${escapeRegExp(basename)}\\.(toc|lof|lot)`);
}
