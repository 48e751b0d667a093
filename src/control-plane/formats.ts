import { ConfigurationError, FormatError } from '../errors.js';
import type {
  FormatName,
  FormatterName,
  PostprocessorName,
  ResolvedFormat,
  ToolName,
  ToolPaths,
} from './types.js';

interface FormatSpec {
  formatter: FormatterName;
  postprocessors: PostprocessorName[];
  extension: ResolvedFormat['extension'];
}

const FORMATS: Record<FormatName, FormatSpec> = {
  dvi: { formatter: 'latex', postprocessors: [], extension: 'dvi' },
  ps: { formatter: 'latex', postprocessors: ['dvips'], extension: 'ps' },
  pdf: { formatter: 'pdflatex', postprocessors: [], extension: 'pdf' },
  'pdf(ps)': { formatter: 'latex', postprocessors: ['dvips', 'ps2pdf'], extension: 'pdf' },
  ps2pdf: { formatter: 'latex', postprocessors: ['dvips', 'ps2pdf'], extension: 'pdf' },
  'pdf(dvi)': { formatter: 'latex', postprocessors: ['dvipdfm'], extension: 'pdf' },
};

const FILE_EXTENSION = /\.(\w+)$/;

function isFormatName(value: string): value is FormatName {
  return Object.prototype.hasOwnProperty.call(FORMATS, value);
}

function lookup(name: string): FormatName | null {
  const lower = name.toLowerCase();
  return isFormatName(lower) ? lower : null;
}

/**
 * Picks the format from, in order: the explicit format option, the output
 * file's extension, or the output argument itself when it is a bare format
 * name (it then stops being an output file).
 */
export function resolveFormat(format: string | undefined, output: string | undefined): ResolvedFormat {
  let name: FormatName | null;
  let outputFile = output;

  if (format) {
    name = lookup(format);
    if (!name) throw new FormatError(`invalid output format: ${format}`);
  } else {
    if (output === undefined || output === '') {
      throw new FormatError('output format not specified');
    }
    const ext = FILE_EXTENSION.exec(output);
    if (ext) {
      name = lookup(ext[1]);
      if (!name) throw new FormatError(`invalid output format: ${ext[1]}`);
    } else {
      name = lookup(output);
      if (!name) {
        throw new FormatError(`cannot determine output format from file name: ${output}`);
      }
      outputFile = undefined;
    }
  }

  const entry = FORMATS[name];
  const resolved: ResolvedFormat = {
    format: name,
    formatter: entry.formatter,
    postprocessors: [...entry.postprocessors],
    extension: entry.extension,
  };
  if (outputFile !== undefined && outputFile !== '') resolved.output = outputFile;
  return resolved;
}

export function requireToolPath(tools: ToolPaths, tool: ToolName): string {
  const program = tools[tool];
  if (!program) {
    throw new ConfigurationError(`${tool} cannot be found, please specify its location`);
  }
  return program;
}

/** Fails before anything runs if the formatter or a postprocessor has no path. */
export function assertToolsConfigured(resolved: ResolvedFormat, tools: ToolPaths): void {
  requireToolPath(tools, resolved.formatter);
  for (const tool of resolved.postprocessors) {
    requireToolPath(tools, tool);
  }
}
