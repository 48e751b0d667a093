import { describe, it, expect } from 'vitest';
import { assertToolsConfigured, resolveFormat } from '../control-plane/formats.js';
import { DEFAULT_TOOL_PATHS } from '../control-plane/config.js';
import { ConfigurationError, FormatError } from '../errors.js';

describe('resolveFormat', () => {
  it('infers pdf from the output file name', () => {
    expect(resolveFormat(undefined, 'example.pdf')).toEqual({
      format: 'pdf',
      formatter: 'pdflatex',
      postprocessors: [],
      extension: 'pdf',
      output: 'example.pdf',
    });
  });

  it('infers PostScript through dvips from a .ps name', () => {
    const resolved = resolveFormat(undefined, 'example.ps');
    expect(resolved.formatter).toBe('latex');
    expect(resolved.postprocessors).toEqual(['dvips']);
    expect(resolved.extension).toBe('ps');
  });

  it('produces DVI with no postprocessing', () => {
    expect(resolveFormat('dvi', undefined)).toEqual({
      format: 'dvi',
      formatter: 'latex',
      postprocessors: [],
      extension: 'dvi',
    });
  });

  it('chains dvips and ps2pdf for pdf(ps) and its ps2pdf alias', () => {
    for (const name of ['pdf(ps)', 'ps2pdf']) {
      const resolved = resolveFormat(name, undefined);
      expect(resolved.formatter).toBe('latex');
      expect(resolved.postprocessors).toEqual(['dvips', 'ps2pdf']);
      expect(resolved.extension).toBe('pdf');
    }
  });

  it('uses dvipdfm for pdf(dvi)', () => {
    const resolved = resolveFormat('pdf(dvi)', undefined);
    expect(resolved.postprocessors).toEqual(['dvipdfm']);
    expect(resolved.extension).toBe('pdf');
  });

  it('prefers the explicit format over the file extension', () => {
    const resolved = resolveFormat('pdf(ps)', 'report.pdf');
    expect(resolved.format).toBe('pdf(ps)');
    expect(resolved.output).toBe('report.pdf');
  });

  it('is case-insensitive', () => {
    expect(resolveFormat('PDF', undefined).format).toBe('pdf');
    expect(resolveFormat(undefined, 'REPORT.PS').format).toBe('ps');
  });

  it('treats a bare format name as the format, not a file', () => {
    const resolved = resolveFormat(undefined, 'pdf');
    expect(resolved.format).toBe('pdf');
    expect(resolved.output).toBeUndefined();
  });

  it('rejects an unknown format', () => {
    expect(() => resolveFormat('nonsense', undefined)).toThrow(FormatError);
    expect(() => resolveFormat('nonsense', undefined)).toThrow('invalid output format: nonsense');
  });

  it('rejects an unknown file extension', () => {
    expect(() => resolveFormat(undefined, 'notes.txt')).toThrow('invalid output format: txt');
  });

  it('rejects an output name it cannot read a format from', () => {
    expect(() => resolveFormat(undefined, 'report')).toThrow(
      'cannot determine output format from file name: report'
    );
  });

  it('requires either a format or an output', () => {
    expect(() => resolveFormat(undefined, undefined)).toThrow('output format not specified');
  });
});

describe('assertToolsConfigured', () => {
  it('passes when every tool has a path', () => {
    expect(() => assertToolsConfigured(resolveFormat('pdf(ps)', undefined), DEFAULT_TOOL_PATHS)).not.toThrow();
  });

  it('names the first missing postprocessor', () => {
    const tools = { latex: '/usr/bin/latex', dvips: '/usr/bin/dvips' };
    expect(() => assertToolsConfigured(resolveFormat('pdf(ps)', undefined), tools)).toThrow(
      new ConfigurationError('ps2pdf cannot be found, please specify its location')
    );
  });

  it('names a missing formatter', () => {
    expect(() => assertToolsConfigured(resolveFormat('pdf', undefined), {})).toThrow(
      'pdflatex cannot be found, please specify its location'
    );
  });
});
