import type { PipelineErrorKind, PipelineFailure } from './control-plane/types.js';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  /** Diagnostic text lifted verbatim from a tool's log, when there is any. */
  readonly log?: string;

  constructor(kind: PipelineErrorKind, message: string, log?: string) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.log = log;
  }

  toFailure(): PipelineFailure {
    return this.log === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, log: this.log };
  }
}

/** Missing executable path, missing output directory, unsupported platform. */
export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class FormatError extends PipelineError {
  constructor(message: string) {
    super('format', message);
    this.name = 'FormatError';
  }
}

export class ProcessingError extends PipelineError {
  constructor(message: string, log?: string) {
    super('processing', message, log);
    this.name = 'ProcessingError';
  }
}

export class WorkspaceIOError extends PipelineError {
  constructor(message: string) {
    super('io', message);
    this.name = 'WorkspaceIOError';
  }
}

export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ProcessingError(message);
}

export function fromFailure(failure: PipelineFailure): PipelineError {
  switch (failure.kind) {
    case 'configuration':
      return new ConfigurationError(failure.message);
    case 'format':
      return new FormatError(failure.message);
    case 'processing':
      return new ProcessingError(failure.message, failure.log);
    case 'io':
      return new WorkspaceIOError(failure.message);
  }
}
