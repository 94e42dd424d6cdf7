/**
 * Error taxonomy.
 *
 * Every failure dirpack raises is a DirpackError with a stable `code`, so the CLI
 * (and library callers) can tell a bad flag from a broken repository without
 * matching on message text. Only model requests are retried (see callLLM).
 */

export type DirpackErrorCode =
  | 'CONFIG'
  | 'WALK'
  | 'REVISION'
  | 'DIFF'
  | 'READ'
  | 'HISTORICAL_READ'
  | 'ENCODING'
  | 'OUTPUT'
  | 'SUMMARY';

export class DirpackError extends Error {
  constructor(
    message: string,
    public readonly code: DirpackErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DirpackError';
  }
}

/** Invalid criteria or option combination, raised before any traversal. */
export class ConfigError extends DirpackError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/** Traversal root missing or not a directory. Per-entry walk problems are reported, not thrown. */
export class WalkError extends DirpackError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'WALK', options);
    this.name = 'WalkError';
  }
}

export class RevisionError extends DirpackError {
  constructor(
    message: string,
    public readonly ref: string,
    public readonly stderr: string = ''
  ) {
    super(message, 'REVISION');
    this.name = 'RevisionError';
  }
}

export class DiffError extends DirpackError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stderr: string = ''
  ) {
    super(message, 'DIFF');
    this.name = 'DiffError';
  }
}

export class ReadError extends DirpackError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'READ', options);
    this.name = 'ReadError';
  }
}

/** The path does not exist in the tree of the requested revision. */
export class HistoricalReadError extends DirpackError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly ref: string
  ) {
    super(message, 'HISTORICAL_READ');
    this.name = 'HistoricalReadError';
  }
}

export class EncodingError extends DirpackError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, 'ENCODING');
    this.name = 'EncodingError';
  }
}

export class OutputError extends DirpackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'OUTPUT', options);
    this.name = 'OutputError';
  }
}

/** A model request failed, timed out or returned nothing usable. */
export class SummaryError extends DirpackError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'SUMMARY', options);
    this.name = 'SummaryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
