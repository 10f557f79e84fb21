/**
 * Error codes for programmatic handling of ingestion failures.
 *
 * - `SOURCE_UNAVAILABLE` — the backing location cannot be reached or opened.
 * - `EMPTY_SOURCE` — no columns could be resolved for the source.
 * - `UNRESOLVABLE_FILETYPE` — no file format could be inferred, or none is registered.
 * - `UNSUPPORTED_MODE` — the requested combination of options is not supported (e.g. streaming a snapshot).
 * - `SCHEMA_VIOLATION` — columnar data is malformed (columns of different lengths).
 * - `INVALID_CONFIGURATION` — a construction-time or call-time parameter is out of range.
 * - `SOURCE_NOT_OPENED` — an accessor was called before `open()`.
 */
export const ErrorCode = {
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  EMPTY_SOURCE: 'EMPTY_SOURCE',
  UNRESOLVABLE_FILETYPE: 'UNRESOLVABLE_FILETYPE',
  UNSUPPORTED_MODE: 'UNSUPPORTED_MODE',
  SCHEMA_VIOLATION: 'SCHEMA_VIOLATION',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  SOURCE_NOT_OPENED: 'SOURCE_NOT_OPENED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Structured context attached to every error: the source description and the offending path or column. */
export type ErrorDetails = Readonly<Record<string, unknown>>;

/** Base class for every error raised by rowstream. */
export class RowstreamError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RowstreamError';
    this.code = code;
    this.details = details;
  }

  /** Flatten the error into a plain object suitable for structured logging. */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...this.details,
    };
  }
}

export class SourceUnavailableError extends RowstreamError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(ErrorCode.SOURCE_UNAVAILABLE, message, details, options);
    this.name = 'SourceUnavailableError';
  }
}

export class EmptySourceError extends RowstreamError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.EMPTY_SOURCE, message, details);
    this.name = 'EmptySourceError';
  }
}

export class UnresolvableFiletypeError extends RowstreamError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.UNRESOLVABLE_FILETYPE, message, details);
    this.name = 'UnresolvableFiletypeError';
  }
}

export class UnsupportedModeError extends RowstreamError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.UNSUPPORTED_MODE, message, details);
    this.name = 'UnsupportedModeError';
  }
}

export class SchemaViolationError extends RowstreamError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(ErrorCode.SCHEMA_VIOLATION, message, details, options);
    this.name = 'SchemaViolationError';
  }
}

export class InvalidConfigurationError extends RowstreamError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.INVALID_CONFIGURATION, message, details);
    this.name = 'InvalidConfigurationError';
  }
}

export class SourceNotOpenedError extends RowstreamError {
  constructor(source: string) {
    super(ErrorCode.SOURCE_NOT_OPENED, `${source}: source must be opened first. Call open() before reading.`, {
      source,
    });
    this.name = 'SourceNotOpenedError';
  }
}

/** Type guard for errors raised by rowstream. */
export function isRowstreamError(value: unknown): value is RowstreamError {
  return value instanceof RowstreamError;
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a failure to reach or open a source. Errors already raised by rowstream
 * pass through unchanged.
 */
export function asSourceUnavailable(error: unknown, message: string, details?: ErrorDetails): RowstreamError {
  if (isRowstreamError(error)) return error;
  return new SourceUnavailableError(`${message}: ${errorMessage(error)}`, details, { cause: error });
}
