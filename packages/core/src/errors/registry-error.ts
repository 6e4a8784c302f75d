/**
 * Error types for snapshot loading, change detection and persistence
 * Messages carry a suggested action so batch logs are actionable
 */

export type LoadErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_FAILED'
  | 'MALFORMED_RECORD'
  | 'DUPLICATE_IDENTIFIER'
  | 'MISSING_SNAPSHOT_DATE'
  | 'UNSUPPORTED_FORMAT'
  | 'NO_DATA';

export type PersistenceErrorCode =
  | 'WRITE_FAILED'
  | 'READ_FAILED'
  | 'CONNECTION_FAILED'
  | 'INVALID_IDENTIFIER';

export type ErrorCode =
  | LoadErrorCode
  | PersistenceErrorCode
  | 'INVALID_OPTIONS'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface RegistryErrorDetails<TCode extends ErrorCode = ErrorCode> {
  /** Error code for programmatic handling */
  code: TCode;
  /** Human-readable message */
  message: string;
  /** Snapshot source or store that raised the error */
  source?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class RegistryError<TCode extends ErrorCode = ErrorCode> extends Error {
  readonly code: TCode;
  readonly source?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: RegistryErrorDetails<TCode>) {
    super(details.message);
    this.name = 'RegistryError';
    this.code = details.code;
    this.source = details.source;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Format error as a structured, actionable message
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.source) {
      parts.push(`Source: ${this.source}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured log output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      source: this.source,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * A snapshot source could not be read or contained malformed records.
 */
export class LoadError extends RegistryError<LoadErrorCode> {
  constructor(details: RegistryErrorDetails<LoadErrorCode>) {
    super(details);
    this.name = 'LoadError';
  }
}

/**
 * The change log store could not be written or read.
 */
export class PersistenceError extends RegistryError<PersistenceErrorCode> {
  constructor(details: RegistryErrorDetails<PersistenceErrorCode>) {
    super(details);
    this.name = 'PersistenceError';
  }
}

/**
 * Helper to wrap unknown errors as RegistryError
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN',
  source?: string
): RegistryError {
  if (error instanceof RegistryError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new RegistryError({
    code: defaultCode,
    message,
    source,
    cause,
  });
}
