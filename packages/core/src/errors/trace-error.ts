/**
 * Error types for change tracking
 */

export type TraceErrorCode =
  | 'MISSING_OPTION'
  | 'INVALID_OPTIONS'
  | 'KEY_COLUMN_MISSING'
  | 'DUPLICATE_KEY'
  | 'NO_LOGGER_ATTACHED'
  | 'LOGGER_DETACHED'
  | 'NOT_TABULAR';

export interface TraceErrorDetails {
  /** Error code for programmatic handling */
  code: TraceErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class TraceError extends Error {
  readonly code: TraceErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: TraceErrorDetails) {
    super(details.message);
    this.name = 'TraceError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error with its suggested fix
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Raised for bad logger or dump options and for snapshots that violate the
 * key column contract (absent or duplicated keys).
 */
export class ConfigurationError extends TraceError {
  constructor(details: TraceErrorDetails) {
    super(details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the lifecycle controls are called out of order, or when a
 * logger receives data of the wrong shape.
 */
export class UsageError extends TraceError {
  constructor(details: TraceErrorDetails) {
    super(details);
    this.name = 'UsageError';
  }
}
