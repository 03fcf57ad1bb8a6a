/**
 * Defines the severity levels for pipewright errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
}

/**
 * Base interface for pipewright error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a PipewrightError instance.
 */
export interface PipewrightErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for all custom pipewright errors.
 * Provides structure for error codes, severity and details.
 */
export class PipewrightError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: PipewrightErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  public toString(): string {
    return `[${this.code}] ${this.message} (Severity: ${this.severity})`;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    return result;
  }
}
