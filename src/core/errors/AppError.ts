/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the sampling pipeline.
 *
 * USAGE:
 * ```typescript
 * throw new ResolutionError('Geocode failed for "Home": ZERO_RESULTS', ErrorCode.GEOCODE_NO_RESULTS, { label });
 * ```
 *
 * Every error aborts the current invocation. The entry point logs it and
 * exits with `exitCode`; the next scheduled run is the only retry.
 *
 * =============================================================================
 */

import { ErrorCode, EXIT_CODE } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly exitCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    isOperational: boolean = true,
    exitCode: number = EXIT_CODE.FAILURE
  ) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Structured form for logs
   */
  toJSON(): ErrorPayload {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

export interface ErrorPayload {
  name: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

// =============================================================================
// PIPELINE ERRORS
// =============================================================================

/**
 * Required setting absent or invalid. Raised before any component runs.
 */
export class ConfigurationError extends AppError {
  public readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    super(
      `Invalid configuration: ${issues.map(i => `${i.variable} (${i.message})`).join(', ')}`,
      ErrorCode.CONFIG_INVALID,
      { issues },
      true,
      EXIT_CODE.CONFIGURATION
    );
    this.issues = issues;
  }
}

export interface ConfigurationIssue {
  variable: string;
  message: string;
}

/**
 * Geocoding provider rejected the address or returned nothing
 */
export class ResolutionError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GEOCODE_REJECTED,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
  }
}

/**
 * Routing provider call failed or returned no routes
 */
export class UpstreamError extends AppError {
  public readonly status?: number;
  public readonly body?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ROUTES_HTTP_ERROR,
    options: { status?: number; body?: unknown; cause?: unknown } = {}
  ) {
    super(message, code, {
      ...(options.status !== undefined && { status: options.status }),
      ...(options.body !== undefined && { body: options.body }),
      ...(options.cause instanceof Error && { cause: options.cause.message }),
    });
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * A route field was absent or did not have the expected textual shape
 */
export class ParseError extends AppError {
  public readonly field: string;

  constructor(
    field: string,
    message: string,
    code: ErrorCode = ErrorCode.PARSE_BAD_FORMAT,
    value?: unknown
  ) {
    super(message, code, { field, ...(value !== undefined && { value }) });
    this.field = field;
  }
}

/**
 * Database operation failed; any open transaction has been rolled back
 */
export class StorageError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_WRITE_FAILED,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
  }
}

/**
 * Unexpected failure (programming error, unknown throwable)
 */
export class InternalError extends AppError {
  constructor(
    message: string = 'Internal error',
    details?: Record<string, unknown>
  ) {
    super(message, ErrorCode.INTERNAL_ERROR, details, false);
  }
}

// =============================================================================
// NORMALIZATION
// =============================================================================

/**
 * Normalize any throwable into an AppError
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name });
  }
  return new InternalError(String(error));
}
