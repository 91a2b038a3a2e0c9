/**
 * Base error class with error codes
 * @module @vnode/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  NOT_IMPLEMENTED = 1002,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,
  CONSTRAINT_VIOLATION = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,
  CONFLICT = 5002,

  // Pod errors (6xxx)
  POD_NOT_FOUND = 6000,
  POD_ALREADY_EXISTS = 6001,
  POD_START_FAILED = 6002,
  POD_STOP_FAILED = 6003,
}

/**
 * Codes that mean "the identity does not exist"
 */
const NOT_FOUND_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.NOT_FOUND,
  ErrorCode.POD_NOT_FOUND,
]);

/**
 * Codes that mean "the identity is already taken"
 */
const ALREADY_EXISTS_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.ALREADY_EXISTS,
  ErrorCode.CONFLICT,
  ErrorCode.POD_ALREADY_EXISTS,
]);

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all provider errors
 */
export class ProviderError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = statusCodeFor(code);

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  isNotFound(): boolean {
    return NOT_FOUND_CODES.has(this.code);
  }

  isAlreadyExists(): boolean {
    return ALREADY_EXISTS_CODES.has(this.code);
  }

  /**
   * Check if this is a client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  /**
   * Check if this is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode >= 500;
  }
}

/**
 * Map error code to HTTP status code
 */
export function statusCodeFor(code: ErrorCode): number {
  if (NOT_FOUND_CODES.has(code)) {
    return 404;
  }
  if (ALREADY_EXISTS_CODES.has(code)) {
    return 409;
  }

  switch (Math.floor(code / 1000)) {
    case 2: // Validation
      return 400;
    case 5: // Resource
      return 400;
    default:
      return 500;
  }
}

/**
 * Check if an error is a ProviderError
 */
export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Check if an error reports a missing identity
 */
export function isNotFound(error: unknown): boolean {
  return isProviderError(error) && error.isNotFound();
}

/**
 * Check if an error reports a duplicate identity
 */
export function isAlreadyExists(error: unknown): boolean {
  return isProviderError(error) && error.isAlreadyExists();
}

/**
 * Wrap an unknown error as a ProviderError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): ProviderError {
  if (isProviderError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ProviderError(error.message, code, {}, error);
  }

  return new ProviderError(String(error), code);
}
