/**
 * Validation error class
 * @module @vnode/shared/errors/validation-error
 */

import { ProviderError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for input and configuration failures
 */
export class ValidationError extends ProviderError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create from a single field error
   */
  static field(field: string, message: string, rule?: string): ValidationError {
    return new ValidationError(`Validation failed for field: ${field}`, [
      { field, message, rule },
    ], { field });
  }

  /**
   * Create for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', rule: 'required' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[], subject?: string): ValidationError {
    const fieldNames = errors.map(e => e.field).join(', ');
    const prefix = subject ? `Invalid ${subject}` : 'Validation failed';
    return new ValidationError(`${prefix} for fields: ${fieldNames}`, errors);
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  /**
   * Get errors for a specific field
   */
  getFieldErrors(field: string): ValidationErrorDetail[] {
    return this.details.filter(d => d.field === field);
  }

  /**
   * Convert to JSON for API responses
   */
  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Result of running a validator over untrusted input
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationErrorDetail[];
}
