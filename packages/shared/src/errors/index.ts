/**
 * Error classes for the virtual node provider
 * @module @vnode/shared/errors
 */

// Base error
export {
  ProviderError,
  ErrorCode,
  statusCodeFor,
  isProviderError,
  isNotFound,
  isAlreadyExists,
  wrapError,
} from './base-error';

export type { ErrorMeta } from './base-error';

// Validation errors
export {
  ValidationError,
  isValidationError,
} from './validation-error';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error';

// Pod errors
export {
  PodError,
  isPodError,
} from './pod-error';
