/**
 * Validation module - re-exports all validators
 * @module @vnode/shared/validation
 */

// Pod validation
export {
  validateIdentityField,
  validatePodMetadata,
  validateContainer,
  validateContainers,
  validatePod,
  isValidPod,
} from './pod-validation';

// Configuration validation
export {
  validateNodeName,
  validateCapacityQuantity,
  validateCapacity,
  validateProviderConfig,
  isValidProviderConfig,
} from './config-validation';
