/**
 * Pod request validation
 * @module @vnode/shared/validation/pod-validation
 *
 * Shape checks on pods handed to the provider. The pod IP annotation is
 * not inspected.
 */

import type { ValidationErrorDetail, ValidationResult } from '../errors/validation-error';
import type { Pod } from '../types/pod';
import { isPlainObject, isStringArray, isStringMap } from '../utils/index';

/**
 * Maximum length of a namespace or pod name
 */
const MAX_NAME_LENGTH = 253;

/**
 * Validate a namespace or pod name
 */
export function validateIdentityField(value: unknown, field: string): ValidationErrorDetail | null {
  if (value === undefined || value === null) {
    return { field, message: 'This field is required', rule: 'required' };
  }

  if (typeof value !== 'string') {
    return { field, message: 'Must be a string', rule: 'type', received: value };
  }

  if (value.length === 0) {
    return { field, message: 'Must not be empty', rule: 'required' };
  }

  if (value.length > MAX_NAME_LENGTH) {
    return {
      field,
      message: `Must be at most ${MAX_NAME_LENGTH} characters`,
      rule: 'length',
      received: value.length,
    };
  }

  return null;
}

/**
 * Validate pod metadata
 */
export function validatePodMetadata(metadata: unknown): ValidationErrorDetail[] {
  if (!isPlainObject(metadata)) {
    return [{ field: 'metadata', message: 'Metadata must be an object', rule: 'type' }];
  }

  const errors: ValidationErrorDetail[] = [];

  const namespaceError = validateIdentityField(metadata.namespace, 'metadata.namespace');
  if (namespaceError) errors.push(namespaceError);

  const nameError = validateIdentityField(metadata.name, 'metadata.name');
  if (nameError) errors.push(nameError);

  if (metadata.uid !== undefined && typeof metadata.uid !== 'string') {
    errors.push({ field: 'metadata.uid', message: 'UID must be a string', rule: 'type' });
  }

  if (metadata.labels !== undefined && !isStringMap(metadata.labels)) {
    errors.push({ field: 'metadata.labels', message: 'Labels must map strings to strings', rule: 'type' });
  }

  if (metadata.annotations !== undefined && !isStringMap(metadata.annotations)) {
    errors.push({
      field: 'metadata.annotations',
      message: 'Annotations must map strings to strings',
      rule: 'type',
    });
  }

  if (metadata.creationTimestamp !== undefined && !(metadata.creationTimestamp instanceof Date)) {
    errors.push({
      field: 'metadata.creationTimestamp',
      message: 'Creation timestamp must be a Date',
      rule: 'type',
    });
  }

  return errors;
}

/**
 * Validate a single container entry
 */
export function validateContainer(container: unknown, index: number): ValidationErrorDetail[] {
  const prefix = `spec.containers[${index}]`;

  if (!isPlainObject(container)) {
    return [{ field: prefix, message: 'Container must be an object', rule: 'type' }];
  }

  const errors: ValidationErrorDetail[] = [];

  const nameError = validateIdentityField(container.name, `${prefix}.name`);
  if (nameError) errors.push(nameError);

  if (container.image !== undefined && typeof container.image !== 'string') {
    errors.push({ field: `${prefix}.image`, message: 'Image must be a string', rule: 'type' });
  }

  for (const key of ['command', 'args'] as const) {
    if (container[key] !== undefined && !isStringArray(container[key])) {
      errors.push({ field: `${prefix}.${key}`, message: 'Must be an array of strings', rule: 'type' });
    }
  }

  for (const key of ['env', 'ports'] as const) {
    if (container[key] !== undefined && !Array.isArray(container[key])) {
      errors.push({ field: `${prefix}.${key}`, message: 'Must be an array', rule: 'type' });
    }
  }

  if (container.resources !== undefined && !isPlainObject(container.resources)) {
    errors.push({ field: `${prefix}.resources`, message: 'Resources must be an object', rule: 'type' });
  }

  return errors;
}

/**
 * Validate the container list: every entry valid and names unique
 */
export function validateContainers(containers: unknown): ValidationErrorDetail[] {
  if (!Array.isArray(containers)) {
    return [{ field: 'spec.containers', message: 'Containers must be an array', rule: 'type' }];
  }

  const errors: ValidationErrorDetail[] = [];
  const seen = new Set<string>();

  containers.forEach((container: unknown, index) => {
    errors.push(...validateContainer(container, index));

    if (isPlainObject(container) && typeof container.name === 'string' && container.name.length > 0) {
      if (seen.has(container.name)) {
        errors.push({
          field: `spec.containers[${index}].name`,
          message: `Duplicate container name '${container.name}'`,
          rule: 'unique',
          received: container.name,
        });
      }
      seen.add(container.name);
    }
  });

  return errors;
}

/**
 * Validate a pod handed to create or update
 */
export function validatePod(input: unknown): ValidationResult {
  if (input === undefined || input === null) {
    return {
      valid: false,
      errors: [{ field: 'pod', message: 'Pod is required', rule: 'required' }],
    };
  }

  if (!isPlainObject(input)) {
    return {
      valid: false,
      errors: [{ field: 'pod', message: 'Pod must be an object', rule: 'type' }],
    };
  }

  const errors: ValidationErrorDetail[] = [...validatePodMetadata(input.metadata)];

  if (!isPlainObject(input.spec)) {
    errors.push({ field: 'spec', message: 'Spec must be an object', rule: 'type' });
  } else {
    errors.push(...validateContainers(input.spec.containers));
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Type guard over validatePod
 */
export function isValidPod(input: unknown): input is Pod {
  return validatePod(input).valid;
}
