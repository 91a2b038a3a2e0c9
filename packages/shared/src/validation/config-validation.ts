/**
 * Provider configuration validation
 * @module @vnode/shared/validation/config-validation
 */

import type { ValidationErrorDetail, ValidationResult } from '../errors/validation-error';
import type { ProviderConfig } from '../types/config';
import { OPERATING_SYSTEM_LINUX } from '../types/node';
import { isLogLevel } from '../logging/logger';
import { isPlainObject } from '../utils/index';
import { parseQuantity } from '../utils/quantity';

/**
 * Node name pattern: DNS subdomain
 */
const NODE_NAME_PATTERN = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;

/**
 * Validate the node name
 */
export function validateNodeName(name: unknown): ValidationErrorDetail | null {
  if (typeof name !== 'string' || name.length === 0) {
    return { field: 'nodeName', message: 'Node name is required', rule: 'required' };
  }

  if (name.length > 253 || !NODE_NAME_PATTERN.test(name)) {
    return {
      field: 'nodeName',
      message: 'Node name must be lowercase alphanumeric characters, hyphens or dots, max 253 characters',
      rule: 'format',
      received: name,
    };
  }

  return null;
}

/**
 * Validate a capacity quantity
 */
export function validateCapacityQuantity(
  value: unknown,
  field: string,
  integer = false,
): ValidationErrorDetail | null {
  if (typeof value !== 'string') {
    return { field, message: 'Quantity must be a string', rule: 'type', received: value };
  }

  const parsed = parseQuantity(value);
  if (parsed === null) {
    return { field, message: `Invalid quantity '${value}'`, rule: 'format', received: value };
  }

  if (parsed <= 0) {
    return { field, message: 'Quantity must be greater than zero', rule: 'range', received: value };
  }

  if (integer && !Number.isInteger(parsed)) {
    return { field, message: 'Quantity must be a whole number', rule: 'integer', received: value };
  }

  return null;
}

/**
 * Validate the advertised capacity
 */
export function validateCapacity(capacity: unknown): ValidationErrorDetail[] {
  if (!isPlainObject(capacity)) {
    return [{ field: 'capacity', message: 'Capacity must be an object', rule: 'type' }];
  }

  const errors: ValidationErrorDetail[] = [];

  const cpuError = validateCapacityQuantity(capacity.cpu, 'capacity.cpu');
  if (cpuError) errors.push(cpuError);

  const memoryError = validateCapacityQuantity(capacity.memory, 'capacity.memory');
  if (memoryError) errors.push(memoryError);

  const podsError = validateCapacityQuantity(capacity.pods, 'capacity.pods', true);
  if (podsError) errors.push(podsError);

  return errors;
}

/**
 * Validate a full provider configuration
 */
export function validateProviderConfig(input: unknown): ValidationResult {
  if (!isPlainObject(input)) {
    return {
      valid: false,
      errors: [{ field: 'config', message: 'Configuration must be an object', rule: 'type' }],
    };
  }

  const errors: ValidationErrorDetail[] = [];

  const nodeNameError = validateNodeName(input.nodeName);
  if (nodeNameError) errors.push(nodeNameError);

  if (input.operatingSystem !== OPERATING_SYSTEM_LINUX) {
    errors.push({
      field: 'operatingSystem',
      message: `Only '${OPERATING_SYSTEM_LINUX}' is supported`,
      rule: 'enum',
      received: input.operatingSystem,
    });
  }

  errors.push(...validateCapacity(input.capacity));

  const interval = input.heartbeatIntervalMs;
  if (typeof interval !== 'number' || !Number.isInteger(interval) || interval <= 0) {
    errors.push({
      field: 'heartbeatIntervalMs',
      message: 'Heartbeat interval must be a positive integer',
      rule: 'range',
      received: interval,
    });
  }

  if (!isLogLevel(input.logLevel)) {
    errors.push({
      field: 'logLevel',
      message: 'Log level must be one of debug, info, warn, error, fatal',
      rule: 'enum',
      received: input.logLevel,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Type guard over validateProviderConfig
 */
export function isValidProviderConfig(input: unknown): input is ProviderConfig {
  return validateProviderConfig(input).valid;
}
