/**
 * CLI Configuration
 *
 * Resolves the provider configuration from defaults, an optional JSON file,
 * the environment and command-line flags, in that order of precedence.
 * @module @vnode/cli/config
 */

import * as fs from 'node:fs';
import {
  DEFAULT_PROVIDER_CONFIG,
  ValidationError,
  isPlainObject,
  isValidProviderConfig,
  validateProviderConfig,
  type ProviderConfig,
  type ResourceList,
} from '@vnode/shared';

/**
 * Environment variables read by the CLI
 */
export const ENV_NODE_NAME = 'VNODE_NODE_NAME';
export const ENV_CPU = 'VNODE_CPU';
export const ENV_MEMORY = 'VNODE_MEMORY';
export const ENV_PODS = 'VNODE_PODS';
export const ENV_LOG_LEVEL = 'LOG_LEVEL';

/**
 * Configuration flags shared by the commands that build a provider
 */
export interface ConfigFlags {
  config?: string;
  nodeName?: string;
  cpu?: string;
  memory?: string;
  pods?: string;
  heartbeatInterval?: string;
  logLevel?: string;
}

/**
 * One source of configuration values, not yet validated
 */
type ConfigLayer = Record<string, unknown>;

/**
 * Reads a JSON configuration file
 */
export function readConfigFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Config file not found: ${filePath}`, [
      { field: 'config', message: 'File does not exist', rule: 'exists', received: filePath },
    ]);
  }

  const content = fs.readFileSync(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ValidationError(`Config file is not valid JSON: ${filePath}`, [
      { field: 'config', message: err instanceof Error ? err.message : String(err), rule: 'format' },
    ]);
  }

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`Config file must contain a JSON object: ${filePath}`, [
      { field: 'config', message: 'Expected an object', rule: 'type' },
    ]);
  }

  return parsed;
}

/**
 * Configuration values set in the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  const capacity: Partial<ResourceList> = {};

  if (env[ENV_NODE_NAME]) layer.nodeName = env[ENV_NODE_NAME];
  if (env[ENV_CPU]) capacity.cpu = env[ENV_CPU];
  if (env[ENV_MEMORY]) capacity.memory = env[ENV_MEMORY];
  if (env[ENV_PODS]) capacity.pods = env[ENV_PODS];
  if (env[ENV_LOG_LEVEL]) layer.logLevel = env[ENV_LOG_LEVEL];

  if (Object.keys(capacity).length > 0) {
    layer.capacity = capacity;
  }

  return layer;
}

/**
 * Configuration values given as command-line flags
 */
export function configFromFlags(flags: ConfigFlags): ConfigLayer {
  const layer: ConfigLayer = {};
  const capacity: Partial<ResourceList> = {};

  if (flags.nodeName !== undefined) layer.nodeName = flags.nodeName;
  if (flags.cpu !== undefined) capacity.cpu = flags.cpu;
  if (flags.memory !== undefined) capacity.memory = flags.memory;
  if (flags.pods !== undefined) capacity.pods = flags.pods;
  if (flags.logLevel !== undefined) layer.logLevel = flags.logLevel;
  if (flags.heartbeatInterval !== undefined) {
    layer.heartbeatIntervalMs = Number(flags.heartbeatInterval);
  }

  if (Object.keys(capacity).length > 0) {
    layer.capacity = capacity;
  }

  return layer;
}

/**
 * Merges layers left to right. Capacity entries merge individually.
 */
export function mergeConfigLayers(...layers: ConfigLayer[]): ConfigLayer {
  return layers.reduce<ConfigLayer>((merged, layer) => {
    const capacity = isPlainObject(merged.capacity) && isPlainObject(layer.capacity)
      ? { ...merged.capacity, ...layer.capacity }
      : layer.capacity ?? merged.capacity;

    return { ...merged, ...layer, capacity };
  }, {});
}

/**
 * Resolves and validates the provider configuration
 */
export function resolveProviderConfig(
  flags: ConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
): ProviderConfig {
  const defaults: ConfigLayer = {
    ...DEFAULT_PROVIDER_CONFIG,
    capacity: { ...DEFAULT_PROVIDER_CONFIG.capacity },
  };

  const candidate = mergeConfigLayers(
    defaults,
    flags.config ? readConfigFile(flags.config) : {},
    configFromEnv(env),
    configFromFlags(flags),
  );

  if (!isValidProviderConfig(candidate)) {
    throw ValidationError.multiple(validateProviderConfig(candidate).errors, 'configuration');
  }

  return {
    nodeName: candidate.nodeName,
    operatingSystem: candidate.operatingSystem,
    capacity: {
      cpu: candidate.capacity.cpu,
      memory: candidate.capacity.memory,
      pods: candidate.capacity.pods,
    },
    heartbeatIntervalMs: candidate.heartbeatIntervalMs,
    logLevel: candidate.logLevel,
  };
}
