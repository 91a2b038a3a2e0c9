/**
 * Provider configuration
 * @module @vnode/shared/types/config
 */

import type { LogLevel } from '../logging/logger';
import type { OperatingSystem } from './node';
import type { ResourceList } from './resources';
import { DEFAULT_CAPACITY } from './resources';

/**
 * Virtual node provider configuration
 */
export interface ProviderConfig {
  /** Name this virtual node registers under */
  nodeName: string;
  /** Operating system family reported to the orchestrator */
  operatingSystem: OperatingSystem;
  /** Advertised resource ceiling */
  capacity: ResourceList;
  /** Node status report interval in milliseconds */
  heartbeatIntervalMs: number;
  /** Minimum log level */
  logLevel: LogLevel;
}

/**
 * Default provider configuration
 */
export const DEFAULT_PROVIDER_CONFIG: ProviderConfig = {
  nodeName: 'virtual-node',
  operatingSystem: 'linux',
  capacity: { ...DEFAULT_CAPACITY },
  heartbeatIntervalMs: 15_000,
  logLevel: 'info',
};
