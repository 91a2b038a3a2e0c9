/**
 * Node status type definitions
 * @module @vnode/shared/types/node
 */

import type { ConditionStatus } from './pod';
import type { ResourceList } from './resources';

/**
 * Operating system families the provider may report
 */
export type OperatingSystem = 'linux' | 'windows';

/**
 * The one operating system this provider supports
 */
export const OPERATING_SYSTEM_LINUX: OperatingSystem = 'linux';

/**
 * Node condition types
 */
export type NodeConditionType =
  | 'Ready'
  | 'OutOfDisk'
  | 'MemoryPressure'
  | 'DiskPressure'
  | 'NetworkUnavailable';

/**
 * Node condition reported to the orchestrator
 */
export interface NodeCondition {
  type: NodeConditionType;
  status: ConditionStatus;
  lastHeartbeatTime: Date;
  lastTransitionTime: Date;
  reason: string;
  message: string;
}

export type NodeAddressType = 'Hostname' | 'InternalIP' | 'ExternalIP' | 'InternalDNS' | 'ExternalDNS';

export interface NodeAddress {
  type: NodeAddressType;
  address: string;
}

export interface DaemonEndpoint {
  port: number;
}

export interface NodeDaemonEndpoints {
  kubeletEndpoint: DaemonEndpoint;
}

export interface NodeSystemInfo {
  nodeName: string;
  operatingSystem: OperatingSystem;
  architecture: string;
}

/**
 * Aggregate node status snapshot
 */
export interface NodeStatus {
  capacity: ResourceList;
  allocatable: ResourceList;
  conditions: NodeCondition[];
  addresses: NodeAddress[];
  daemonEndpoints: NodeDaemonEndpoints;
  nodeInfo: NodeSystemInfo;
}
