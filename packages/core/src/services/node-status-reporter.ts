/**
 * Node status reporter
 * Static capacity, conditions and identity of the virtual node
 * @module @vnode/core/services/node-status-reporter
 */

import type {
  NodeAddress,
  NodeCondition,
  NodeConditionType,
  NodeDaemonEndpoints,
  NodeStatus,
  NodeStatusProvider,
  OperatingSystem,
  ResourceList,
  ConditionStatus,
} from '@vnode/shared';
import {
  DEFAULT_PROVIDER_CONFIG,
  createServiceLogger,
  type Logger,
} from '@vnode/shared';
import { systemClock, type Clock } from '../models/pod-status';

/**
 * Logger for node status operations
 */
const defaultLogger = createServiceLogger({
  level: 'debug',
  service: 'vnode-provider',
}, { component: 'node-status-reporter' });

// ============================================================================
// Types
// ============================================================================

/**
 * Callback receiving each heartbeat's node status
 */
export type OnNodeStatusCallback = (status: NodeStatus) => void | Promise<void>;

/**
 * Node status reporter options
 */
export interface NodeStatusReporterOptions {
  nodeName?: string;
  operatingSystem?: OperatingSystem;
  /** Advertised capacity; missing entries fall back to the defaults */
  capacity?: Partial<ResourceList>;
  /** Architecture reported in node info (default: amd64) */
  architecture?: string;
  /** Heartbeat interval in milliseconds (default: 15000) */
  heartbeatIntervalMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Fixed part of a node condition
 */
interface NodeConditionTemplate {
  type: NodeConditionType;
  status: ConditionStatus;
  reason: string;
  message: string;
}

/**
 * Conditions reported on every call, in order. Consumers match on these
 * strings.
 */
export const NODE_CONDITION_TEMPLATES: readonly NodeConditionTemplate[] = [
  {
    type: 'Ready',
    status: 'True',
    reason: 'KubeletReady',
    message: 'kubelet is ready.',
  },
  {
    type: 'OutOfDisk',
    status: 'False',
    reason: 'KubeletHasSufficientDisk',
    message: 'kubelet has sufficient disk space available',
  },
  {
    type: 'MemoryPressure',
    status: 'False',
    reason: 'KubeletHasSufficientMemory',
    message: 'kubelet has sufficient memory available',
  },
  {
    type: 'DiskPressure',
    status: 'False',
    reason: 'KubeletHasNoDiskPressure',
    message: 'kubelet has no disk pressure',
  },
  {
    type: 'NetworkUnavailable',
    status: 'False',
    reason: 'RouteCreated',
    message: 'RouteController created a route',
  },
];

// ============================================================================
// Node Status Reporter
// ============================================================================

/**
 * Reports the virtual node's advertised status.
 *
 * Nothing here reads the pod table: capacity stays at its configured ceiling
 * however many pods are registered, and the conditions are constants stamped
 * with the time of the call.
 */
export class NodeStatusReporter implements NodeStatusProvider {
  readonly nodeName: string;
  private readonly os: OperatingSystem;
  private readonly capacityList: ResourceList;
  private readonly architecture: string;
  private readonly heartbeatIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: NodeStatusReporterOptions = {}) {
    this.nodeName = options.nodeName ?? DEFAULT_PROVIDER_CONFIG.nodeName;
    this.os = options.operatingSystem ?? DEFAULT_PROVIDER_CONFIG.operatingSystem;
    this.capacityList = { ...DEFAULT_PROVIDER_CONFIG.capacity, ...options.capacity };
    this.architecture = options.architecture ?? 'amd64';
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_PROVIDER_CONFIG.heartbeatIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  // ===========================================================================
  // Status Surface
  // ===========================================================================

  capacity(): ResourceList {
    return { ...this.capacityList };
  }

  nodeConditions(): NodeCondition[] {
    const now = this.clock();
    return NODE_CONDITION_TEMPLATES.map(template => ({
      ...template,
      lastHeartbeatTime: new Date(now.getTime()),
      lastTransitionTime: new Date(now.getTime()),
    }));
  }

  /**
   * Addresses are not reported
   */
  nodeAddresses(): NodeAddress[] {
    return [];
  }

  /**
   * Zero-valued: no kubelet endpoint is served
   */
  nodeDaemonEndpoints(): NodeDaemonEndpoints {
    return { kubeletEndpoint: { port: 0 } };
  }

  operatingSystem(): OperatingSystem {
    return this.os;
  }

  /**
   * Full status snapshot. Allocatable equals capacity.
   */
  nodeStatus(): NodeStatus {
    return {
      capacity: this.capacity(),
      allocatable: this.capacity(),
      conditions: this.nodeConditions(),
      addresses: this.nodeAddresses(),
      daemonEndpoints: this.nodeDaemonEndpoints(),
      nodeInfo: {
        nodeName: this.nodeName,
        operatingSystem: this.os,
        architecture: this.architecture,
      },
    };
  }

  // ===========================================================================
  // Heartbeat
  // ===========================================================================

  get isReporting(): boolean {
    return this.heartbeatTimer !== null;
  }

  /**
   * Report node status every heartbeat interval
   */
  startHeartbeat(onStatus: OnNodeStatusCallback): void {
    if (this.heartbeatTimer) {
      return; // Already running
    }

    this.logger.info('Starting node status heartbeat', {
      nodeName: this.nodeName,
      intervalMs: this.heartbeatIntervalMs,
    });

    this.heartbeatTimer = setInterval(() => {
      this.reportStatus(onStatus);
    }, this.heartbeatIntervalMs);
  }

  stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
      this.logger.info('Stopped node status heartbeat', { nodeName: this.nodeName });
    }
  }

  private reportStatus(onStatus: OnNodeStatusCallback): void {
    const status = this.nodeStatus();
    Promise.resolve()
      .then(() => onStatus(status))
      .catch((error: unknown) => {
        this.logger.error(
          'Node status handler failed',
          error instanceof Error ? error : { error: String(error) },
          { nodeName: this.nodeName },
        );
      });
  }

  dispose(): void {
    this.stopHeartbeat();
  }
}

/**
 * Create a node status reporter
 */
export function createNodeStatusReporter(options?: NodeStatusReporterOptions): NodeStatusReporter {
  return new NodeStatusReporter(options);
}
