/**
 * Provider contract consumed by the node agent
 * @module @vnode/shared/types/provider
 */

import type { Readable, Writable } from 'node:stream';
import type { Pod, PodRecord, PodStatus } from './pod';
import type { ResourceList } from './resources';
import type {
  NodeAddress,
  NodeCondition,
  NodeDaemonEndpoints,
  NodeStatus,
  OperatingSystem,
} from './node';

/**
 * Options for a container log request
 */
export interface ContainerLogOpts {
  /** Lines from the end of the log to show */
  tail?: number;
  /** Only return logs newer than this many seconds */
  sinceSeconds?: number;
  /** Only return logs after this time */
  sinceTime?: Date;
  /** Logs of the previous container instance */
  previous?: boolean;
  /** Keep the stream open */
  follow?: boolean;
  /** Prefix each line with its timestamp */
  timestamps?: boolean;
  limitBytes?: number;
}

export interface TermSize {
  width: number;
  height: number;
}

/**
 * I/O streams attached to an exec session
 */
export interface AttachIO {
  stdin?: Readable;
  stdout?: Writable;
  stderr?: Writable;
  tty: boolean;
  resize?: AsyncIterable<TermSize>;
}

/**
 * Pod lifecycle operations
 */
export interface PodLifecycleHandler {
  createPod(pod: Pod): Promise<void>;
  updatePod(pod: Pod): Promise<void>;
  deletePod(namespace: string, name: string): Promise<void>;
  getPod(namespace: string, name: string): Promise<PodRecord>;
  getPodStatus(namespace: string, name: string): Promise<PodStatus>;
  getPods(): Promise<PodRecord[]>;
}

/**
 * Node status surface. Never fails.
 */
export interface NodeStatusProvider {
  capacity(): ResourceList;
  nodeConditions(): NodeCondition[];
  nodeAddresses(): NodeAddress[];
  nodeDaemonEndpoints(): NodeDaemonEndpoints;
  operatingSystem(): OperatingSystem;
  nodeStatus(): NodeStatus;
}

/**
 * Full provider contract
 */
export interface NodeProvider extends PodLifecycleHandler, NodeStatusProvider {
  getContainerLogs(
    namespace: string,
    podName: string,
    containerName: string,
    opts: ContainerLogOpts,
  ): Promise<Readable>;
  runInContainer(
    namespace: string,
    podName: string,
    containerName: string,
    cmd: string[],
    attach: AttachIO,
  ): Promise<void>;
  getPodFullName(namespace: string, name: string): string;
}
