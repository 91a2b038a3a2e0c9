/**
 * Workload execution backend contract
 * @module @vnode/core/services/workload-backend
 */

import { Readable } from 'node:stream';
import type { AttachIO, ContainerLogOpts, PodRecord } from '@vnode/shared';
import { createServiceLogger, type Logger } from '@vnode/shared';

/**
 * Whatever actually runs workloads for the virtual node. The provider owns
 * pod state; a backend only starts, stops and talks to workloads.
 */
export interface WorkloadBackend {
  /** Backend name for logs */
  readonly name: string;
  /** Start the workload for a newly registered pod */
  createPod(pod: PodRecord): Promise<void>;
  /** Stop the workload of a pod that was just removed */
  deletePod(pod: PodRecord): Promise<void>;
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
}

/**
 * Backend that runs nothing.
 *
 * Logs are an empty stream that has already ended, and exec succeeds without
 * running the command or touching the attached streams.
 */
export class NoopWorkloadBackend implements WorkloadBackend {
  readonly name = 'noop';
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createServiceLogger({
      level: 'debug',
      service: 'vnode-provider',
    }, { component: 'noop-backend' });
  }

  async createPod(pod: PodRecord): Promise<void> {
    this.logger.debug('No workload started', {
      namespace: pod.metadata.namespace,
      name: pod.metadata.name,
    });
  }

  async deletePod(pod: PodRecord): Promise<void> {
    this.logger.debug('No workload stopped', {
      namespace: pod.metadata.namespace,
      name: pod.metadata.name,
    });
  }

  async getContainerLogs(
    namespace: string,
    podName: string,
    containerName: string,
    _opts?: ContainerLogOpts,
  ): Promise<Readable> {
    this.logger.debug('GetContainerLogs', { namespace, podName, containerName });
    return Readable.from([]);
  }

  async runInContainer(
    namespace: string,
    podName: string,
    containerName: string,
    cmd: string[],
    _attach?: AttachIO,
  ): Promise<void> {
    this.logger.debug('ExecInContainer', { namespace, podName, containerName, cmd });
  }
}

/**
 * Create the no-op backend
 */
export function createNoopWorkloadBackend(logger?: Logger): NoopWorkloadBackend {
  return new NoopWorkloadBackend(logger);
}
