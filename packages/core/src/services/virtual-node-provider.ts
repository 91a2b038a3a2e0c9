/**
 * Virtual node provider
 * The object a node agent delegates pod lifecycle and node status to
 * @module @vnode/core/services/virtual-node-provider
 */

import type { Readable } from 'node:stream';
import type {
  AttachIO,
  ContainerLogOpts,
  NodeAddress,
  NodeCondition,
  NodeDaemonEndpoints,
  NodeProvider,
  NodeStatus,
  OperatingSystem,
  Pod,
  PodRecord,
  PodStatus,
  ProviderConfig,
  ResourceList,
} from '@vnode/shared';
import {
  DEFAULT_PROVIDER_CONFIG,
  PodError,
  ValidationError,
  createServiceLogger,
  validatePod,
  type Logger,
} from '@vnode/shared';
import { PodRegistry } from '../stores/pod-store';
import type { Clock } from '../models/pod-status';
import { NodeStatusReporter } from './node-status-reporter';
import { NoopWorkloadBackend, type WorkloadBackend } from './workload-backend';

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators of a provider
 */
export interface VirtualNodeProviderDependencies {
  registry: PodRegistry;
  reporter: NodeStatusReporter;
  backend: WorkloadBackend;
  logger: Logger;
}

/**
 * Overrides accepted by createVirtualNodeProvider
 */
export interface VirtualNodeProviderOverrides extends Partial<VirtualNodeProviderDependencies> {
  /** Time source shared by the registry and the reporter */
  clock?: Clock;
}

/**
 * Normalize anything thrown into an Error
 */
function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Virtual Node Provider
// ============================================================================

/**
 * Virtual Node Provider
 *
 * Pod state lives in the injected registry; workloads are delegated to the
 * backend. A create registers the pod before its first await, so concurrent
 * creates of one identity cannot both succeed.
 */
export class VirtualNodeProvider implements NodeProvider {
  readonly registry: PodRegistry;
  readonly reporter: NodeStatusReporter;
  readonly backend: WorkloadBackend;
  private readonly logger: Logger;

  constructor(deps: VirtualNodeProviderDependencies) {
    this.registry = deps.registry;
    this.reporter = deps.reporter;
    this.backend = deps.backend;
    this.logger = deps.logger;
  }

  // ===========================================================================
  // Pod Lifecycle
  // ===========================================================================

  /**
   * Register a pod and start its workload
   */
  async createPod(pod: Pod): Promise<void> {
    const validation = validatePod(pod);
    if (!validation.valid) {
      throw ValidationError.multiple(validation.errors, 'pod');
    }

    const { namespace, name } = pod.metadata;
    const log = this.logger.forPod(namespace, name);
    log.info('CreatePod');

    const record = this.registry.create(pod);

    try {
      await this.backend.createPod(record);
    } catch (error) {
      const cause = toError(error);
      this.registry.delete(namespace, name, record.metadata.uid);
      log.error('Backend failed to start pod', cause, { backend: this.backend.name });
      throw PodError.startFailed(namespace, name, cause);
    }
  }

  /**
   * No-op: live spec changes are not supported, nothing is applied
   */
  async updatePod(pod: Pod): Promise<void> {
    this.logger
      .forPod(pod.metadata.namespace, pod.metadata.name)
      .info('UpdatePod called: no-op, live updates are not supported');
    this.registry.update(pod);
  }

  /**
   * Remove a pod and stop its workload. Deleting an absent pod succeeds.
   */
  async deletePod(namespace: string, name: string): Promise<void> {
    const log = this.logger.forPod(namespace, name);
    log.info('DeletePod');

    const removed = this.registry.delete(namespace, name);
    if (!removed) {
      log.debug('DeletePod: pod not registered, nothing to do');
      return;
    }

    try {
      await this.backend.deletePod(removed);
    } catch (error) {
      const cause = toError(error);
      log.error('Backend failed to stop pod', cause, { backend: this.backend.name });
      throw PodError.stopFailed(namespace, name, cause);
    }
  }

  async getPod(namespace: string, name: string): Promise<PodRecord> {
    return this.registry.get(namespace, name);
  }

  async getPodStatus(namespace: string, name: string): Promise<PodStatus> {
    return this.registry.getStatus(namespace, name);
  }

  async getPods(): Promise<PodRecord[]> {
    return this.registry.list();
  }

  /**
   * Name the node agent uses for a pod in its own bookkeeping
   */
  getPodFullName(namespace: string, name: string): string {
    return `${namespace}-${name}`;
  }

  // ===========================================================================
  // Logs / Exec
  // ===========================================================================

  async getContainerLogs(
    namespace: string,
    podName: string,
    containerName: string,
    opts: ContainerLogOpts,
  ): Promise<Readable> {
    return this.backend.getContainerLogs(namespace, podName, containerName, opts);
  }

  async runInContainer(
    namespace: string,
    podName: string,
    containerName: string,
    cmd: string[],
    attach: AttachIO,
  ): Promise<void> {
    this.logger.info('ExecInContainer', { namespace, podName, containerName });
    await this.backend.runInContainer(namespace, podName, containerName, cmd, attach);
  }

  // ===========================================================================
  // Node Status
  // ===========================================================================

  capacity(): ResourceList {
    return this.reporter.capacity();
  }

  nodeConditions(): NodeCondition[] {
    return this.reporter.nodeConditions();
  }

  nodeAddresses(): NodeAddress[] {
    return this.reporter.nodeAddresses();
  }

  nodeDaemonEndpoints(): NodeDaemonEndpoints {
    return this.reporter.nodeDaemonEndpoints();
  }

  operatingSystem(): OperatingSystem {
    return this.reporter.operatingSystem();
  }

  nodeStatus(): NodeStatus {
    return this.reporter.nodeStatus();
  }

  /**
   * Stop the heartbeat and drop every pod
   */
  dispose(): void {
    this.reporter.dispose();
    this.registry.clear();
    this.logger.info('Provider disposed', { nodeName: this.reporter.nodeName });
  }
}

/**
 * Build a provider from configuration. Each collaborator can be replaced.
 */
export function createVirtualNodeProvider(
  config: ProviderConfig = DEFAULT_PROVIDER_CONFIG,
  overrides: VirtualNodeProviderOverrides = {},
): VirtualNodeProvider {
  const logger = overrides.logger ?? createServiceLogger({
    level: config.logLevel,
    service: 'vnode-provider',
  }, { component: 'provider', nodeName: config.nodeName });

  return new VirtualNodeProvider({
    registry: overrides.registry ?? new PodRegistry({
      clock: overrides.clock,
      logger: logger.forComponent('pod-registry'),
    }),
    reporter: overrides.reporter ?? new NodeStatusReporter({
      nodeName: config.nodeName,
      operatingSystem: config.operatingSystem,
      capacity: config.capacity,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      clock: overrides.clock,
      logger: logger.forComponent('node-status-reporter'),
    }),
    backend: overrides.backend ?? new NoopWorkloadBackend(logger.forComponent('noop-backend')),
    logger,
  });
}
