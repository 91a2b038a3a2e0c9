/**
 * Pod registry: the authoritative table of pods on this virtual node
 * @module @vnode/core/stores/pod-store
 */

import { computed, shallowReactive, type ComputedRef } from '@vue/reactivity';
import type { Pod, PodRecord, PodStatus } from '@vnode/shared';
import { PodError, podKey, createServiceLogger, type Logger } from '@vnode/shared';
import { buildPodRecord, systemClock, type Clock } from '../models/pod-status';

/**
 * Pod registry options
 */
export interface PodRegistryOptions {
  /** Time source for synthesized timestamps */
  clock?: Clock;
  logger?: Logger;
}

/**
 * In-process table of pod records keyed by namespace and name.
 *
 * Every operation is synchronous, so a create's existence check and its
 * insertion cannot interleave with another call. Records go in and come out
 * as deep copies; nothing a caller holds aliases the table.
 */
export class PodRegistry {
  private readonly pods: Map<string, PodRecord> = shallowReactive(new Map<string, PodRecord>());
  private readonly clock: Clock;
  private readonly logger: Logger;

  /**
   * Number of live pods
   */
  readonly podCount: ComputedRef<number>;

  /**
   * Live pod names grouped by namespace
   */
  readonly podsByNamespace: ComputedRef<Map<string, string[]>>;

  constructor(options: PodRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createServiceLogger({
      level: 'debug',
      service: 'vnode-provider',
    }, { component: 'pod-registry' });

    this.podCount = computed(() => this.pods.size);
    this.podsByNamespace = computed(() => {
      const grouped = new Map<string, string[]>();

      for (const pod of this.pods.values()) {
        const list = grouped.get(pod.metadata.namespace) ?? [];
        list.push(pod.metadata.name);
        grouped.set(pod.metadata.namespace, list);
      }

      return grouped;
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Register a pod with a synthesized Running status.
   * Fails with AlreadyExists when the identity is live.
   */
  create(pod: Pod): PodRecord {
    const { namespace, name } = pod.metadata;
    const key = podKey(namespace, name);

    if (this.pods.has(key)) {
      throw PodError.alreadyExists(namespace, name);
    }

    const record = buildPodRecord(pod, this.clock());
    this.pods.set(key, record);

    this.logger.debug('Pod registered', {
      namespace,
      name,
      containers: record.status.containerStatuses.length,
    });

    return structuredClone(record);
  }

  /**
   * Accepted and ignored: live spec changes are not supported
   */
  update(pod: Pod): void {
    this.logger.debug('Pod update ignored', {
      namespace: pod.metadata.namespace,
      name: pod.metadata.name,
    });
  }

  /**
   * Remove a pod. Returns the removed record, or undefined when the identity
   * was not live. When `uid` is given only a record with that uid is removed.
   */
  delete(namespace: string, name: string, uid?: string): PodRecord | undefined {
    const key = podKey(namespace, name);
    const record = this.pods.get(key);

    if (!record || (uid !== undefined && record.metadata.uid !== uid)) {
      return undefined;
    }

    this.pods.delete(key);
    this.logger.debug('Pod removed', { namespace, name });

    return structuredClone(record);
  }

  /**
   * Remove every pod
   */
  clear(): void {
    this.pods.clear();
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Get a pod or fail with NotFound
   */
  get(namespace: string, name: string): PodRecord {
    const record = this.find(namespace, name);
    if (!record) {
      throw PodError.notFound(namespace, name);
    }
    return record;
  }

  /**
   * Get a pod if it is live
   */
  find(namespace: string, name: string): PodRecord | undefined {
    const record = this.pods.get(podKey(namespace, name));
    return record ? structuredClone(record) : undefined;
  }

  has(namespace: string, name: string): boolean {
    return this.pods.has(podKey(namespace, name));
  }

  /**
   * All live pods in insertion order
   */
  list(): PodRecord[] {
    return [...this.pods.values()].map(record => structuredClone(record));
  }

  /**
   * Status of a pod or fail with NotFound
   */
  getStatus(namespace: string, name: string): PodStatus {
    return this.get(namespace, name).status;
  }
}

/**
 * Create a pod registry. There is no shared default instance: the owner
 * constructs one and hands it to whatever needs it.
 */
export function createPodRegistry(options?: PodRegistryOptions): PodRegistry {
  return new PodRegistry(options);
}
