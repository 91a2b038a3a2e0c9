/**
 * Pod status synthesis
 * @module @vnode/core/models/pod-status
 *
 * Builds the status a freshly accepted pod reports. Every container is
 * reported running and ready from the moment of creation.
 */

import { randomUUID } from 'node:crypto';
import type {
  Container,
  ContainerStatus,
  Pod,
  PodCondition,
  PodRecord,
  PodStatus,
} from '@vnode/shared';
import { POD_IP_ANNOTATION } from '@vnode/shared';

/**
 * Source of the current time
 */
export type Clock = () => Date;

/**
 * Default clock
 */
export const systemClock: Clock = () => new Date();

/**
 * Pod IP from the `vk/PodIP` annotation, empty when absent
 */
export function readPodIP(pod: Pod): string {
  return pod.metadata.annotations?.[POD_IP_ANNOTATION] ?? '';
}

/**
 * One running, ready status per container, in spec order
 */
export function buildContainerStatuses(containers: readonly Container[], startedAt: Date): ContainerStatus[] {
  return containers.map(container => ({
    name: container.name,
    image: container.image,
    state: {
      running: { startedAt: new Date(startedAt.getTime()) },
    },
    ready: true,
    restartCount: 0,
  }));
}

/**
 * Ready=True pod condition
 */
export function buildReadyCondition(now: Date): PodCondition {
  return {
    type: 'Ready',
    status: 'True',
    lastTransitionTime: new Date(now.getTime()),
  };
}

/**
 * Running status for a pod accepted at `now`
 */
export function buildRunningStatus(pod: Pod, now: Date): PodStatus {
  return {
    phase: 'Running',
    conditions: [buildReadyCondition(now)],
    podIP: readPodIP(pod),
    startTime: new Date(now.getTime()),
    containerStatuses: buildContainerStatuses(pod.spec.containers, now),
  };
}

/**
 * Detached record for a pod: a deep copy of the input with a synthesized
 * status and a uid when the caller supplied none
 */
export function buildPodRecord(pod: Pod, now: Date): PodRecord {
  const copy = structuredClone(pod);
  return {
    metadata: {
      ...copy.metadata,
      uid: copy.metadata.uid ?? randomUUID(),
    },
    spec: copy.spec,
    status: buildRunningStatus(copy, now),
  };
}
