/**
 * Pod type definitions
 * @module @vnode/shared/types/pod
 *
 * Shapes follow the orchestrator's pod object closely enough that a node
 * agent can hand its pods straight to the provider.
 */

import type { Labels, Annotations } from './labels';
import type { ResourceList } from './resources';

/**
 * Annotation the pod IP is copied from on create
 */
export const POD_IP_ANNOTATION = 'vk/PodIP';

/**
 * Coarse pod lifecycle state. Only `Running` is ever synthesized.
 */
export type PodPhase = 'Pending' | 'Running' | 'Terminated';

/**
 * Tri-state condition status
 */
export type ConditionStatus = 'True' | 'False' | 'Unknown';

/**
 * Pod condition types
 */
export type PodConditionType = 'Ready' | 'Initialized' | 'ContainersReady' | 'PodScheduled';

/**
 * Pod identity within the registry
 */
export interface PodIdentity {
  namespace: string;
  name: string;
}

/**
 * Pod metadata
 */
export interface PodMetadata {
  /** Namespace the pod lives in */
  namespace: string;
  /** Pod name, unique within its namespace */
  name: string;
  /** Orchestrator-assigned UID */
  uid?: string;
  labels?: Labels;
  annotations?: Annotations;
  creationTimestamp?: Date;
}

export interface EnvVar {
  name: string;
  value?: string;
}

export interface ContainerPort {
  name?: string;
  containerPort: number;
  protocol?: 'TCP' | 'UDP' | 'SCTP';
}

export interface ContainerResources {
  requests?: Partial<ResourceList>;
  limits?: Partial<ResourceList>;
}

/**
 * Container entry of a pod spec
 */
export interface Container {
  name: string;
  image?: string;
  command?: string[];
  args?: string[];
  env?: EnvVar[];
  ports?: ContainerPort[];
  resources?: ContainerResources;
}

export type RestartPolicy = 'Always' | 'OnFailure' | 'Never';

/**
 * Desired pod spec. Treated as immutable once accepted.
 */
export interface PodSpec {
  containers: Container[];
  nodeName?: string;
  restartPolicy?: RestartPolicy;
}

export interface PodCondition {
  type: PodConditionType;
  status: ConditionStatus;
  lastProbeTime?: Date;
  lastTransitionTime?: Date;
  reason?: string;
  message?: string;
}

export interface ContainerStateRunning {
  startedAt: Date;
}

export interface ContainerStateWaiting {
  reason?: string;
  message?: string;
}

export interface ContainerStateTerminated {
  exitCode: number;
  reason?: string;
  startedAt?: Date;
  finishedAt?: Date;
}

/**
 * Exactly one member is set
 */
export interface ContainerState {
  running?: ContainerStateRunning;
  waiting?: ContainerStateWaiting;
  terminated?: ContainerStateTerminated;
}

export interface ContainerStatus {
  name: string;
  state: ContainerState;
  ready: boolean;
  restartCount: number;
  image?: string;
}

/**
 * Observed pod status
 */
export interface PodStatus {
  phase: PodPhase;
  conditions: PodCondition[];
  podIP: string;
  startTime?: Date;
  containerStatuses: ContainerStatus[];
}

/**
 * Pod as handed in by the node agent
 */
export interface Pod {
  metadata: PodMetadata;
  spec: PodSpec;
  status?: PodStatus;
}

/**
 * Pod held by the registry: status is always synthesized
 */
export interface PodRecord extends Pod {
  status: PodStatus;
}

/**
 * Registry key for an identity. Both parts are JSON-quoted, so no
 * namespace and name pair can produce another pair's key.
 */
export function podKey(namespace: string, name: string): string {
  return JSON.stringify([namespace, name]);
}

/**
 * Identity of a pod
 */
export function podIdentity(pod: Pod): PodIdentity {
  return { namespace: pod.metadata.namespace, name: pod.metadata.name };
}

/**
 * Check if a pod is in the Running phase
 */
export function isPodRunning(pod: Pod): boolean {
  return pod.status?.phase === 'Running';
}

/**
 * Check if a pod reports the Ready condition as True
 */
export function isPodReady(pod: Pod): boolean {
  const ready = pod.status?.conditions.find(c => c.type === 'Ready');
  return ready?.status === 'True';
}
