/**
 * Shared types for the virtual node provider
 * @module @vnode/shared/types
 */

// Label types
export type { Labels, Annotations } from './labels';

// Resource types
export type { ResourceName, Quantity, ResourceList } from './resources';
export { DEFAULT_CAPACITY } from './resources';

// Pod types
export type {
  PodPhase,
  ConditionStatus,
  PodConditionType,
  PodIdentity,
  PodMetadata,
  EnvVar,
  ContainerPort,
  ContainerResources,
  Container,
  RestartPolicy,
  PodSpec,
  PodCondition,
  ContainerStateRunning,
  ContainerStateWaiting,
  ContainerStateTerminated,
  ContainerState,
  ContainerStatus,
  PodStatus,
  Pod,
  PodRecord,
} from './pod';

export {
  POD_IP_ANNOTATION,
  podKey,
  podIdentity,
  isPodRunning,
  isPodReady,
} from './pod';

// Node types
export type {
  OperatingSystem,
  NodeConditionType,
  NodeCondition,
  NodeAddressType,
  NodeAddress,
  DaemonEndpoint,
  NodeDaemonEndpoints,
  NodeSystemInfo,
  NodeStatus,
} from './node';

export { OPERATING_SYSTEM_LINUX } from './node';

// Provider contract
export type {
  ContainerLogOpts,
  TermSize,
  AttachIO,
  PodLifecycleHandler,
  NodeStatusProvider,
  NodeProvider,
} from './provider';

// Configuration
export type { ProviderConfig } from './config';
export { DEFAULT_PROVIDER_CONFIG } from './config';
