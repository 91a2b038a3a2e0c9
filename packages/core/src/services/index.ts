/**
 * Core services exports
 * @module @vnode/core/services
 */

export {
  NodeStatusReporter,
  createNodeStatusReporter,
  NODE_CONDITION_TEMPLATES,
  type NodeStatusReporterOptions,
  type OnNodeStatusCallback,
} from './node-status-reporter';

export {
  NoopWorkloadBackend,
  createNoopWorkloadBackend,
  type WorkloadBackend,
} from './workload-backend';

export {
  VirtualNodeProvider,
  createVirtualNodeProvider,
  type VirtualNodeProviderDependencies,
  type VirtualNodeProviderOverrides,
} from './virtual-node-provider';
