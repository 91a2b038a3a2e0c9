/**
 * Stores for the virtual node provider
 * @module @vnode/core/stores
 */

export {
  PodRegistry,
  createPodRegistry,
  type PodRegistryOptions,
} from './pod-store';
