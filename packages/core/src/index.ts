/**
 * Virtual node provider core package
 * Pod registry, status synthesis, node status and the provider facade
 * @module @vnode/core
 */

// Export reactive stores
export * from './stores';

// Export models
export * from './models';

// Export services
export * from './services';

// Export Vue reactivity utilities for consumers of the registry's computed views
export {
  watch,
  isRef,
  type ComputedRef,
} from '@vue/reactivity';
