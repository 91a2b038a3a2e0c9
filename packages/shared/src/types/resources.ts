/**
 * Resource quantity types
 * @module @vnode/shared/types/resources
 */

/**
 * Resource names the provider advertises
 */
export type ResourceName = 'cpu' | 'memory' | 'pods';

/**
 * Quantity string, e.g. "20", "500m", "100Gi"
 */
export type Quantity = string;

/**
 * Resource list keyed by resource name
 */
export type ResourceList = Record<ResourceName, Quantity>;

/**
 * Default advertised capacity of the virtual node
 */
export const DEFAULT_CAPACITY: Readonly<ResourceList> = {
  cpu: '20',
  memory: '100Gi',
  pods: '20',
};
