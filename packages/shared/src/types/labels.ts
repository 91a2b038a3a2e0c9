/**
 * Labels and Annotations types (Kubernetes-like)
 * @module @vnode/shared/types/labels
 */

/**
 * Labels are key-value pairs used for organization and selection
 *
 * @example
 * {
 *   "app": "frontend",
 *   "tier": "web"
 * }
 */
export type Labels = Record<string, string>;

/**
 * Annotations are key-value pairs for non-identifying metadata.
 * The provider reads `vk/PodIP` from here.
 */
export type Annotations = Record<string, string>;
