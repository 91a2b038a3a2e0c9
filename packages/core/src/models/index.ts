/**
 * Core models
 * @module @vnode/core/models
 */

export {
  systemClock,
  readPodIP,
  buildContainerStatuses,
  buildReadyCondition,
  buildRunningStatus,
  buildPodRecord,
  type Clock,
} from './pod-status';
