/**
 * Shared fixtures for core unit tests
 */

import type { Pod } from '@vnode/shared';

/**
 * Fixed instant used by test clocks
 */
export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

/**
 * Build a pod with the given container names
 */
export function makePod(
  namespace: string,
  name: string,
  containers: string[] = ['app'],
  annotations?: Record<string, string>,
): Pod {
  return {
    metadata: {
      namespace,
      name,
      ...(annotations ? { annotations } : {}),
    },
    spec: {
      containers: containers.map(containerName => ({
        name: containerName,
        image: `${containerName}:latest`,
      })),
    },
  };
}
