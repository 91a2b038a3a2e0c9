/**
 * CLI commands
 * @module @vnode/cli/commands
 */

export { createNodeCommand, printNodeStatus, summarizeConditions } from './node.js';
export { createPodCommand, printPods } from './pod.js';
export { createRunCommand, seedPods, waitForShutdown, type RunOptions } from './run.js';
export { addConfigOptions } from './options.js';
