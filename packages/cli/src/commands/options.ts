/**
 * Options shared by commands that build a provider
 * @module @vnode/cli/commands/options
 */

import type { Command } from 'commander';
import { ENV_CPU, ENV_LOG_LEVEL, ENV_MEMORY, ENV_NODE_NAME, ENV_PODS } from '../config.js';

/**
 * Adds the configuration flags to a command
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--node-name <name>', `Node name (env: ${ENV_NODE_NAME})`)
    .option('--cpu <quantity>', `Advertised CPU capacity (env: ${ENV_CPU})`)
    .option('--memory <quantity>', `Advertised memory capacity (env: ${ENV_MEMORY})`)
    .option('--pods <count>', `Advertised pod capacity (env: ${ENV_PODS})`)
    .option('--heartbeat-interval <ms>', 'Node status report interval in milliseconds')
    .option('--log-level <level>', `Minimum log level (env: ${ENV_LOG_LEVEL})`);
}
