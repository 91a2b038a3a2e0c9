/**
 * Node Commands
 *
 * Node status reporting
 * @module @vnode/cli/commands/node
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createNodeStatusReporter } from '@vnode/core';
import type { NodeStatus } from '@vnode/shared';
import { resolveProviderConfig, type ConfigFlags } from '../config.js';
import { getOutputFormat, keyValue, output, statusBadge, table } from '../output.js';
import { addConfigOptions } from './options.js';

/**
 * One-line condition summary, e.g. `Ready=True OutOfDisk=False ...`
 */
export function summarizeConditions(status: NodeStatus): string {
  return status.conditions.map((condition) => `${condition.type}=${condition.status}`).join(' ');
}

/**
 * Prints a node status snapshot
 */
export function printNodeStatus(status: NodeStatus): void {
  if (getOutputFormat() === 'json') {
    output(status);
    return;
  }

  keyValue({
    'Name': status.nodeInfo.nodeName,
    'Operating System': status.nodeInfo.operatingSystem,
    'Architecture': status.nodeInfo.architecture,
    'CPU': status.capacity.cpu,
    'Memory': status.capacity.memory,
    'Pods': status.capacity.pods,
  });

  console.log('');
  console.log(chalk.bold('Conditions'));
  table(
    status.conditions.map((condition) => ({
      type: condition.type,
      status: statusBadge(condition.status),
      reason: condition.reason,
      message: condition.message,
    })),
    [
      { key: 'type', header: 'TYPE', width: 18 },
      { key: 'status', header: 'STATUS' },
      { key: 'reason', header: 'REASON' },
      { key: 'message', header: 'MESSAGE' },
    ],
  );
}

/**
 * Status command handler
 */
function statusHandler(options: ConfigFlags): void {
  const config = resolveProviderConfig(options);
  const reporter = createNodeStatusReporter({
    nodeName: config.nodeName,
    operatingSystem: config.operatingSystem,
    capacity: config.capacity,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
  });

  printNodeStatus(reporter.nodeStatus());
}

/**
 * Creates the node command group
 */
export function createNodeCommand(): Command {
  const node = new Command('node')
    .description('Virtual node status');

  addConfigOptions(
    node
      .command('status')
      .description('Show capacity and conditions of the virtual node'),
  ).action(statusHandler);

  return node;
}
