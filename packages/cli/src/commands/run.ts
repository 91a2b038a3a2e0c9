/**
 * Run Command
 *
 * Starts a virtual node provider in the foreground
 * @module @vnode/cli/commands/run
 */

import { Command } from 'commander';
import { createVirtualNodeProvider, watch, type VirtualNodeProvider } from '@vnode/core';
import { createServiceLogger, isProviderError } from '@vnode/shared';
import { resolveProviderConfig, type ConfigFlags } from '../config.js';
import { loadManifest } from '../manifest.js';
import { error, info, success, warn } from '../output.js';
import { summarizeConditions } from './node.js';
import { addConfigOptions } from './options.js';
import { printPods } from './pod.js';

/**
 * Run command options
 */
export interface RunOptions extends ConfigFlags {
  manifest?: string;
  once?: boolean;
}

/**
 * Resolves with the first termination signal received
 */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/**
 * Creates every pod of a manifest. Failures are reported and skipped.
 */
export async function seedPods(provider: VirtualNodeProvider, manifestPath: string): Promise<void> {
  const { pods, problems } = loadManifest(manifestPath);

  for (const problem of problems) {
    warn(`Skipping invalid pod: ${problem.field}: ${problem.message}`);
  }

  for (const pod of pods) {
    try {
      await provider.createPod(pod);
    } catch (err) {
      if (!isProviderError(err)) {
        throw err;
      }
      error(err.message);
    }
  }
}

/**
 * Run command handler
 */
async function runHandler(options: RunOptions): Promise<void> {
  const config = resolveProviderConfig(options);
  const provider = createVirtualNodeProvider(config);
  const log = createServiceLogger({
    level: config.logLevel,
    service: 'vnode-provider',
    pretty: process.env.NODE_ENV !== 'production',
  }, { component: 'cli', nodeName: config.nodeName });

  const stopWatching = watch(provider.registry.podCount, (count: number, previous: number | undefined) => {
    log.debug('Pod count changed', { count, previous });
  });

  if (options.manifest) {
    await seedPods(provider, options.manifest);
  }

  printPods(await provider.getPods());

  if (options.once) {
    stopWatching();
    provider.dispose();
    return;
  }

  provider.reporter.startHeartbeat((status) => {
    info(
      `${status.nodeInfo.nodeName} ${summarizeConditions(status)} ` +
      `pods=${provider.registry.podCount.value}/${status.capacity.pods}`,
    );
  });
  success(`Node ${config.nodeName} is up. Press Ctrl+C to stop.`);

  const signal = await waitForShutdown();
  log.info('Shutting down', { signal });
  stopWatching();
  provider.dispose();
}

/**
 * Creates the run command
 */
export function createRunCommand(): Command {
  return addConfigOptions(
    new Command('run')
      .description('Start the virtual node and report its status until interrupted')
      .option('-m, --manifest <file>', 'JSON manifest of pods to create at startup')
      .option('--once', 'Create the manifest pods, print them and exit'),
  ).action(runHandler);
}
