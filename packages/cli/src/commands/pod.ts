/**
 * Pod Commands
 *
 * Manifest validation against a scratch registry
 * @module @vnode/cli/commands/pod
 */

import { Command } from 'commander';
import { createPodRegistry } from '@vnode/core';
import { logger, type PodRecord } from '@vnode/shared';
import { loadManifest, registerPods } from '../manifest.js';
import { error, getOutputFormat, output, statusBadge, success, table } from '../output.js';

/**
 * Prints pod records
 */
export function printPods(pods: PodRecord[]): void {
  if (getOutputFormat() === 'json') {
    output(pods);
    return;
  }

  table(
    pods.map((pod) => {
      const statuses = pod.status.containerStatuses;
      return {
        namespace: pod.metadata.namespace,
        name: pod.metadata.name,
        phase: statusBadge(pod.status.phase),
        ready: `${statuses.filter((s) => s.ready).length}/${statuses.length}`,
        podIP: pod.status.podIP || '<none>',
      };
    }),
    [
      { key: 'namespace', header: 'NAMESPACE' },
      { key: 'name', header: 'NAME' },
      { key: 'phase', header: 'PHASE' },
      { key: 'ready', header: 'READY' },
      { key: 'podIP', header: 'POD IP' },
    ],
  );
}

/**
 * Validate command handler
 */
function validateHandler(options: { manifest: string }): void {
  const manifest = loadManifest(options.manifest);
  const registry = createPodRegistry({ logger: logger.forComponent('pod-registry') });
  const { records, problems } = registerPods(registry, manifest.pods);
  const allProblems = [...manifest.problems, ...problems];

  printPods(records);

  if (allProblems.length > 0) {
    error(`Manifest has ${allProblems.length} problem(s)`, allProblems);
    process.exitCode = 1;
    return;
  }

  success(`${records.length} pod(s) valid`);
}

/**
 * Creates the pod command group
 */
export function createPodCommand(): Command {
  const pod = new Command('pod')
    .description('Pod manifests');

  pod
    .command('validate')
    .description('Check a manifest and show the status each pod would report')
    .requiredOption('-m, --manifest <file>', 'JSON manifest of pods')
    .action(validateHandler);

  return pod;
}
