/**
 * CLI program definition
 * @module @vnode/cli/program
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { OUTPUT_FORMATS, isOutputFormat, setOutputFormat } from './output.js';
import { createNodeCommand } from './commands/node.js';
import { createPodCommand } from './commands/pod.js';
import { createRunCommand } from './commands/run.js';

/**
 * CLI version from package.json
 */
export const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
Virtual node provider

Runs a virtual node that accepts pods, reports them Running and advertises
a fixed capacity, without executing any workload.

Commands:
  run         Start the virtual node
  node        Node status (status)
  pod         Pod manifests (validate)

Examples:
  $ vnode run --manifest pods.json
  $ vnode node status --cpu 8 --memory 32Gi
  $ vnode pod validate --manifest pods.json
`;

/**
 * Creates and configures the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('vnode')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .addOption(
      new Option('-o, --output <format>', 'Output format')
        .choices(OUTPUT_FORMATS)
        .default('table'),
    )
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      }

      if (opts.color === false) {
        chalk.level = 0;
      }
    });

  program.addCommand(createRunCommand());
  program.addCommand(createNodeCommand());
  program.addCommand(createPodCommand());

  return program;
}
