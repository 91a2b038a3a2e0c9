#!/usr/bin/env node
/**
 * Virtual node provider CLI
 *
 * Command-line entry point: starts a virtual node, prints node status and
 * validates pod manifests.
 * @module @vnode/cli
 */

import { isValidationError } from '@vnode/shared';
import { createProgram } from './program.js';
import { error } from './output.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (isValidationError(err)) {
      error(err.message, err.details);
    } else if (err instanceof Error) {
      error(err.message);
    }
    process.exit(1);
  }
}

// Run the CLI
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
