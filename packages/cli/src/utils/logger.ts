import pc from 'picocolors';
import type { TreeLogger } from '@changetree/core';

/**
 * Logger for the tree. Debug output only shows with --verbose and goes to
 * stderr so it never mixes with the rendered rows.
 */
export function createLogger(verbose: boolean): TreeLogger {
  return {
    debug: (message: string) => {
      if (verbose) {
        console.error(pc.dim(`debug: ${message}`));
      }
    },
  };
}
