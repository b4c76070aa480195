/**
 * Error exit for CLI commands.
 */

import { isTaskTreeError } from '../core/errors.js';

/**
 * Print a TaskTreeError envelope to stderr and exit with its code.
 * Anything else is rethrown for commander to report.
 */
export function exitWithError(err: unknown): never {
  if (isTaskTreeError(err)) {
    process.stderr.write(`${JSON.stringify(err.toJSON(), null, 2)}\n`);
    process.exit(err.code);
  }
  throw err;
}
