#!/usr/bin/env node
/**
 * tasktree CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { registerServeCommand } from './commands/serve.js';
import { registerShowCommand } from './commands/show.js';
import { initLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getDataDirAbsolute } from '../core/paths.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/index.ts and dist/cli/index.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('tasktree')
  .description('Hierarchical task tree over HTTP')
  .version(getPackageVersion());

registerServeCommand(program);
registerShowCommand(program);

// Initialize the pino logger before any command runs.
// If config loading fails here, the command reports it; logging falls back to stderr.
let loggerInitialized = false;
program.hook('preAction', async () => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  try {
    const config = await loadConfig();
    initLogger(getDataDirAbsolute(), config.logging);
  } catch {
    // the command's own loadConfig surfaces the error
  }
});

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
