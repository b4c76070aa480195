/**
 * CLI serve command.
 */

import { Command } from 'commander';
import { startHttpServer } from '../../api/server.js';
import { closeLogger, getLogger } from '../../core/logger.js';
import { openCliContext } from '../context.js';
import { exitWithError } from '../errors.js';

interface ServeOptions {
  host?: string;
  port?: string;
  db?: string;
}

/**
 * Register the serve command.
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--host <host>', 'Interface to bind')
    .option('--port <port>', 'Port to listen on')
    .option('--db <path>', 'SQLite database file (":memory:" for a throwaway store)')
    .action(async (opts: ServeOptions) => {
      const log = getLogger('cli');
      try {
        const { config, db, service } = await openCliContext({
          'server.host': opts.host,
          'server.port': opts.port === undefined ? undefined : Number(opts.port),
          'database.path': opts.db,
        });

        const server = await startHttpServer({
          service,
          host: config.server.host,
          port: config.server.port,
        });
        log.info({ host: server.host, port: server.port, db: db.path }, 'tasktree serving');

        const shutdown = (signal: string): void => {
          log.info({ signal }, 'shutting down');
          server.close()
            .then(() => {
              db.close();
              closeLogger();
            })
            .catch((err: unknown) => {
              log.error({ err }, 'shutdown failed');
              process.exitCode = 1;
            });
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
      } catch (err) {
        exitWithError(err);
      }
    });
}
