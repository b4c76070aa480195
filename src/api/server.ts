/**
 * node:http server for the task API.
 */

import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Logger } from 'pino';
import { TaskTreeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { TaskService } from '../core/tasks/task-service.js';
import { ExitCode } from '../types/exit-codes.js';
import { DEFAULT_MAX_BODY_BYTES, readJsonBody, sendJson, statusForError, toTaskTreeError } from './http.js';
import { createTaskRouter } from './routes.js';

const BODY_METHODS = new Set(['POST', 'PATCH', 'DELETE']);

export interface HttpServerOptions {
  service: TaskService;
  host?: string;
  port?: number;
  maxBodyBytes?: number;
  log?: Logger;
}

export interface HttpServerHandle {
  host: string;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(opts: HttpServerOptions): Promise<HttpServerHandle> {
  const host = opts.host ?? '127.0.0.1';
  const port = Number(opts.port ?? 8000);
  const maxBodyBytes = opts.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const log = opts.log ?? getLogger('http');

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new TaskTreeError(ExitCode.CONFIG_ERROR, `Invalid port: ${opts.port}`);
  }

  const router = createTaskRouter(opts.service);

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    let status = 500;

    try {
      const match = router.resolve(method, url.pathname);
      if (match.kind === 'not-found') {
        throw new TaskTreeError(ExitCode.NOT_FOUND, `No route for ${method} ${url.pathname}`);
      }
      if (match.kind === 'method-not-allowed') {
        status = 405;
        sendJson(
          res,
          status,
          new TaskTreeError(ExitCode.INVALID_INPUT, `Method ${method} not allowed on ${url.pathname}`).toJSON(),
          { allow: match.allowed.join(', ') },
        );
        return;
      }

      const body = BODY_METHODS.has(method) ? await readJsonBody(req, maxBodyBytes) : undefined;
      const result = await match.handler({ params: match.params, query: url.searchParams, body });
      status = result.status;
      sendJson(res, status, result.body);
    } catch (err) {
      const error = toTaskTreeError(err);
      status = statusForError(error);
      if (status >= 500) {
        log.error({ err, method, path: url.pathname }, 'request failed');
      }
      sendJson(res, status, error.toJSON());
    } finally {
      log.info({ method, path: url.pathname, status, durationMs: Date.now() - started }, 'request');
    }
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      log.error({ err }, 'unhandled request error');
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;
  log.info({ host, port: actualPort }, 'http server listening');

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    log.info('http server closed');
  };

  return { host, port: actualPort, close };
}
