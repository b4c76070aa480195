/**
 * Request body reading, JSON responses and error-to-status mapping.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { TaskTreeError, isTaskTreeError } from '../core/errors.js';
import type { ErrorCategory } from '../core/errors.js';
import { isSqliteBusy } from '../store/sqlite.js';
import { ExitCode } from '../types/exit-codes.js';

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const CATEGORY_STATUS: Record<ErrorCategory, number> = {
  NOT_FOUND: 404,
  VALIDATION: 400,
  CONFLICT: 409,
  INTERNAL: 500,
};

/**
 * Read and parse a JSON request body. Resolves undefined for an empty body.
 */
export async function readJsonBody(
  req: IncomingMessage,
  maxBytes: number = DEFAULT_MAX_BODY_BYTES,
): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > maxBytes) {
      throw new TaskTreeError(ExitCode.INVALID_INPUT, `Request body exceeds ${maxBytes} bytes`);
    }
    chunks.push(buf);
  }

  const text = Buffer.concat(chunks).toString('utf-8').trim();
  if (text.length === 0) return undefined;

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TaskTreeError(ExitCode.INVALID_INPUT, 'Request body is not valid JSON', { cause: err });
  }
}

export function sendJson(
  res: ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(Buffer.byteLength(payload)),
    ...headers,
  });
  res.end(payload);
}

/** HTTP status for a thrown value. */
export function statusForError(err: unknown): number {
  return isTaskTreeError(err) ? CATEGORY_STATUS[err.category] : 500;
}

/**
 * Normalize anything thrown by a handler into a TaskTreeError. Values that
 * are not TaskTreeErrors hide their message behind a generic one.
 */
export function toTaskTreeError(err: unknown): TaskTreeError {
  if (isTaskTreeError(err)) return err;
  if (isSqliteBusy(err)) {
    return new TaskTreeError(ExitCode.STORAGE_FAILURE, 'Database is locked', {
      fix: 'Retry the request',
      cause: err,
    });
  }
  return new TaskTreeError(ExitCode.GENERAL_ERROR, 'Internal server error', { cause: err });
}
