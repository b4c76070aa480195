/**
 * SQLite store via drizzle-orm/better-sqlite3.
 *
 * File-backed SQLite with WAL mode, or an in-memory database for tests.
 * The opened handle is returned to the caller and injected from there;
 * there is no module-level singleton.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { IN_MEMORY_DB } from '../core/paths.js';
import { getLogger } from '../core/logger.js';
import { TaskTreeError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * DDL for the tasks table. Must describe the same columns as the drizzle
 * definition in schema.ts.
 */
const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    status INTEGER NOT NULL DEFAULT 0,
    updated TEXT,
    parent INTEGER,
    childs TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_tasks_parent ON tasks (parent);
`;

/** Drizzle database typed over the tasktree schema. */
export type TasksDatabase = BetterSQLite3Database<typeof schema>;

/** An open database: drizzle wrapper plus the native connection it owns. */
export interface TaskDbHandle {
  db: TasksDatabase;
  native: Database.Database;
  path: string;
  close(): void;
}

export interface OpenTaskDbOptions {
  /** Busy timeout in milliseconds (default 5000). */
  busyTimeoutMs?: number;
}

/**
 * Open a better-sqlite3 connection with tasktree standard pragmas.
 *
 * WAL mode is verified, not just requested: PRAGMA journal_mode returns the
 * mode actually applied, which stays 'delete' while another connection holds
 * an exclusive lock.
 */
export function openNativeDatabase(path: string, options: OpenTaskDbOptions = {}): Database.Database {
  const timeout = options.busyTimeoutMs ?? 5000;
  const native = new Database(path, { timeout });

  native.pragma(`busy_timeout = ${timeout}`);

  if (path !== IN_MEMORY_DB) {
    const mode = String(native.pragma('journal_mode = WAL', { simple: true })).toLowerCase();
    if (mode !== 'wal') {
      native.close();
      throw new TaskTreeError(
        ExitCode.STORAGE_FAILURE,
        `Failed to set WAL journal mode on ${path} (got '${mode}')`,
        { fix: 'Stop other processes holding the database and retry' },
      );
    }
  }

  return native;
}

/**
 * Open (creating if needed) the tasks database at `path`.
 * Pass ':memory:' for an isolated in-memory database.
 */
export function openTaskDb(path: string, options: OpenTaskDbOptions = {}): TaskDbHandle {
  const log = getLogger('sqlite');

  if (path !== IN_MEMORY_DB) {
    mkdirSync(dirname(path), { recursive: true });
  }

  let native: Database.Database;
  try {
    native = openNativeDatabase(path, options);
  } catch (err) {
    if (err instanceof TaskTreeError) throw err;
    throw new TaskTreeError(ExitCode.STORAGE_FAILURE, `Cannot open database: ${path}`, { cause: err });
  }

  native.exec(CREATE_TABLES_SQL);
  const db = drizzle(native, { schema });
  log.debug({ path }, 'database opened');

  let closed = false;
  return {
    db,
    native,
    path,
    close() {
      if (closed) return;
      closed = true;
      native.close();
      log.debug({ path }, 'database closed');
    },
  };
}

/**
 * Check if an error is a SQLite BUSY error (database locked by another process).
 */
export function isSqliteBusy(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return msg.includes('sqlite_busy') || msg.includes('database is locked');
}

export { schema };
