/**
 * Shared wiring for CLI commands: config, database handle and service.
 */

import type { TaskTreeConfig } from '../types/config.js';
import { loadConfig } from '../core/config.js';
import { resolveDbPath } from '../core/paths.js';
import { TaskService } from '../core/tasks/task-service.js';
import { openTaskDb } from '../store/sqlite.js';
import type { TaskDbHandle } from '../store/sqlite.js';
import { TaskStore } from '../store/task-store.js';

export interface CliContext {
  config: TaskTreeConfig;
  db: TaskDbHandle;
  service: TaskService;
}

/**
 * Resolve config (flags passed as dotted-key overrides), open the database
 * and build the service over it. The caller owns `db.close()`.
 */
export async function openCliContext(overrides: Record<string, unknown> = {}): Promise<CliContext> {
  const config = await loadConfig(undefined, overrides);
  const db = openTaskDb(resolveDbPath(config.database.path), {
    busyTimeoutMs: config.database.busyTimeoutMs,
  });
  return { config, db, service: new TaskService(new TaskStore(db.db)) };
}
