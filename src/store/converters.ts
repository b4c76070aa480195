/**
 * Row <-> domain conversion for the tasks table.
 */

import type { TaskRow } from './schema.js';
import type { Task } from '../types/task.js';

/** Keep only integer ids from a stored child list. */
function parseChilds(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.filter((id): id is number => Number.isInteger(id));
}

/** Convert a database row to a flat domain Task. */
export function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description ?? null,
    status: row.status,
    updated: row.updated ?? null,
    parent: row.parent ?? null,
    childs: parseChilds(row.childs),
  };
}
