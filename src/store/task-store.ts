/**
 * SQLite-backed tree store.
 *
 * Sole owner of persisted task rows and of every structural mutation:
 * hydration, recursive delete, status cascade, child-list rewrite with
 * parent back-pointer maintenance, and the ancestor check. Values handed
 * back are snapshots; nothing returned aliases storage.
 *
 * better-sqlite3 is synchronous, so are these methods. Multi-step writes run
 * inside one transaction (a savepoint when already inside one).
 */

import { asc, eq } from 'drizzle-orm';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type { RunResult } from 'better-sqlite3';
import type { Logger } from 'pino';
import * as schema from './schema.js';
import type { NewTaskRow } from './schema.js';
import { rowToTask } from './converters.js';
import type { NewTask, Task, TaskLookup, TaskTree } from '../types/task.js';
import { ExitCode } from '../types/exit-codes.js';
import { TaskTreeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  findRootIds,
  hydrateSubtree,
  hydrateTask,
  isAncestor,
  isDescendant,
} from '../core/tasks/hierarchy.js';

/** Any synchronous drizzle handle over the tasks schema: the database or an open transaction. */
export type TaskStoreDb = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

/** Row fields a write may change. `updated` is always stamped by the store. */
type TaskPatch = Partial<Pick<NewTaskRow, 'title' | 'description' | 'status' | 'parent' | 'childs'>>;

function uniqueIds(ids: number[]): number[] {
  return [...new Set(ids)];
}

export class TaskStore {
  private readonly db: TaskStoreDb;
  private readonly log: Logger;
  private readonly lookup: TaskLookup = (id) => this.getFlatTask(id);

  constructor(db: TaskStoreDb, log: Logger = getLogger('task-store')) {
    this.db = db;
    this.log = log;
  }

  /**
   * Run `fn` in one transaction against a store bound to it.
   * Throwing inside `fn` rolls back every write it made.
   */
  transaction<T>(fn: (store: TaskStore) => T): T {
    return this.db.transaction((tx) => fn(new TaskStore(tx, this.log)));
  }

  // === READS ===

  /** Flat row snapshot, or null if absent. */
  getFlatTask(id: number): Task | null {
    const row = this.db.select().from(schema.tasks).where(eq(schema.tasks.id, id)).get();
    return row ? rowToTask(row) : null;
  }

  /** Every stored task, flat, ordered by id. */
  listFlatTasks(): Task[] {
    return this.db.select().from(schema.tasks).orderBy(asc(schema.tasks.id)).all().map(rowToTask);
  }

  /**
   * Tasks no other task lists as a child, each hydrated downward.
   */
  getRootTasks(): TaskTree[] {
    const roots: TaskTree[] = [];
    for (const id of findRootIds(this.listFlatTasks())) {
      const node = hydrateSubtree(id, this.lookup);
      if (node) roots.push(node);
    }
    return roots;
  }

  /**
   * Hydrated task (children and ancestor chain), or null if absent.
   * Terminates on stored cycles: a revisited id is left out.
   */
  getTask(id: number): TaskTree | null {
    return hydrateTask(id, this.lookup);
  }

  /** Whether `candidateId` is an ancestor of `targetId`; true on a stored cycle. */
  isAncestor(candidateId: number, targetId: number): boolean {
    return isAncestor(candidateId, targetId, this.lookup);
  }

  /** Whether `candidateId` is anywhere below `rootId`. */
  isDescendant(candidateId: number, rootId: number): boolean {
    return isDescendant(candidateId, rootId, this.lookup);
  }

  // === WRITES ===

  /**
   * Insert a task and return its flat snapshot.
   * A non-empty `childs` is applied through updateChilds(); if that fails
   * the insert is rolled back.
   */
  insertTask(task: NewTask): Task {
    return this.transaction((store) => store.insertRow(task));
  }

  private insertRow(task: NewTask): Task {
    const row = this.db.insert(schema.tasks).values({
      title: task.title,
      description: task.description ?? null,
      status: task.status ?? false,
      updated: new Date().toISOString(),
      parent: task.parent ?? null,
      childs: [],
    }).returning().get();

    if (!row) {
      throw new TaskTreeError(ExitCode.STORAGE_FAILURE, `Insert returned no row for task "${task.title}"`);
    }

    const created = rowToTask(row);
    this.log.debug({ taskId: created.id }, 'task inserted');

    if (task.childs && task.childs.length > 0) {
      return this.applyChilds(created.id, task.childs);
    }
    return created;
  }

  /**
   * Low-level full-row write. No cycle validation: callers changing
   * `parent` or `childs` here must have validated already.
   * Returns null if the task does not exist.
   */
  updateTask(task: Task): Task | null {
    return this.writeRow(task.id, {
      title: task.title,
      description: task.description,
      status: task.status,
      parent: task.parent,
      childs: task.childs,
    });
  }

  /**
   * Rewrite the child list of `id`, keeping parent pointers symmetric.
   *
   * Validation runs before any write. Rejected: an unknown `id` or newly
   * listed child (NOT_FOUND), `id` in its own list, or a child that is an
   * ancestor of `id` (CIRCULAR_REFERENCE). Listed ids of deleted tasks are
   * dropped from the stored list.
   */
  updateChilds(id: number, newChildIds: number[]): Task {
    return this.transaction((store) => store.applyChilds(id, newChildIds));
  }

  private applyChilds(id: number, newChildIds: number[]): Task {
    const task = this.getFlatTask(id);
    if (!task) {
      throw new TaskTreeError(ExitCode.NOT_FOUND, `Task not found: ${id}`);
    }

    const requested = uniqueIds(newChildIds);
    if (requested.includes(id)) {
      throw new TaskTreeError(
        ExitCode.CIRCULAR_REFERENCE,
        `Task ${id} cannot be its own child`,
      );
    }

    // Ids already listed whose task is gone are dropped; new ids must exist
    const previous = new Set(task.childs);
    const next: number[] = [];
    for (const childId of requested) {
      if (this.getFlatTask(childId)) {
        next.push(childId);
      } else if (!previous.has(childId)) {
        throw new TaskTreeError(ExitCode.NOT_FOUND, `Child task not found: ${childId}`);
      }
    }

    for (const childId of next) {
      if (this.isAncestor(childId, id)) {
        throw new TaskTreeError(
          ExitCode.CIRCULAR_REFERENCE,
          `Adding ${childId} under ${id} would create a circular reference`,
          { fix: `Task ${childId} is an ancestor of ${id}` },
        );
      }
    }

    const updated = this.writeRow(id, { childs: next });
    if (!updated) {
      throw new TaskTreeError(ExitCode.STORAGE_FAILURE, `Update returned no row for task ${id}`);
    }

    for (const childId of next) {
      if (previous.has(childId)) continue;
      const child = this.getFlatTask(childId);
      if (child && child.parent !== null && child.parent !== id) {
        this.detachFrom(child.parent, childId);
      }
      this.writeRow(childId, { parent: id });
    }

    const kept = new Set(next);
    for (const childId of previous) {
      if (!kept.has(childId)) this.writeRow(childId, { parent: null });
    }

    this.log.debug({ taskId: id, childs: next }, 'child list rewritten');
    return updated;
  }

  /** Drop `childId` from a former parent's list, leaving the rest untouched. */
  private detachFrom(parentId: number, childId: number): void {
    const parent = this.getFlatTask(parentId);
    if (!parent) return;
    this.writeRow(parentId, { childs: parent.childs.filter((c) => c !== childId) });
  }

  /**
   * Delete a task and its whole subtree, children before parents.
   * Deleting an absent id is a no-op.
   */
  deleteTaskRecursive(id: number): void {
    this.transaction((store) => store.deleteSubtree(id, new Set()));
  }

  private deleteSubtree(id: number, visited: Set<number>): void {
    if (visited.has(id)) return;
    const task = this.getFlatTask(id);
    if (!task) return;
    visited.add(id);

    for (const childId of task.childs) {
      this.deleteSubtree(childId, visited);
    }

    this.db.delete(schema.tasks).where(eq(schema.tasks.id, id)).run();
    this.log.debug({ taskId: id }, 'task deleted');
  }

  /**
   * Flip a task's status. Switching it on forces every descendant on as
   * well; switching it off leaves descendants alone.
   * Returns the new status, or null if the task does not exist.
   */
  toggleTask(id: number): boolean | null {
    return this.transaction((store) => {
      const task = store.getFlatTask(id);
      if (!task) return null;

      const status = !task.status;
      store.writeRow(id, { status });
      if (status) {
        store.cascadeDone(id, new Set([id]));
      }
      return status;
    });
  }

  /** Re-reads each level's `childs` from storage rather than trusting a snapshot. */
  private cascadeDone(id: number, visited: Set<number>): void {
    const task = this.getFlatTask(id);
    if (!task) return;

    for (const childId of task.childs) {
      if (visited.has(childId)) continue;
      visited.add(childId);
      const child = this.getFlatTask(childId);
      if (!child) continue;
      if (!child.status) this.writeRow(childId, { status: true });
      this.cascadeDone(childId, visited);
    }
  }

  private writeRow(id: number, patch: TaskPatch): Task | null {
    const row = this.db.update(schema.tasks)
      .set({ ...patch, updated: new Date().toISOString() })
      .where(eq(schema.tasks.id, id))
      .returning()
      .get();
    return row ? rowToTask(row) : null;
  }
}
