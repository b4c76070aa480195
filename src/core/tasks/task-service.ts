/**
 * Task service - one method per API use case.
 *
 * Each use case runs inside a single store transaction, so a multi-step
 * structural change (insert-then-link, move between child lists, detach
 * then delete) either lands whole or not at all.
 */

import type { Logger } from 'pino';
import type { TaskStore } from '../../store/task-store.js';
import type { Task, TaskTree } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { TaskTreeError } from '../errors.js';
import { getLogger } from '../logger.js';
import { flattenTree } from './hierarchy.js';

/** Fields accepted when creating a task. */
export interface CreateTaskInput {
  title: string;
  description?: string | null;
  status?: boolean;
}

/** Fields accepted when editing a task in place. */
export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
}

function requireTask(store: TaskStore, id: number): Task {
  const task = store.getFlatTask(id);
  if (!task) {
    throw new TaskTreeError(ExitCode.NOT_FOUND, `Task not found: ${id}`, {
      fix: `List root tasks with GET /tasks`,
    });
  }
  return task;
}

function requireTree(store: TaskStore, id: number): TaskTree {
  const tree = store.getTask(id);
  if (!tree) {
    throw new TaskTreeError(ExitCode.NOT_FOUND, `Task not found: ${id}`);
  }
  return tree;
}

export class TaskService {
  private readonly store: TaskStore;
  private readonly log: Logger;

  constructor(store: TaskStore, log: Logger = getLogger('task-service')) {
    this.store = store;
    this.log = log;
  }

  /** Root tasks, each with its descendants. */
  listRoots(): TaskTree[] {
    return this.store.getRootTasks();
  }

  /** One hydrated task. */
  show(id: number): TaskTree {
    return requireTree(this.store, id);
  }

  /**
   * Create a task, optionally under `parentId`, and return it hydrated.
   */
  create(input: CreateTaskInput, parentId: number | null = null): TaskTree {
    return this.store.transaction((store) => {
      const parent = parentId === null ? null : store.getFlatTask(parentId);
      if (parentId !== null && !parent) {
        throw new TaskTreeError(ExitCode.PARENT_NOT_FOUND, `Parent task not found: ${parentId}`);
      }

      const created = store.insertTask({
        title: input.title,
        description: input.description ?? null,
        status: input.status ?? false,
        parent: parentId,
      });

      if (parent) {
        store.updateChilds(parent.id, [...parent.childs, created.id]);
      }

      this.log.info({ taskId: created.id, parentId }, 'task created');
      return requireTree(store, created.id);
    });
  }

  /**
   * Edit title and/or description.
   */
  update(id: number, changes: UpdateTaskInput): TaskTree {
    return this.store.transaction((store) => {
      const task = requireTask(store, id);
      store.updateTask({
        ...task,
        title: changes.title ?? task.title,
        description: changes.description !== undefined ? changes.description : task.description,
      });
      this.log.info({ taskId: id }, 'task updated');
      return requireTree(store, id);
    });
  }

  /**
   * Delete a task and its subtree. Returns the snapshot taken before deletion.
   */
  delete(id: number): TaskTree {
    return this.store.transaction((store) => {
      const task = requireTask(store, id);
      const snapshot = requireTree(store, id);

      if (task.parent !== null) {
        const parent = store.getFlatTask(task.parent);
        if (parent && parent.childs.includes(id)) {
          store.updateChilds(parent.id, parent.childs.filter((c) => c !== id));
        }
      }

      store.deleteTaskRecursive(id);
      this.log.info({ taskId: id, removed: flattenTree(snapshot).length }, 'task deleted');
      return snapshot;
    });
  }

  /**
   * Flip a task's status (cascading "done" downward) and return it hydrated.
   */
  toggle(id: number): TaskTree {
    return this.store.transaction((store) => {
      requireTask(store, id);
      const status = store.toggleTask(id);
      this.log.info({ taskId: id, status }, 'task toggled');
      return requireTree(store, id);
    });
  }

  /**
   * Move a task (with its subtree) under `newParentId`, or to the root
   * level when null.
   */
  changeParent(id: number, newParentId: number | null): TaskTree {
    return this.store.transaction((store) => {
      const task = requireTask(store, id);

      if (newParentId === id) {
        throw new TaskTreeError(ExitCode.INVALID_PARENT, `Task ${id} cannot be its own parent`);
      }

      if (newParentId !== null) {
        if (!store.getFlatTask(newParentId)) {
          throw new TaskTreeError(ExitCode.PARENT_NOT_FOUND, `Parent task not found: ${newParentId}`);
        }
        if (store.isDescendant(newParentId, id)) {
          throw new TaskTreeError(
            ExitCode.INVALID_PARENT,
            `Moving ${id} under ${newParentId} would create a circular reference`,
            { fix: `Task ${newParentId} is a descendant of ${id}` },
          );
        }
      }

      const oldParentId = task.parent;
      if (oldParentId === newParentId) {
        return requireTree(store, id);
      }

      if (oldParentId !== null) {
        const oldParent = store.getFlatTask(oldParentId);
        if (oldParent) {
          store.updateChilds(oldParentId, oldParent.childs.filter((c) => c !== id));
        }
      }

      if (newParentId !== null) {
        const newParent = requireTask(store, newParentId);
        store.updateChilds(newParentId, [...newParent.childs, id]);
      }

      store.updateTask({ ...requireTask(store, id), parent: newParentId });

      this.log.info({ taskId: id, oldParentId, newParentId }, 'task reparented');
      return requireTree(store, id);
    });
  }
}
