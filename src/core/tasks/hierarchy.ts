/**
 * Task hierarchy operations - parent/child tree traversal and validation.
 *
 * Every function reads tasks through a TaskLookup, so the same code walks
 * live storage (TaskStore) and in-memory fixtures. All walks carry a visited
 * set: stored data may already contain a cycle, and traversal must still
 * terminate.
 */

import type { Task, TaskLookup, TaskTree } from '../../types/task.js';

/** Build an unexpanded tree node from a flat task. */
function taskToNode(task: Task): TaskTree {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    updated: task.updated,
    parent: null,
    childs: [],
  };
}

/**
 * Build a lookup over an in-memory task list.
 */
export function lookupFromList(tasks: Task[]): TaskLookup {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  return (id) => byId.get(id) ?? null;
}

/**
 * Check whether `candidateId` is an ancestor of `targetId` by walking the
 * target's parent chain one hop at a time.
 *
 * Fail-safe: a repeated id (a cycle already in storage) reports true, since
 * the walk cannot prove the candidate is not above the target.
 */
export function isAncestor(candidateId: number, targetId: number, lookup: TaskLookup): boolean {
  const visited = new Set<number>([targetId]);
  let current = lookup(targetId)?.parent ?? null;

  while (current !== null) {
    if (current === candidateId) return true;
    if (visited.has(current)) return true;
    visited.add(current);
    current = lookup(current)?.parent ?? null;
  }

  return false;
}

/**
 * Get all descendant ids of a task (breadth-first, via `childs`).
 * Each id is reported once; the root itself is never included.
 */
export function getDescendantIds(rootId: number, lookup: TaskLookup): number[] {
  const result: number[] = [];
  const visited = new Set<number>([rootId]);
  const queue = [rootId];

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    const task = lookup(current);
    if (!task) continue;
    for (const childId of task.childs) {
      if (visited.has(childId)) continue;
      visited.add(childId);
      result.push(childId);
      queue.push(childId);
    }
  }

  return result;
}

/**
 * Check whether `candidateId` sits anywhere in the subtree below `rootId`.
 */
export function isDescendant(candidateId: number, rootId: number, lookup: TaskLookup): boolean {
  return getDescendantIds(rootId, lookup).includes(candidateId);
}

/**
 * Ids of root tasks: those not listed in any *other* task's `childs`.
 * Returned in ascending id order.
 */
export function findRootIds(tasks: Task[]): number[] {
  const listed = new Set<number>();
  for (const task of tasks) {
    for (const childId of task.childs) {
      if (childId !== task.id) listed.add(childId);
    }
  }
  return tasks
    .map((t) => t.id)
    .filter((id) => !listed.has(id))
    .sort((a, b) => a - b);
}

function expandChilds(task: Task, lookup: TaskLookup, visited: Set<number>): TaskTree[] {
  const nodes: TaskTree[] = [];
  for (const childId of task.childs) {
    if (visited.has(childId)) continue;
    const child = lookup(childId);
    if (!child) continue;
    visited.add(childId);
    const node = taskToNode(child);
    node.childs = expandChilds(child, lookup, visited);
    nodes.push(node);
  }
  return nodes;
}

function expandAncestors(parentId: number | null, lookup: TaskLookup, visited: Set<number>): TaskTree | null {
  if (parentId === null || visited.has(parentId)) return null;
  const parent = lookup(parentId);
  if (!parent) return null;
  visited.add(parentId);
  const node = taskToNode(parent);
  node.parent = expandAncestors(parent.parent, lookup, visited);
  return node;
}

/**
 * Hydrate a task's descendants (ancestors not attached).
 * Returns null when the task does not exist.
 */
export function hydrateSubtree(
  taskId: number,
  lookup: TaskLookup,
  visited: Set<number> = new Set(),
): TaskTree | null {
  if (visited.has(taskId)) return null;
  const task = lookup(taskId);
  if (!task) return null;
  visited.add(taskId);
  const node = taskToNode(task);
  node.childs = expandChilds(task, lookup, visited);
  return node;
}

/**
 * Hydrate a task fully: descendants under `childs`, ancestor chain under
 * `parent`. One visited set spans both directions, so an id already placed
 * in the result is treated as absent wherever it shows up again.
 */
export function hydrateTask(taskId: number, lookup: TaskLookup): TaskTree | null {
  const visited = new Set<number>();
  const node = hydrateSubtree(taskId, lookup, visited);
  if (!node) return null;
  const task = lookup(taskId);
  node.parent = expandAncestors(task?.parent ?? null, lookup, visited);
  return node;
}

/**
 * Flatten a hydrated tree's descendants (depth-first, node first).
 * The ancestor chain is not included.
 */
export function flattenTree(node: TaskTree): number[] {
  const result = [node.id];
  for (const child of node.childs) {
    result.push(...flattenTree(child));
  }
  return result;
}
