/**
 * Task type definitions.
 *
 * `Task` is the flat row snapshot (ids only); `TaskTree` is the hydrated
 * form returned to callers, with children and ancestors resolved.
 */

/** A single persisted task, as stored. */
export interface Task {
  id: number;
  title: string;
  description: string | null;
  /** Done flag. */
  status: boolean;
  /** ISO timestamp of the last mutating write. */
  updated: string | null;
  parent: number | null;
  /** Ordered ids of direct children. */
  childs: number[];
}

/** Input accepted by TaskStore.insertTask(). The id is assigned by the store. */
export interface NewTask {
  title: string;
  description?: string | null;
  status?: boolean;
  parent?: number | null;
  childs?: number[];
}

/**
 * Hydrated task. Descendants hang off `childs` (their own `parent` left null);
 * the ancestor chain hangs off `parent` (ancestors carry empty `childs`).
 */
export interface TaskTree {
  id: number;
  title: string;
  description: string | null;
  status: boolean;
  updated: string | null;
  parent: TaskTree | null;
  childs: TaskTree[];
}

/** Reads one flat task by id; null when absent. */
export type TaskLookup = (id: number) => Task | null;
