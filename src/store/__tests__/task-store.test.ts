/**
 * Tests for the SQLite tree store, each against its own in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openTaskDb } from '../sqlite.js';
import type { TaskDbHandle } from '../sqlite.js';
import { TaskStore } from '../task-store.js';
import { TaskTreeError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';

function codeOf(fn: () => unknown): ExitCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof TaskTreeError) return err.code;
    throw err;
  }
  return undefined;
}

describe('TaskStore', () => {
  let handle: TaskDbHandle;
  let store: TaskStore;

  beforeEach(() => {
    handle = openTaskDb(':memory:');
    store = new TaskStore(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  function get(id: number): Task {
    const task = store.getFlatTask(id);
    if (!task) throw new Error(`missing task ${id}`);
    return task;
  }

  /** A ─ B ─ C chain: returns [a, b, c] ids. */
  function chain(): [number, number, number] {
    const a = store.insertTask({ title: 'A' }).id;
    const b = store.insertTask({ title: 'B' }).id;
    const c = store.insertTask({ title: 'C' }).id;
    store.updateChilds(a, [b]);
    store.updateChilds(b, [c]);
    return [a, b, c];
  }

  describe('insertTask', () => {
    it('assigns ids and fills defaults', () => {
      const first = store.insertTask({ title: 'First' });
      const second = store.insertTask({ title: 'Second', description: 'notes', status: true });

      expect(first).toMatchObject({
        id: 1,
        title: 'First',
        description: null,
        status: false,
        parent: null,
        childs: [],
      });
      expect(first.updated).toMatch(/^\d{4}-\d{2}-\d{2}T/);
      expect(second).toMatchObject({ id: 2, description: 'notes', status: true });
    });

    it('links initial children both ways', () => {
      const child = store.insertTask({ title: 'Child' });
      const parent = store.insertTask({ title: 'Parent', childs: [child.id] });

      expect(parent.childs).toEqual([child.id]);
      expect(get(child.id).parent).toBe(parent.id);
    });

    it('leaves no row behind when its child list names itself', () => {
      // the first row in an empty table gets id 1
      expect(codeOf(() => store.insertTask({ title: 'Loop', childs: [1] }))).toBe(ExitCode.CIRCULAR_REFERENCE);
      expect(store.listFlatTasks()).toEqual([]);
    });

    it('leaves no row behind when a child does not exist', () => {
      expect(codeOf(() => store.insertTask({ title: 'Orphaned', childs: [99] }))).toBe(ExitCode.NOT_FOUND);
      expect(store.listFlatTasks()).toEqual([]);
    });
  });

  describe('getRootTasks', () => {
    it('returns an empty list for an empty store', () => {
      expect(store.getRootTasks()).toEqual([]);
    });

    it('returns unlisted tasks, ordered by id, with descendants', () => {
      const [a, b, c] = chain();
      const d = store.insertTask({ title: 'D' }).id;

      const roots = store.getRootTasks();
      expect(roots.map((r) => r.id)).toEqual([a, d]);
      expect(roots[0]?.childs.map((n) => n.id)).toEqual([b]);
      expect(roots[0]?.childs[0]?.childs.map((n) => n.id)).toEqual([c]);
      expect(roots[1]?.childs).toEqual([]);
    });
  });

  describe('getTask', () => {
    it('returns null for an unknown id', () => {
      expect(store.getTask(42)).toBeNull();
    });

    it('hydrates children and the ancestor chain', () => {
      const [a, b, c] = chain();
      const node = store.getTask(b);

      expect(node?.childs.map((n) => n.id)).toEqual([c]);
      expect(node?.parent?.id).toBe(a);
      expect(node?.parent?.childs).toEqual([]);
      expect(node?.parent?.parent).toBeNull();
    });

    it('terminates on a stored cycle', () => {
      const a = store.insertTask({ title: 'A' });
      const b = store.insertTask({ title: 'B' });
      // Corrupt storage directly: A lists B and B lists A
      store.updateTask({ ...a, childs: [b.id], parent: b.id });
      store.updateTask({ ...b, childs: [a.id], parent: a.id });

      const node = store.getTask(a.id);
      expect(node?.childs.map((n) => n.id)).toEqual([b.id]);
      expect(node?.childs[0]?.childs).toEqual([]);
      expect(node?.parent).toBeNull();
    });

    it('hands back snapshots that do not alias storage', () => {
      const [a] = chain();
      const node = store.getTask(a);
      if (node) {
        node.title = 'changed';
        node.childs = [];
      }
      expect(get(a).title).toBe('A');
      expect(store.getTask(a)?.childs).toHaveLength(1);
    });
  });

  describe('updateChilds', () => {
    it('sets parent pointers on listed children and clears dropped ones', () => {
      const p = store.insertTask({ title: 'P' }).id;
      const x = store.insertTask({ title: 'X' }).id;
      const y = store.insertTask({ title: 'Y' }).id;

      store.updateChilds(p, [x, y]);
      expect(get(x).parent).toBe(p);
      expect(get(y).parent).toBe(p);

      const updated = store.updateChilds(p, [y]);
      expect(updated.childs).toEqual([y]);
      expect(get(x).parent).toBeNull();
      expect(get(y).parent).toBe(p);
    });

    it('collapses duplicates to the first occurrence', () => {
      const p = store.insertTask({ title: 'P' }).id;
      const x = store.insertTask({ title: 'X' }).id;
      const y = store.insertTask({ title: 'Y' }).id;

      expect(store.updateChilds(p, [y, x, y]).childs).toEqual([y, x]);
    });

    it('moves a child away from its previous parent', () => {
      const p1 = store.insertTask({ title: 'P1' }).id;
      const p2 = store.insertTask({ title: 'P2' }).id;
      const x = store.insertTask({ title: 'X' }).id;

      store.updateChilds(p1, [x]);
      store.updateChilds(p2, [x]);

      expect(get(p1).childs).toEqual([]);
      expect(get(p2).childs).toEqual([x]);
      expect(get(x).parent).toBe(p2);
    });

    it('rejects the task in its own child list', () => {
      const p = store.insertTask({ title: 'P' }).id;
      expect(codeOf(() => store.updateChilds(p, [p]))).toBe(ExitCode.CIRCULAR_REFERENCE);
      expect(get(p).childs).toEqual([]);
    });

    it('rejects an ancestor as a child and writes nothing', () => {
      const [a, b, c] = chain();
      const x = store.insertTask({ title: 'X' }).id;

      expect(codeOf(() => store.updateChilds(c, [x, a]))).toBe(ExitCode.CIRCULAR_REFERENCE);
      expect(get(c).childs).toEqual([]);
      expect(get(x).parent).toBeNull();
      expect(get(a).parent).toBeNull();
      expect(get(b).childs).toEqual([c]);
    });

    it('drops listed ids of deleted tasks instead of failing', () => {
      const p = store.insertTask({ title: 'P' }).id;
      const x = store.insertTask({ title: 'X' }).id;
      const y = store.insertTask({ title: 'Y' }).id;
      store.updateChilds(p, [x]);
      store.updateTask({ ...get(p), childs: [x, 999] });

      expect(store.updateChilds(p, [x, 999, y]).childs).toEqual([x, y]);
      expect(get(y).parent).toBe(p);
    });

    it('rejects unknown ids', () => {
      const p = store.insertTask({ title: 'P' }).id;
      expect(codeOf(() => store.updateChilds(99, [p]))).toBe(ExitCode.NOT_FOUND);
      expect(codeOf(() => store.updateChilds(p, [99]))).toBe(ExitCode.NOT_FOUND);
    });
  });

  describe('updateTask', () => {
    it('writes fields and returns the new row', () => {
      const task = store.insertTask({ title: 'Draft' });
      const updated = store.updateTask({ ...task, title: 'Final', description: 'done' });

      expect(updated).toMatchObject({ id: task.id, title: 'Final', description: 'done' });
      expect(get(task.id).title).toBe('Final');
    });

    it('returns null for an unknown id', () => {
      const task = store.insertTask({ title: 'Real' });
      expect(store.updateTask({ ...task, id: 99 })).toBeNull();
    });
  });

  describe('deleteTaskRecursive', () => {
    it('removes the whole subtree', () => {
      const [a, b] = chain();
      const other = store.insertTask({ title: 'Other' }).id;

      store.deleteTaskRecursive(b);

      expect(store.listFlatTasks().map((t) => t.id)).toEqual([a, other]);
    });

    it('is idempotent and a no-op for unknown ids', () => {
      const [a] = chain();
      store.deleteTaskRecursive(a);
      store.deleteTaskRecursive(a);
      store.deleteTaskRecursive(42);
      expect(store.listFlatTasks()).toEqual([]);
    });

    it('terminates on a stored cycle', () => {
      const a = store.insertTask({ title: 'A' });
      const b = store.insertTask({ title: 'B' });
      store.updateTask({ ...a, childs: [b.id] });
      store.updateTask({ ...b, childs: [a.id] });

      store.deleteTaskRecursive(a.id);
      expect(store.listFlatTasks()).toEqual([]);
    });
  });

  describe('toggleTask', () => {
    it('cascades done to every descendant', () => {
      const [a, b, c] = chain();

      expect(store.toggleTask(a)).toBe(true);
      expect([get(a), get(b), get(c)].map((t) => t.status)).toEqual([true, true, true]);
    });

    it('leaves descendants alone when switching off', () => {
      const [a, b, c] = chain();
      store.toggleTask(a);

      expect(store.toggleTask(a)).toBe(false);
      expect([get(a), get(b), get(c)].map((t) => t.status)).toEqual([false, true, true]);
    });

    it('does not touch ancestors', () => {
      const [a, b, c] = chain();
      store.toggleTask(b);
      expect([get(a), get(b), get(c)].map((t) => t.status)).toEqual([false, true, true]);
    });

    it('returns null for an unknown id', () => {
      expect(store.toggleTask(42)).toBeNull();
    });

    it('terminates on a stored cycle', () => {
      const a = store.insertTask({ title: 'A' });
      const b = store.insertTask({ title: 'B' });
      store.updateTask({ ...a, childs: [b.id] });
      store.updateTask({ ...b, childs: [a.id] });

      expect(store.toggleTask(a.id)).toBe(true);
      expect(get(a.id).status).toBe(true);
      expect(get(b.id).status).toBe(true);
    });
  });

  describe('isAncestor / isDescendant', () => {
    it('follows the stored links', () => {
      const [a, b, c] = chain();
      expect(store.isAncestor(a, c)).toBe(true);
      expect(store.isAncestor(c, a)).toBe(false);
      expect(store.isDescendant(c, a)).toBe(true);
      expect(store.isDescendant(a, b)).toBe(false);
    });
  });

  describe('transaction', () => {
    it('rolls back every write when the callback throws', () => {
      store.insertTask({ title: 'Kept' });

      expect(() =>
        store.transaction((tx) => {
          tx.insertTask({ title: 'Discarded' });
          throw new Error('abort');
        }),
      ).toThrow('abort');

      expect(store.listFlatTasks().map((t) => t.title)).toEqual(['Kept']);
    });

    it('returns the callback result on commit', () => {
      const id = store.transaction((tx) => tx.insertTask({ title: 'Committed' }).id);
      expect(get(id).title).toBe('Committed');
    });
  });
});
