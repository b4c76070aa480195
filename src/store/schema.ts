/**
 * Drizzle ORM schema for tasktree tasks.db (SQLite via better-sqlite3).
 *
 * One table, `tasks`. The child list is a JSON integer array column; the
 * parent link is a plain integer column (no foreign key, since the tree
 * layer maintains both directions itself).
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

// === TASKS TABLE ===

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  status: integer('status', { mode: 'boolean' }).notNull().default(false),
  updated: text('updated'),
  parent: integer('parent'),
  childs: text('childs', { mode: 'json' }).$type<number[]>(),
}, (table) => [
  index('idx_tasks_parent').on(table.parent),
]);

// === TYPE EXPORTS ===

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
