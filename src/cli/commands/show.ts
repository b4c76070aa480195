/**
 * CLI show command.
 */

import { Command } from 'commander';
import { TaskTreeError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { openCliContext } from '../context.js';
import { exitWithError } from '../errors.js';
import type { TaskTree } from '../../types/task.js';

function parseTaskId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new TaskTreeError(ExitCode.INVALID_INPUT, `Invalid task id: ${raw}`);
  }
  return id;
}

/**
 * Register the show command.
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show [taskId]')
    .description('Print a task with its subtree and ancestors, or every root task')
    .option('--db <path>', 'SQLite database file')
    .action(async (taskId: string | undefined, opts: { db?: string }) => {
      try {
        const { db, service } = await openCliContext({ 'database.path': opts.db });
        try {
          const result: TaskTree | TaskTree[] = taskId === undefined
            ? service.listRoots()
            : service.show(parseTaskId(taskId));
          process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
        } finally {
          db.close();
        }
      } catch (err) {
        exitWithError(err);
      }
    });
}
