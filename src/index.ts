/**
 * tasktree - hierarchical task tree with an HTTP JSON API.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type { Task, NewTask, TaskTree, TaskLookup } from './types/task.js';
export type { TaskTreeConfig, LoggingConfig, ServerConfig, DatabaseConfig } from './types/config.js';

// Core
export { TaskTreeError, isTaskTreeError } from './core/errors.js';
export { loadConfig, getConfigValue } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Tree helpers
export {
  isAncestor,
  isDescendant,
  findRootIds,
  hydrateTask,
  hydrateSubtree,
  flattenTree,
  lookupFromList,
} from './core/tasks/hierarchy.js';

// Service
export { TaskService } from './core/tasks/task-service.js';
export type { CreateTaskInput, UpdateTaskInput } from './core/tasks/task-service.js';

// Store
export { TaskStore } from './store/task-store.js';
export { openTaskDb } from './store/sqlite.js';
export type { TaskDbHandle, OpenTaskDbOptions } from './store/sqlite.js';

// HTTP
export { startHttpServer } from './api/server.js';
export type { HttpServerHandle, HttpServerOptions } from './api/server.js';
