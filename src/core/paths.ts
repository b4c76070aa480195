/**
 * Path resolution for tasktree.
 *
 * Environment variables:
 *   TASKTREE_DIR - Data directory (default: .tasktree under the working directory)
 */

import { isAbsolute, join, resolve } from 'node:path';

/** Default data directory name. */
export const DEFAULT_DATA_DIR = '.tasktree';

/** SQLite path that keeps the database in memory. */
export const IN_MEMORY_DB = ':memory:';

/**
 * Get the data directory (possibly relative).
 * Respects TASKTREE_DIR env var, defaults to ".tasktree".
 */
export function getDataDir(): string {
  return process.env['TASKTREE_DIR'] ?? DEFAULT_DATA_DIR;
}

/**
 * Get the absolute path to the data directory.
 */
export function getDataDirAbsolute(cwd?: string): string {
  const dataDir = getDataDir();
  if (isAbsolutePath(dataDir)) {
    return dataDir;
  }
  return resolve(cwd ?? process.cwd(), dataDir);
}

/**
 * Get the path to the project's config.json file.
 */
export function getConfigPath(cwd?: string): string {
  return join(getDataDirAbsolute(cwd), 'config.json');
}

/**
 * Resolve a configured database path against the data directory.
 * ':memory:' is passed through untouched.
 */
export function resolveDbPath(dbPath: string, cwd?: string): string {
  if (dbPath === IN_MEMORY_DB || isAbsolutePath(dbPath)) {
    return dbPath;
  }
  return join(getDataDirAbsolute(cwd), dbPath);
}

/**
 * Check if a path is absolute (POSIX or Windows).
 */
export function isAbsolutePath(path: string): boolean {
  return isAbsolute(path) || /^[A-Za-z]:[\\/]/.test(path);
}
