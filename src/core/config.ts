/**
 * Configuration engine for tasktree.
 *
 * Resolution priority: CLI flags > Environment vars > Project config > Defaults
 */

import { readFile } from 'node:fs/promises';
import type { ResolvedValue, TaskTreeConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { TaskTreeError } from './errors.js';
import { getConfigPath } from './paths.js';

/** Default configuration values. */
const DEFAULTS: TaskTreeConfig = {
  server: {
    host: '127.0.0.1',
    port: 8000,
  },
  database: {
    path: 'tasks.db',
    busyTimeoutMs: 5000,
  },
  logging: {
    level: 'info',
    filePath: null,
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TASKTREE_HOST': 'server.host',
  'TASKTREE_PORT': 'server.port',
  'TASKTREE_DB_PATH': 'database.path',
  'TASKTREE_DB_BUSY_TIMEOUT': 'database.busyTimeoutMs',
  'TASKTREE_LOG_LEVEL': 'logging.level',
  'TASKTREE_LOG_FILE': 'logging.filePath',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const last = parts[parts.length - 1];
  if (last !== undefined) current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Read the project config file. Returns null if it does not exist.
 */
async function readProjectConfig(cwd?: string): Promise<Record<string, unknown> | null> {
  const configPath = getConfigPath(cwd);
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isRecord(err) && err['code'] === 'ENOENT') return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new TaskTreeError(ExitCode.CONFIG_ERROR, `Invalid JSON in: ${configPath}`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new TaskTreeError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${configPath}`);
  }
  return parsed;
}

/**
 * Check a merged config object against the shape the rest of the code relies on.
 */
function assertConfig(merged: Record<string, unknown>): TaskTreeConfig {
  const checks: Array<[string, string]> = [
    ['server.host', 'string'],
    ['server.port', 'number'],
    ['database.path', 'string'],
    ['database.busyTimeoutMs', 'number'],
    ['logging.level', 'string'],
    ['logging.maxFileSize', 'number'],
    ['logging.maxFiles', 'number'],
  ];
  for (const [path, type] of checks) {
    const value = getNestedValue(merged, path);
    if (typeof value !== type) {
      throw new TaskTreeError(
        ExitCode.CONFIG_ERROR,
        `Config value ${path} must be a ${type}`,
        { fix: `Check config.json and TASKTREE_* environment variables` },
      );
    }
  }
  const filePath = getNestedValue(merged, 'logging.filePath');
  if (filePath !== null && typeof filePath !== 'string') {
    throw new TaskTreeError(ExitCode.CONFIG_ERROR, 'Config value logging.filePath must be a string or null');
  }
  return merged as unknown as TaskTreeConfig;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < project config < environment vars < overrides
 */
export async function loadConfig(
  cwd?: string,
  overrides?: Record<string, unknown>,
): Promise<TaskTreeConfig> {
  let merged: Record<string, unknown> = JSON.parse(JSON.stringify(DEFAULTS));

  const projectConfig = await readProjectConfig(cwd);
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  // Flags arrive as dotted keys, e.g. { 'server.port': 9000 }
  for (const [path, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) setNestedValue(merged, path, value);
  }

  return assertConfig(merged);
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const projectConfig = await readProjectConfig(cwd);
  if (projectConfig) {
    const val = getNestedValue(projectConfig, path);
    if (val !== undefined) {
      return { value: val, source: 'project' };
    }
  }

  return { value: getNestedValue(DEFAULTS, path), source: 'default' };
}
