/**
 * Configuration type definitions for tasktree.
 * Covers the project config file with env/flag cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** HTTP server configuration. */
export interface ServerConfig {
  host: string;
  port: number;
}

/** Database configuration. */
export interface DatabaseConfig {
  /** SQLite file path, relative to the data directory, or ':memory:'. */
  path: string;
  /** SQLite busy timeout in milliseconds. */
  busyTimeoutMs: number;
}

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data dir; null logs to stdout. */
  filePath: string | null;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** tasktree configuration (config.json). */
export interface TaskTreeConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  logging: LoggingConfig;
}

/** Where a resolved config value came from. */
export type ConfigSource = 'default' | 'project' | 'env';

/** A config value with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
