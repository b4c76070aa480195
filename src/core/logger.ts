/**
 * Centralized pino logger factory for tasktree.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention
 * when a log file is configured, stdout otherwise.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

const levelFormatter = (label: string) => ({ level: label.toUpperCase() });

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param dataDir - Absolute path to the tasktree data directory
 * @param config  - Logging configuration from TaskTreeConfig.logging
 * @returns The root pino logger instance
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  if (config.filePath === null) {
    rootLogger = pino(
      {
        level: config.level,
        formatters: { level: levelFormatter },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(1),
    );
    return rootLogger;
  }

  const dest = isAbsolute(config.filePath) ? config.filePath : join(dataDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: { level: levelFormatter },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so early startup code and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'http', 'task-store')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: levelFormatter },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
