/**
 * tasktree error type with exit code integration.
 *
 * Every domain failure raised by the store and service layers is a
 * TaskTreeError. Adapters (HTTP, CLI) translate the exit code into their own
 * surface: a status code, or a process exit code.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** Coarse error category used by adapters to pick a response class. */
export type ErrorCategory = 'NOT_FOUND' | 'VALIDATION' | 'CONFLICT' | 'INTERNAL';

/**
 * Map numeric exit codes to an error category.
 */
export function exitCodeToCategory(code: ExitCode): ErrorCategory {
  switch (code) {
    case ExitCode.NOT_FOUND:
    case ExitCode.PARENT_NOT_FOUND:
      return 'NOT_FOUND';
    case ExitCode.INVALID_INPUT:
    case ExitCode.CONFIG_ERROR:
    case ExitCode.INVALID_PARENT:
      return 'VALIDATION';
    case ExitCode.CIRCULAR_REFERENCE:
      return 'CONFLICT';
    default:
      return 'INTERNAL';
  }
}

/**
 * String error code (E_DETAIL) for an exit code, e.g. E_NOT_FOUND.
 */
export function exitCodeToErrorCode(code: ExitCode): string {
  return `E_${getExitCodeName(code)}`;
}

/**
 * Structured error class for tasktree operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class TaskTreeError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: unknown;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: unknown;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TaskTreeError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  get category(): ErrorCategory {
    return exitCodeToCategory(this.code);
  }

  /** Structured JSON representation used as the error response body. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: exitCodeToErrorCode(this.code),
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

/** Narrow an unknown thrown value to a TaskTreeError. */
export function isTaskTreeError(err: unknown): err is TaskTreeError {
  return err instanceof TaskTreeError;
}
