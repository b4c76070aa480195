/**
 * tasktree exit codes.
 * Ranges: 0 = success, 1-9 = general errors, 10-19 = hierarchy errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  STORAGE_FAILURE = 3,
  NOT_FOUND = 4,
  CONFIG_ERROR = 8,

  // === HIERARCHY ERRORS (10-19) ===
  PARENT_NOT_FOUND = 10,
  INVALID_PARENT = 13,
  CIRCULAR_REFERENCE = 14,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
