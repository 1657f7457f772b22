/**
 * festgraph exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  DEPENDENCY_ERROR = 5,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,

  // === GRAPH ERRORS (10-19) ===
  CIRCULAR_REFERENCE = 14,

  // === SPECIAL CODES (100+) ===
  // Conventional SIGINT code
  OPERATION_CANCELLED = 130,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
