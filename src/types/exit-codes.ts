/**
 * Waypoint exit codes.
 * Ranges: 0 = success, 1-9 general, 10-19 hierarchy, 20-29 workflow, 30-39 dependencies.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === HIERARCHY ERRORS (10-19) ===
  PARENT_NOT_FOUND = 10,
  INVALID_KIND = 11,
  INVALID_PARENT_TYPE = 13,
  HAS_CHILDREN = 16,
  CASCADE_FAILED = 18,

  // === WORKFLOW ERRORS (20-29) ===
  UNKNOWN_FLOW = 20,
  INVALID_TRIGGER = 21,
  TERMINAL_STATE = 22,
  STATUS_NOT_IN_FLOW = 23,
  VERIFICATION_REQUIRED = 24,

  // === DEPENDENCY ERRORS (30-39) ===
  CYCLE_DETECTED = 30,
  DUPLICATE_EDGE = 31,
  DEPENDENCY_BLOCKED = 32,
}

/** Error category used in serialized error envelopes. */
export type ErrorCategory = 'NOT_FOUND' | 'VALIDATION' | 'CONFLICT' | 'INTERNAL';

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  return code === ExitCode.LOCK_TIMEOUT || code === ExitCode.DEPENDENCY_BLOCKED;
}

/** Map an exit code to its error category. */
export function getExitCodeCategory(code: ExitCode): ErrorCategory {
  switch (code) {
    case ExitCode.NOT_FOUND:
    case ExitCode.PARENT_NOT_FOUND:
    case ExitCode.UNKNOWN_FLOW:
      return 'NOT_FOUND';
    case ExitCode.INVALID_INPUT:
    case ExitCode.VALIDATION_ERROR:
    case ExitCode.CONFIG_ERROR:
    case ExitCode.INVALID_KIND:
    case ExitCode.INVALID_PARENT_TYPE:
    case ExitCode.INVALID_TRIGGER:
    case ExitCode.STATUS_NOT_IN_FLOW:
    case ExitCode.VERIFICATION_REQUIRED:
      return 'VALIDATION';
    case ExitCode.LOCK_TIMEOUT:
    case ExitCode.HAS_CHILDREN:
    case ExitCode.TERMINAL_STATE:
    case ExitCode.CYCLE_DETECTED:
    case ExitCode.DUPLICATE_EDGE:
    case ExitCode.DEPENDENCY_BLOCKED:
      return 'CONFLICT';
    default:
      return 'INTERNAL';
  }
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
