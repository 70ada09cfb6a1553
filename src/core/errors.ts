/**
 * Waypoint error type with exit code integration.
 *
 * Every per-request failure of the engine is a WaypointError; callers branch on
 * `code` rather than on message text.
 */

import {
  ExitCode,
  getExitCodeCategory,
  getExitCodeName,
  isRecoverableCode,
  type ErrorCategory,
} from '../types/exit-codes.js';

/** Serialized error shape used by the CLI and by degraded cascade reports. */
export interface SerializedError {
  code: string;
  exitCode: ExitCode;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  fix?: string;
  details?: Record<string, unknown>;
}

/**
 * Structured error class for Waypoint operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class WaypointError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'WaypointError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  /** Category of this error (NOT_FOUND, VALIDATION, CONFLICT, INTERNAL). */
  get category(): ErrorCategory {
    return getExitCodeCategory(this.code);
  }

  /** Produce the serialized error shape. */
  toSerialized(): SerializedError {
    return {
      code: `E_${this.category}_${getExitCodeName(this.code)}`,
      exitCode: this.code,
      category: this.category,
      message: this.message,
      retryable: isRecoverableCode(this.code),
      ...(this.fix && { fix: this.fix }),
      ...(this.details && { details: this.details }),
    };
  }
}

/** Type guard for WaypointError with a specific code. */
export function isWaypointError(err: unknown, code?: ExitCode): err is WaypointError {
  return err instanceof WaypointError && (code === undefined || err.code === code);
}

/**
 * Normalize any thrown value into a serialized error.
 * Unknown errors are reported as GENERAL_ERROR.
 */
export function toSerializedError(err: unknown): SerializedError {
  if (err instanceof WaypointError) return err.toSerialized();
  const message = err instanceof Error ? err.message : String(err);
  return new WaypointError(ExitCode.GENERAL_ERROR, message, { cause: err }).toSerialized();
}
