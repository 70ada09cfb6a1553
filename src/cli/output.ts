/**
 * Output helpers shared by CLI commands.
 */

import { WaypointError } from '../core/errors.js';
import { formatError, formatSuccess } from '../core/output.js';
import { ExitCode } from '../types/exit-codes.js';

/** Print a success envelope on stdout. */
export function cliOutput<T>(data: T, operation: string, message?: string): void {
  console.log(formatSuccess(data, message, operation));
}

/**
 * Print an error envelope on stderr and exit with the error's code.
 * Non-Waypoint errors exit with GENERAL_ERROR.
 */
export function cliError(err: unknown, operation: string): never {
  console.error(formatError(err, operation));
  process.exit(err instanceof WaypointError ? err.code : ExitCode.GENERAL_ERROR);
}

/** Run a command body, printing its result or its error. */
export async function runCommand<T>(
  operation: string,
  fn: () => Promise<T>,
  message?: (result: T) => string,
): Promise<void> {
  let result: T;
  try {
    result = await fn();
  } catch (err) {
    cliError(err, operation);
  }
  cliOutput(result, operation, message?.(result));
}

/** Split a comma-separated option value. */
export function parseList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
