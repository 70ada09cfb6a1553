/**
 * JSON envelope formatter for CLI output.
 *
 * Every command prints exactly one envelope on stdout (success) or stderr
 * (error), so output stays machine-parseable:
 *
 *   { "success": true,  "result": {...}, "message"?: "...", "_meta": {...} }
 *   { "success": false, "result": null,  "error": {...},     "_meta": {...} }
 */

import { randomUUID } from 'node:crypto';
import { toSerializedError, type SerializedError } from './errors.js';

export interface EnvelopeMeta {
  timestamp: string;
  operation: string;
  requestId: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: SerializedError;
  _meta: EnvelopeMeta;
}

function createMeta(operation: string): EnvelopeMeta {
  return {
    timestamp: new Date().toISOString(),
    operation,
    requestId: randomUUID(),
  };
}

/** Format a successful result as an envelope. */
export function formatSuccess<T>(data: T, message?: string, operation = 'cli.output'): string {
  const envelope: SuccessEnvelope<T> = {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation),
  };
  return JSON.stringify(envelope);
}

/** Format any thrown value as an error envelope. */
export function formatError(error: unknown, operation = 'cli.output'): string {
  const envelope: ErrorEnvelope = {
    success: false,
    result: null,
    error: toSerializedError(error),
    _meta: createMeta(operation),
  };
  return JSON.stringify(envelope);
}
