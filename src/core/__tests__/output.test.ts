/**
 * Tests for the JSON output envelopes.
 */

import { describe, it, expect } from 'vitest';
import { formatError, formatSuccess } from '../output.js';
import { WaypointError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('formatSuccess', () => {
  it('wraps the result with metadata', () => {
    const envelope = JSON.parse(formatSuccess({ id: 'T001' }, 'Created T001', 'items.add'));
    expect(envelope).toMatchObject({
      success: true,
      result: { id: 'T001' },
      message: 'Created T001',
      _meta: { operation: 'items.add' },
    });
    expect(typeof envelope._meta.requestId).toBe('string');
  });

  it('omits an empty message', () => {
    expect(JSON.parse(formatSuccess([], undefined, 'deps.ready'))).not.toHaveProperty('message');
  });
});

describe('formatError', () => {
  it('serializes engine errors with their code', () => {
    const err = new WaypointError(ExitCode.CYCLE_DETECTED, 'Adding T2 -> T1 would create a cycle', {
      details: { cycle: ['T2', 'T1', 'T2'] },
    });
    expect(JSON.parse(formatError(err, 'deps.add'))).toMatchObject({
      success: false,
      result: null,
      error: {
        code: 'E_CONFLICT_CYCLE_DETECTED',
        exitCode: 30,
        category: 'CONFLICT',
        message: 'Adding T2 -> T1 would create a cycle',
        retryable: false,
        details: { cycle: ['T2', 'T1', 'T2'] },
      },
    });
  });

  it('reports unknown errors as general errors', () => {
    expect(JSON.parse(formatError(new Error('disk full'))).error).toEqual({
      code: 'E_INTERNAL_GENERAL_ERROR',
      exitCode: 1,
      category: 'INTERNAL',
      message: 'disk full',
      retryable: false,
    });
  });
});
