/**
 * Tests for CLI argument parsing helpers.
 */

import { describe, it, expect } from 'vitest';
import { parseList } from '../output.js';
import { parseKind } from '../commands/add.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('parseList', () => {
  it('splits and trims comma-separated values', () => {
    expect(parseList('bug, ui,,critical ')).toEqual(['bug', 'ui', 'critical']);
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('parseKind', () => {
  it('accepts kinds case-insensitively', () => {
    expect(parseKind('Feature')).toBe('feature');
  });

  it('rejects unknown kinds', () => {
    expect(() => parseKind('epic')).toThrowError(
      expect.objectContaining({ code: ExitCode.INVALID_INPUT, message: 'Unknown kind: epic' }),
    );
  });
});
