/**
 * Tests for the logger helpers and the pre-init fallback logger.
 */

import { describe, it, expect } from 'vitest';
import { bytesToSizeString, getLogger, resolveLogLevel } from '../logger.js';

describe('bytesToSizeString', () => {
  it('picks the largest whole unit', () => {
    expect(bytesToSizeString(10 * 1024 * 1024)).toBe('10m');
    expect(bytesToSizeString(2 * 1024 * 1024 * 1024)).toBe('2g');
    expect(bytesToSizeString(1536)).toBe('1k');
    expect(bytesToSizeString(512)).toBe('512');
  });
});

describe('resolveLogLevel', () => {
  it('accepts pino level names and silent', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to warn for unset or unknown values', () => {
    expect(resolveLogLevel(undefined)).toBe('warn');
    expect(resolveLogLevel('loud')).toBe('warn');
  });
});

describe('getLogger', () => {
  it('binds the subsystem and uses WAYPOINT_LOG_LEVEL before init', () => {
    const log = getLogger('cascade');
    expect(log.bindings()).toMatchObject({ subsystem: 'cascade' });
    expect(log.level).toBe('silent');
  });
});
