/**
 * Tests for the work document file lock.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { toLockfileOptions, withLock } from '../lock.js';
import { ExitCode } from '../../types/exit-codes.js';
import { captureError } from '../../core/__tests__/fixtures.js';

describe('toLockfileOptions', () => {
  const noop = (): void => {};

  it('applies defaults for unset values', () => {
    expect(toLockfileOptions({}, noop)).toEqual({
      stale: 10_000,
      retries: { minTimeout: 100, maxTimeout: 1000, factor: 2, retries: 5 },
      realpath: false,
      onCompromised: noop,
    });
  });

  it('maps settings onto proper-lockfile options', () => {
    expect(toLockfileOptions({ staleMs: 4000, retries: 0 }, noop)).toMatchObject({
      stale: 4000,
      retries: { retries: 0 },
    });
  });
});

describe('withLock', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'waypoint-lock-test-'));
    filePath = join(tempDir, 'work.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('holds the lock for the duration of the callback and releases it after', async () => {
    const result = await withLock(filePath, async (lock) => {
      expect(lock.filePath).toBe(filePath);
      lock.assertHeld();
      expect((await stat(`${filePath}.lock`)).isDirectory()).toBe(true);
      return 'done';
    });

    expect(result).toBe('done');
    await expect(stat(`${filePath}.lock`)).rejects.toThrow();
  });

  it('releases the lock when the callback throws', async () => {
    await expect(
      withLock(filePath, async () => {
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');
    await expect(stat(`${filePath}.lock`)).rejects.toThrow();
  });

  it('fails with a lock timeout while another holder has the lock', async () => {
    await withLock(filePath, async () => {
      const err = await captureError(() => withLock(filePath, async () => 'never', { retries: 0 }));
      expect(err.code).toBe(ExitCode.LOCK_TIMEOUT);
      expect(err.message).toBe(`Failed to acquire lock: ${filePath}`);
    });
  });
});
