/**
 * Cross-process lock on the work document, using proper-lockfile.
 *
 * proper-lockfile keeps `<file>.lock` fresh while it is held. If the lock goes
 * stale anyway (a stalled event loop, a suspended laptop) another process may
 * take it over; the holder is then told through `onCompromised` and must not
 * write. `HeldLock.assertHeld()` is that check.
 */

import lockfile, { type LockOptions as LockfileOptions } from 'proper-lockfile';
import type { WaypointSettings } from '../core/config.js';
import { WaypointError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

/** Lock tuning, as configured under `lock` in settings.json. */
export type LockOptions = Partial<WaypointSettings['lock']>;

/** Handle passed to the body of withLock. */
export interface HeldLock {
  readonly filePath: string;
  /** @throws {WaypointError} LOCK_TIMEOUT once the lock has been lost */
  assertHeld(): void;
}

const RETRY_BACKOFF = {
  minTimeout: 100,
  maxTimeout: 1000,
  factor: 2,
};

/** proper-lockfile options for the given settings. */
export function toLockfileOptions(
  options: LockOptions,
  onCompromised: (err: Error) => void,
): LockfileOptions {
  return {
    stale: options.staleMs ?? 10_000,
    retries: { ...RETRY_BACKOFF, retries: options.retries ?? 5 },
    realpath: false,
    onCompromised,
  };
}

/**
 * Run `fn` while holding an exclusive lock on `filePath`.
 * The lock is released when `fn` settles, unless it was already lost.
 * @throws {WaypointError} LOCK_TIMEOUT when the lock cannot be acquired
 */
export async function withLock<T>(
  filePath: string,
  fn: (lock: HeldLock) => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  let lost: Error | null = null;
  const onCompromised = (err: Error): void => {
    lost = err;
    getLogger('store').error({ filePath, err }, 'Work document lock compromised');
  };

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(filePath, toLockfileOptions(options, onCompromised));
  } catch (err) {
    throw new WaypointError(ExitCode.LOCK_TIMEOUT, `Failed to acquire lock: ${filePath}`, {
      fix: 'Another waypoint process may be writing to this file. Wait and retry.',
      cause: err,
    });
  }

  const held: HeldLock = {
    filePath,
    assertHeld: () => {
      if (lost !== null) {
        throw new WaypointError(ExitCode.LOCK_TIMEOUT, `Lost the lock on ${filePath}`, {
          fix: 'Raise lock.staleMs in .waypoint/settings.json and retry.',
          cause: lost,
        });
      }
    },
  };

  try {
    return await fn(held);
  } finally {
    if (lost === null) {
      await release();
    }
  }
}
