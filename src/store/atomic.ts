/**
 * Atomic file write operations using write-file-atomic.
 * Writes go to a temp file that is renamed over the target, so readers see
 * either the old document or the new one, never a torn write.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { WaypointError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new WaypointError(ExitCode.FILE_ERROR, `Atomic write failed: ${filePath}`, {
      cause: err,
    });
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw new WaypointError(ExitCode.FILE_ERROR, `Failed to read: ${filePath}`, { cause: err });
  }
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number },
): Promise<void> {
  const json = JSON.stringify(data, null, options?.indent ?? 2) + '\n';
  await atomicWrite(filePath, json);
}
