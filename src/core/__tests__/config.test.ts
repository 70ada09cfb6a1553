/**
 * Tests for settings resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { defaultSettings, loadSettings } from '../config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { captureError } from './fixtures.js';

const ENV_KEYS = ['WAYPOINT_DIR', 'WAYPOINT_LOG_LEVEL', 'WAYPOINT_LOG_FILE', 'WAYPOINT_LOCK_RETRIES'];

describe('loadSettings', () => {
  let tempDir: string;
  const original = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  async function writeSettings(content: string): Promise<void> {
    await mkdir(join(tempDir, '.waypoint'), { recursive: true });
    await writeFile(join(tempDir, '.waypoint', 'settings.json'), content);
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'waypoint-config-test-'));
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of original) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  it('returns defaults when no settings file exists', async () => {
    expect(await loadSettings(tempDir)).toEqual(defaultSettings());
    expect(defaultSettings().lock).toEqual({ staleMs: 10_000, retries: 5 });
  });

  it('merges project settings over defaults', async () => {
    await writeSettings(JSON.stringify({ logging: { level: 'debug' } }));
    const settings = await loadSettings(tempDir);
    expect(settings.logging.level).toBe('debug');
    expect(settings.logging.maxFiles).toBe(5);
  });

  it('environment variables override the settings file', async () => {
    await writeSettings(JSON.stringify({ logging: { level: 'debug' }, lock: { retries: 1 } }));
    process.env['WAYPOINT_LOG_LEVEL'] = 'warn';
    process.env['WAYPOINT_LOCK_RETRIES'] = '9';
    const settings = await loadSettings(tempDir);
    expect(settings.logging.level).toBe('warn');
    expect(settings.lock.retries).toBe(9);
  });

  it('honors WAYPOINT_DIR', async () => {
    const custom = join(tempDir, 'state');
    await mkdir(custom, { recursive: true });
    await writeFile(join(custom, 'settings.json'), JSON.stringify({ lock: { staleMs: 500 } }));
    process.env['WAYPOINT_DIR'] = custom;
    expect((await loadSettings(tempDir)).lock.staleMs).toBe(500);
  });

  it('rejects malformed JSON', async () => {
    await writeSettings('{oops');
    const err = await captureError(() => loadSettings(tempDir));
    expect(err.code).toBe(ExitCode.CONFIG_ERROR);
  });

  it('rejects values outside the schema', async () => {
    process.env['WAYPOINT_LOG_LEVEL'] = 'loud';
    const err = await captureError(() => loadSettings(tempDir));
    expect(err.code).toBe(ExitCode.CONFIG_ERROR);
    expect(err.message).toMatch(/^Invalid settings: logging\.level: /);
  });
});
