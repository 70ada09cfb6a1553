/**
 * Tests for path resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  getWaypointDir,
  getWaypointDirAbsolute,
  getWorkPath,
  resolveFlowConfigPath,
} from '../paths.js';
import { getBundledConfigPath } from '../workflow/store.js';

describe('paths', () => {
  const origDir = process.env['WAYPOINT_DIR'];
  const origConfig = process.env['WAYPOINT_CONFIG'];
  let tempDir: string;

  beforeEach(() => {
    delete process.env['WAYPOINT_DIR'];
    delete process.env['WAYPOINT_CONFIG'];
    tempDir = mkdtempSync(join(tmpdir(), 'waypoint-paths-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    if (origDir !== undefined) process.env['WAYPOINT_DIR'] = origDir;
    else delete process.env['WAYPOINT_DIR'];
    if (origConfig !== undefined) process.env['WAYPOINT_CONFIG'] = origConfig;
    else delete process.env['WAYPOINT_CONFIG'];
  });

  it('defaults to .waypoint under the working directory', () => {
    expect(getWaypointDir()).toBe('.waypoint');
    expect(getWaypointDirAbsolute('/projects/demo')).toBe('/projects/demo/.waypoint');
    expect(getWorkPath('/projects/demo')).toBe('/projects/demo/.waypoint/work.json');
  });

  it('respects WAYPOINT_DIR', () => {
    process.env['WAYPOINT_DIR'] = '/var/lib/waypoint';
    expect(getWaypointDirAbsolute('/projects/demo')).toBe('/var/lib/waypoint');
    expect(getWorkPath('/projects/demo')).toBe('/var/lib/waypoint/work.json');
  });

  it('uses the bundled workflow configuration until the project has its own', () => {
    expect(resolveFlowConfigPath(tempDir)).toBe(getBundledConfigPath());

    mkdirSync(join(tempDir, '.waypoint'));
    writeFileSync(join(tempDir, '.waypoint', 'config.yaml'), 'flows: {}\n');
    expect(resolveFlowConfigPath(tempDir)).toBe(join(tempDir, '.waypoint', 'config.yaml'));
  });

  it('resolves WAYPOINT_CONFIG against the working directory', () => {
    process.env['WAYPOINT_CONFIG'] = 'flows/custom.yaml';
    expect(resolveFlowConfigPath('/projects/demo')).toBe('/projects/demo/flows/custom.yaml');
  });
});
