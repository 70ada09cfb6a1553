/**
 * Path resolution for the project data directory.
 *
 * Environment variables:
 *   WAYPOINT_DIR    - Project data directory (default: .waypoint)
 *   WAYPOINT_CONFIG - Workflow configuration file (default: <data dir>/config.yaml)
 */

import { existsSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { getBundledConfigPath } from './workflow/store.js';

/**
 * Get the project data directory (relative).
 * Respects WAYPOINT_DIR, defaults to ".waypoint".
 */
export function getWaypointDir(): string {
  return process.env['WAYPOINT_DIR'] ?? '.waypoint';
}

/**
 * Get the absolute path to the project data directory.
 */
export function getWaypointDirAbsolute(cwd?: string): string {
  const dir = getWaypointDir();
  if (isAbsolute(dir)) {
    return dir;
  }
  return resolve(cwd ?? process.cwd(), dir);
}

/** Path of the work document (items, sections, dependencies). */
export function getWorkPath(cwd?: string): string {
  return join(getWaypointDirAbsolute(cwd), 'work.json');
}

/** Path of the engine settings file. */
export function getSettingsPath(cwd?: string): string {
  return join(getWaypointDirAbsolute(cwd), 'settings.json');
}

/** Path of the project's own workflow configuration file. */
export function getProjectFlowConfigPath(cwd?: string): string {
  const override = process.env['WAYPOINT_CONFIG'];
  if (override) {
    return isAbsolute(override) ? override : resolve(cwd ?? process.cwd(), override);
  }
  return join(getWaypointDirAbsolute(cwd), 'config.yaml');
}

/**
 * Workflow configuration to load: the project's file when it exists,
 * the bundled default otherwise. WAYPOINT_CONFIG is always honored.
 */
export function resolveFlowConfigPath(cwd?: string): string {
  const projectPath = getProjectFlowConfigPath(cwd);
  if (process.env['WAYPOINT_CONFIG'] || existsSync(projectPath)) {
    return projectPath;
  }
  return getBundledConfigPath();
}
