/**
 * Project initialization: creates `.waypoint/` with a workflow configuration,
 * engine settings and an empty work document.
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { atomicWriteJson } from '../store/atomic.js';
import { emptyWorkDocument } from '../store/work-document.js';
import { defaultSettings } from './config.js';
import { getLogger } from './logger.js';
import { getProjectFlowConfigPath, getSettingsPath, getWaypointDirAbsolute, getWorkPath } from './paths.js';
import { FlowStore, getBundledConfigPath } from './workflow/store.js';

export interface InitOptions {
  /** Overwrite existing configuration and settings files. */
  force?: boolean;
}

export interface InitResult {
  dataDir: string;
  created: string[];
  skipped: string[];
}

export async function initProject(cwd?: string, options: InitOptions = {}): Promise<InitResult> {
  const dataDir = getWaypointDirAbsolute(cwd);
  await mkdir(dataDir, { recursive: true });
  const result: InitResult = { dataDir, created: [], skipped: [] };

  const configPath = getProjectFlowConfigPath(cwd);
  if (options.force || !existsSync(configPath)) {
    await copyFile(getBundledConfigPath(), configPath);
    result.created.push(configPath);
  } else {
    // Fail early on a broken existing configuration.
    FlowStore.load(configPath);
    result.skipped.push(configPath);
  }

  const settingsPath = getSettingsPath(cwd);
  if (options.force || !existsSync(settingsPath)) {
    await atomicWriteJson(settingsPath, defaultSettings());
    result.created.push(settingsPath);
  } else {
    result.skipped.push(settingsPath);
  }

  const workPath = getWorkPath(cwd);
  if (!existsSync(workPath)) {
    await atomicWriteJson(workPath, emptyWorkDocument());
    result.created.push(workPath);
  } else {
    result.skipped.push(workPath);
  }

  getLogger('init').info({ dataDir, created: result.created }, 'Project initialized');
  return result;
}
