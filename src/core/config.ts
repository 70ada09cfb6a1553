/**
 * Engine settings.
 *
 * Resolution priority: Environment vars > Project settings (.waypoint/settings.json) > Defaults
 *
 * Workflow definitions (flows, mappings, aggregation rules) live in the YAML
 * workflow configuration instead; see workflow/store.ts.
 */

import { z } from 'zod';
import { WaypointError } from './errors.js';
import { safeReadFile } from '../store/atomic.js';
import { formatZodIssues } from './zod-issues.js';
import { getSettingsPath } from './paths.js';
import { ExitCode } from '../types/exit-codes.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const SettingsSchema = z.object({
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  lock: z.object({
    staleMs: z.number().int().positive(),
    retries: z.number().int().min(0),
  }),
});

export type WaypointSettings = z.infer<typeof SettingsSchema>;

/** Default settings values. */
const DEFAULTS: WaypointSettings = {
  logging: {
    level: 'info',
    filePath: 'logs/waypoint.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  lock: {
    staleMs: 10_000,
    retries: 5,
  },
};

/** Environment variable to settings path mapping. */
const ENV_MAP: Record<string, string> = {
  WAYPOINT_LOG_LEVEL: 'logging.level',
  WAYPOINT_LOG_FILE: 'logging.filePath',
  WAYPOINT_LOCK_RETRIES: 'lock.retries',
};

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Tree, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isTree(next)) {
      current = next;
    } else {
      const created: Tree = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Tree, source: Tree): Tree {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isTree(sourceVal) && isTree(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Load and merge settings from all sources.
 * @throws {WaypointError} CONFIG_ERROR for unreadable or invalid settings
 */
export async function loadSettings(cwd?: string): Promise<WaypointSettings> {
  let merged: Tree = structuredClone(DEFAULTS);

  const path = getSettingsPath(cwd);
  const content = await safeReadFile(path);
  if (content !== null) {
    let projectSettings: unknown;
    try {
      projectSettings = JSON.parse(content);
    } catch (err) {
      throw new WaypointError(ExitCode.CONFIG_ERROR, `Invalid JSON in: ${path}`, { cause: err });
    }
    if (!isTree(projectSettings)) {
      throw new WaypointError(ExitCode.CONFIG_ERROR, `Settings must be a JSON object: ${path}`);
    }
    merged = deepMerge(merged, projectSettings);
  }

  for (const [envKey, settingPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, settingPath, parseEnvValue(envValue));
    }
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new WaypointError(
      ExitCode.CONFIG_ERROR,
      `Invalid settings: ${formatZodIssues(parsed.error).join('; ')}`,
      { fix: `Check ${path} and WAYPOINT_* environment variables` },
    );
  }
  return parsed.data;
}

/** Defaults, for display and `init`. */
export function defaultSettings(): WaypointSettings {
  return structuredClone(DEFAULTS);
}
