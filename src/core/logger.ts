/**
 * pino logging for the engine and the CLI.
 *
 * One root logger per process, writing to `.waypoint/logs/` through pino-roll
 * (size and daily rotation, bounded retention). Each engine component logs
 * through a child bound to its subsystem name. stdout carries command output,
 * so before initLogger runs, library use and tests get a stderr logger whose
 * level comes from WAYPOINT_LOG_LEVEL.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import type { WaypointSettings } from './config.js';

/** Components that log; becomes the `subsystem` field of every line. */
export type LogSubsystem =
  | 'cascade'
  | 'cleanup'
  | 'cli'
  | 'dependencies'
  | 'init'
  | 'orchestration'
  | 'progression'
  | 'store'
  | 'verification'
  | 'workflow';

export type LoggingSettings = WaypointSettings['logging'];

const FALLBACK_LEVEL = 'warn';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/** A pino level name, or the fallback level for anything else. */
export function resolveLogLevel(value: string | undefined): string {
  if (value === undefined) return FALLBACK_LEVEL;
  return value in pino.levels.values || value === 'silent' ? value : FALLBACK_LEVEL;
}

function loggerOptions(level: string): pino.LoggerOptions {
  return {
    level,
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param dataDir - Absolute path to the .waypoint directory; a relative
 *   `filePath` is resolved against it
 */
export function initLogger(dataDir: string, settings: LoggingSettings): pino.Logger {
  const dest = isAbsolute(settings.filePath) ? settings.filePath : join(dataDir, settings.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(settings.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: settings.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(loggerOptions(settings.level), transport);
  return rootLogger;
}

/** Child logger for one engine component. Safe to call before initLogger. */
export function getLogger(subsystem: LogSubsystem): pino.Logger {
  if (rootLogger) {
    return rootLogger.child({ subsystem });
  }
  fallbackLogger ??= pino(
    loggerOptions(resolveLogLevel(process.env['WAYPOINT_LOG_LEVEL'])),
    pino.destination(2),
  );
  return fallbackLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
