#!/usr/bin/env node
/**
 * Waypoint CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadSettings } from '../core/config.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { getWaypointDirAbsolute } from '../core/paths.js';
import { registerAddCommand } from './commands/add.js';
import { registerDeleteCommand } from './commands/delete.js';
import { registerDepsCommand } from './commands/deps.js';
import { registerFlowCommand } from './commands/flow.js';
import { registerInitCommand } from './commands/init.js';
import { registerNextCommand } from './commands/next.js';
import { registerSectionCommand } from './commands/section.js';
import { registerShowCommand } from './commands/show.js';
import { registerTagsCommand } from './commands/tags.js';
import { registerTransitionCommand } from './commands/transition.js';

function getPackageVersion(): string {
  const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('waypoint')
  .description('Work-status orchestration for projects, features and tasks')
  .version(getPackageVersion());

registerInitCommand(program);
registerAddCommand(program);
registerShowCommand(program);
registerTransitionCommand(program);
registerNextCommand(program);
registerFlowCommand(program);
registerTagsCommand(program);
registerDeleteCommand(program);
registerSectionCommand(program);
registerDepsCommand(program);

// Initialize the pino logger before any command runs. If settings cannot be
// loaded the command still runs with the stderr fallback logger, and reports
// the settings problem itself when it needs them.
let loggerInitialized = false;
program.hook('preAction', async () => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  try {
    const settings = await loadSettings();
    initLogger(getWaypointDirAbsolute(), settings.logging);
  } catch (err) {
    getLogger('cli').warn({ err }, 'File logging unavailable');
  }
});

await program.parseAsync();
closeLogger();
