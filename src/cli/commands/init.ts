/**
 * CLI init command - project initialization.
 *
 * Thin handler: parse args -> call core -> format output.
 */

import { Command } from 'commander';
import { initProject } from '../../core/init.js';
import { runCommand } from '../output.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .waypoint/ with the default workflow configuration')
    .option('--force', 'Overwrite existing configuration and settings')
    .action(async (opts: { force?: boolean }) => {
      await runCommand('admin.init', () => initProject(undefined, { force: opts.force === true }));
    });
}
