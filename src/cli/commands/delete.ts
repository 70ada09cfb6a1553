/**
 * CLI delete command.
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

export function registerDeleteCommand(program: Command): void {
  program
    .command('delete <id>')
    .alias('rm')
    .description('Delete a work item with its sections and dependencies')
    .action(async (id: string) => {
      await runCommand('items.delete', async () => {
        const orchestrator = await getOrchestrator();
        return orchestrator.deleteItem(id);
      });
    });
}
