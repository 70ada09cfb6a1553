/**
 * CLI tags command: replace the tags of a work item.
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

export function registerTagsCommand(program: Command): void {
  program
    .command('tags <id> [tags...]')
    .description('Replace the tags of a work item (the status must exist in the new flow)')
    .action(async (id: string, tags: string[]) => {
      await runCommand('items.tags', async () => {
        const orchestrator = await getOrchestrator();
        return orchestrator.updateTags(id, tags);
      });
    });
}
