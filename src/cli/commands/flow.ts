/**
 * CLI flow command: show the workflow path resolved for a work item.
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

export function registerFlowCommand(program: Command): void {
  program
    .command('flow <id>')
    .description('Show the flow resolved from the item tags and its position in it')
    .action(async (id: string) => {
      await runCommand('status.flow', async () => {
        const orchestrator = await getOrchestrator();
        return orchestrator.getFlowPath(id);
      });
    });
}
