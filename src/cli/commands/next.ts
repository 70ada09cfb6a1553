/**
 * CLI next command: recommend the next status of a work item.
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

export function registerNextCommand(program: Command): void {
  program
    .command('next <id>')
    .description('Recommend the next status of a work item')
    .action(async (id: string) => {
      await runCommand('status.next', async () => {
        const orchestrator = await getOrchestrator();
        const item = await orchestrator.getItem(id);
        return orchestrator.getNextStatus(id, item.kind);
      });
    });
}
