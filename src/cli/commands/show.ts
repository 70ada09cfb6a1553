/**
 * CLI show command.
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

export function registerShowCommand(program: Command): void {
  program
    .command('show <id>')
    .description('Show a work item with its flow path and sections')
    .action(async (id: string) => {
      await runCommand('items.show', async () => {
        const orchestrator = await getOrchestrator();
        const item = await orchestrator.getItem(id);
        return {
          item,
          flow: await orchestrator.getFlowPath(id),
          sections: await orchestrator.repository.loadSections(id),
        };
      });
    });
}
