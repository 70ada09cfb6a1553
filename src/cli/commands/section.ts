/**
 * CLI section command: set a titled section on a work item.
 *
 * The `Verification` section holds the acceptance criteria the verification
 * gate checks, e.g.
 *   waypoint section T001 Verification '[{"criteria":"tests pass","pass":true}]'
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

export function registerSectionCommand(program: Command): void {
  program
    .command('section <id> <title> <content>')
    .description('Add or replace a titled section on a work item')
    .action(async (id: string, title: string, content: string) => {
      await runCommand('items.section', async () => {
        const orchestrator = await getOrchestrator();
        return orchestrator.setSection(id, title, content);
      });
    });
}
