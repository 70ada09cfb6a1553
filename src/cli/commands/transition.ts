/**
 * CLI transition command: apply a trigger to a work item.
 */

import { Command } from 'commander';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';
import { parseKind } from './add.js';

export function registerTransitionCommand(program: Command): void {
  program
    .command('transition <id> <trigger>')
    .description('Apply a trigger (start, complete, cancel, block, hold, resume)')
    .option('-k, --kind <kind>', 'Expected kind of the item (defaults to its stored kind)')
    .action(async (id: string, trigger: string, opts: { kind?: string }) => {
      await runCommand(
        'status.transition',
        async () => {
          const orchestrator = await getOrchestrator();
          const kind =
            opts.kind !== undefined ? parseKind(opts.kind) : (await orchestrator.getItem(id)).kind;
          return orchestrator.requestTransition(id, kind, trigger);
        },
        (result) =>
          `${result.appliedChange.itemId}: ${result.appliedChange.previousStatus} -> ${result.appliedChange.newStatus}`,
      );
    });
}
