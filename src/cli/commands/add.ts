/**
 * CLI add command.
 */

import { Command } from 'commander';
import { WaypointError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { WORK_ITEM_KINDS, isWorkItemKind, type WorkItemKind } from '../../types/work-item.js';
import { getOrchestrator } from '../context.js';
import { parseList, runCommand } from '../output.js';

interface AddOptions {
  kind: string;
  parent?: string;
  tags?: string;
  id?: string;
  verify?: boolean;
}

/** Validate a --kind value. */
export function parseKind(value: string): WorkItemKind {
  const kind = value.toLowerCase();
  if (!isWorkItemKind(kind)) {
    throw new WaypointError(ExitCode.INVALID_INPUT, `Unknown kind: ${value}`, {
      fix: `Use one of: ${WORK_ITEM_KINDS.join(', ')}`,
    });
  }
  return kind;
}

/**
 * Register the add command.
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add <title>')
    .description('Create a project, feature or task in the entry status of its flow')
    .option('-k, --kind <kind>', 'Kind: project, feature, task', 'task')
    .option('-p, --parent <id>', 'Parent id (feature for a task, project for a feature)')
    .option('-t, --tags <tags>', 'Comma-separated tags (select the flow)')
    .option('--id <id>', 'Explicit id instead of a generated one')
    .option('--verify', 'Require verification before completion')
    .action(async (title: string, opts: AddOptions) => {
      await runCommand(
        'items.add',
        async () => {
          const orchestrator = await getOrchestrator();
          return orchestrator.createItem({
            kind: parseKind(opts.kind),
            title,
            tags: parseList(opts.tags),
            ...(opts.parent !== undefined && { parentId: opts.parent }),
            ...(opts.id !== undefined && { id: opts.id }),
            requiresVerification: opts.verify === true,
          });
        },
        (item) => `Created ${item.kind} ${item.id} (${item.status})`,
      );
    });
}
