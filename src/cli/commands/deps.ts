/**
 * CLI deps command for task dependencies.
 */

import { Command } from 'commander';
import { WaypointError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { DependencyPattern } from '../../types/work-item.js';
import { getOrchestrator } from '../context.js';
import { runCommand } from '../output.js';

const PATTERNS: readonly DependencyPattern[] = ['linear', 'fan-out', 'fan-in'];

function parsePattern(value: string): DependencyPattern {
  const pattern = PATTERNS.find((p) => p === value.toLowerCase());
  if (!pattern) {
    throw new WaypointError(ExitCode.INVALID_INPUT, `Unknown pattern: ${value}`, {
      fix: `Use one of: ${PATTERNS.join(', ')}`,
    });
  }
  return pattern;
}

/**
 * Register the deps command.
 */
export function registerDepsCommand(program: Command): void {
  const deps = program
    .command('deps')
    .description('Task dependencies: <from> must complete before <to> may start');

  deps
    .command('add <fromTaskId> <toTaskId>')
    .description('Add a blocking dependency')
    .action(async (fromTaskId: string, toTaskId: string) => {
      await runCommand('deps.add', async () => {
        const orchestrator = await getOrchestrator();
        return orchestrator.addDependency(fromTaskId, toTaskId);
      });
    });

  deps
    .command('batch <pattern> <taskIds...>')
    .description('Add dependencies by pattern: linear, fan-out, fan-in (all or nothing)')
    .action(async (pattern: string, taskIds: string[]) => {
      await runCommand('deps.batch', async () => {
        const orchestrator = await getOrchestrator();
        return orchestrator.addDependencyBatch(parsePattern(pattern), taskIds);
      });
    });

  deps
    .command('remove <fromTaskId> <toTaskId>')
    .description('Remove a dependency')
    .action(async (fromTaskId: string, toTaskId: string) => {
      await runCommand('deps.remove', async () => {
        const orchestrator = await getOrchestrator();
        await orchestrator.removeDependency(fromTaskId, toTaskId);
        return { fromTaskId, toTaskId, removed: true };
      });
    });

  deps
    .command('blocked [taskId]')
    .description('Whether a task is blocked, or every blocked task when no id is given')
    .action(async (taskId?: string) => {
      await runCommand('deps.blocked', async () => {
        const orchestrator = await getOrchestrator();
        if (taskId === undefined) {
          return { blocked: await orchestrator.listBlocked() };
        }
        return { taskId, blocked: await orchestrator.queryBlocked(taskId) };
      });
    });

  deps
    .command('ready')
    .description('Open tasks with no open blockers')
    .action(async () => {
      await runCommand('deps.ready', async () => {
        const orchestrator = await getOrchestrator();
        return { ready: await orchestrator.listReady() };
      });
    });

  deps
    .command('blockers <taskId>')
    .description('Open direct and transitive blockers of a task')
    .action(async (taskId: string) => {
      await runCommand('deps.blockers', async () => {
        const orchestrator = await getOrchestrator();
        return { taskId, ...(await orchestrator.getBlockers(taskId)) };
      });
    });
}
