/**
 * Completion cleanup for features that reached a terminal status.
 *
 * Child tasks carrying a retention tag (bug, hotfix, ... by default) are kept
 * for traceability; every other child task is deleted together with its
 * sections and dependency edges. Runs inside the caller's transaction and
 * without the graph lock: the transaction already serializes edge writes.
 *
 * A task whose deletion fails gets its sections and edges back, so it is
 * either gone completely or left as it was.
 */

import { toSerializedError, type SerializedError } from '../errors.js';
import { getLogger } from '../logger.js';
import { dependencyOverview } from '../dependencies/service.js';
import type { FlowStore } from '../workflow/store.js';
import {
  normalizeTags,
  type DependencyEdge,
  type Section,
  type WorkItem,
} from '../../types/work-item.js';
import type { WorkRepository } from '../../store/repository.js';

export interface CleanupResult {
  featureId: string;
  performed: boolean;
  tasksDeleted: number;
  deletedTaskIds: string[];
  tasksRetained: number;
  retainedTaskIds: string[];
  sectionsDeleted: number;
  dependenciesDeleted: number;
  /** Open tasks that were blocked only by deleted tasks. */
  unblockedTaskIds: string[];
  failures: Array<{ taskId: string; error: SerializedError }>;
  reason?: string;
}

function emptyResult(featureId: string, reason?: string): CleanupResult {
  return {
    featureId,
    performed: false,
    tasksDeleted: 0,
    deletedTaskIds: [],
    tasksRetained: 0,
    retainedTaskIds: [],
    sectionsDeleted: 0,
    dependenciesDeleted: 0,
    unblockedTaskIds: [],
    failures: [],
    ...(reason && { reason }),
  };
}

/** Whether a task carries any of the retention tags (case-insensitive). */
export function isRetained(task: WorkItem, retainTags: readonly string[]): boolean {
  const retain = new Set(normalizeTags(retainTags));
  return normalizeTags(task.tags).some((tag) => retain.has(tag));
}

async function restoreTask(
  tx: WorkRepository,
  taskId: string,
  sections: readonly Section[],
  edges: readonly DependencyEdge[],
): Promise<void> {
  await tx.deleteSections(taskId);
  for (const section of sections) {
    await tx.saveSection(section);
  }
  await tx.removeEdgesFor(taskId);
  await tx.addEdges(edges);
}

export async function runCompletionCleanup(
  tx: WorkRepository,
  feature: WorkItem,
  flows: FlowStore,
): Promise<CleanupResult> {
  const log = getLogger('cleanup');
  const settings = flows.cleanup;
  if (!settings.enabled) {
    return emptyResult(feature.id, 'Completion cleanup is disabled');
  }

  const tasks = (await tx.loadChildren(feature.id)).filter((child) => child.kind === 'task');
  const blockedBefore = new Set((await dependencyOverview(tx, flows)).blocked.map((b) => b.taskId));
  const result = emptyResult(feature.id);
  result.performed = true;

  for (const task of tasks) {
    if (isRetained(task, settings.retainTags)) {
      result.retainedTaskIds.push(task.id);
      continue;
    }
    const sections = await tx.loadSections(task.id);
    const edges = (await tx.loadEdges()).filter(
      (e) => e.fromTaskId === task.id || e.toTaskId === task.id,
    );
    try {
      const sectionCount = await tx.deleteSections(task.id);
      const edgeCount = await tx.removeEdgesFor(task.id);
      await tx.deleteItem(task.id);
      result.sectionsDeleted += sectionCount;
      result.dependenciesDeleted += edgeCount;
      result.deletedTaskIds.push(task.id);
    } catch (err) {
      log.warn({ featureId: feature.id, taskId: task.id, err }, 'Failed to delete task during cleanup');
      // A failed restore propagates and aborts the enclosing transaction.
      await restoreTask(tx, task.id, sections, edges);
      result.failures.push({ taskId: task.id, error: toSerializedError(err) });
    }
  }

  if (result.deletedTaskIds.length > 0) {
    result.unblockedTaskIds = (await dependencyOverview(tx, flows)).ready.filter((id) =>
      blockedBefore.has(id),
    );
  }
  result.tasksDeleted = result.deletedTaskIds.length;
  result.tasksRetained = result.retainedTaskIds.length;
  log.info(
    {
      featureId: feature.id,
      tasksDeleted: result.tasksDeleted,
      tasksRetained: result.tasksRetained,
      retainedTaskIds: result.retainedTaskIds,
      unblockedTaskIds: result.unblockedTaskIds,
    },
    'Completion cleanup finished',
  );
  return result;
}
