/**
 * Dependency service: persisted blocking edges between tasks.
 *
 * Mutations hold the graph lock and run inside a repository transaction, so a
 * rejected edge or batch leaves the stored edge list exactly as it was. The
 * read helpers take a repository argument so the progression and cascade code
 * can query the state of an open transaction.
 */

import { WaypointError } from '../errors.js';
import { getLogger } from '../logger.js';
import { GRAPH_LOCK_KEY, KeyedLock } from '../locks.js';
import { isTerminal, isTerminalSuccess } from '../workflow/flow.js';
import type { FlowStore } from '../workflow/store.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { DependencyEdge, DependencyPattern, WorkItem } from '../../types/work-item.js';
import type { WorkRepository } from '../../store/repository.js';
import { DependencyGraph, expandPattern, toDependencyEdges, type EdgeSpec } from './graph.js';

/** Whether an item sits in a terminal-success status of its own resolved flow. */
export function isResolved(flows: FlowStore, item: WorkItem): boolean {
  return isTerminalSuccess(flows.resolveFlow(item.kind, item.tags).flow, item.status);
}

function isOpen(flows: FlowStore, item: WorkItem): boolean {
  return !isTerminal(flows.resolveFlow(item.kind, item.tags).flow, item.status);
}

async function loadGraph(repo: WorkRepository): Promise<DependencyGraph> {
  return DependencyGraph.fromEdges(await repo.loadEdges());
}

async function loadAll(repo: WorkRepository, ids: readonly string[]): Promise<WorkItem[]> {
  const items: WorkItem[] = [];
  for (const id of ids) {
    const item = await repo.findItem(id);
    if (item) items.push(item);
  }
  return items;
}

/** Direct predecessors of a task that have not reached terminal success. */
export async function openBlockers(
  repo: WorkRepository,
  flows: FlowStore,
  taskId: string,
): Promise<WorkItem[]> {
  const graph = await loadGraph(repo);
  const predecessors = await loadAll(repo, graph.predecessors(taskId));
  return predecessors.filter((item) => !isResolved(flows, item));
}

/**
 * Direct successors of `taskId` that are not terminal themselves and whose
 * predecessors are now all terminal-success.
 */
export async function unblockedBy(
  repo: WorkRepository,
  flows: FlowStore,
  taskId: string,
): Promise<string[]> {
  const graph = await loadGraph(repo);
  const result: string[] = [];
  for (const successor of await loadAll(repo, graph.successors(taskId))) {
    if (!isOpen(flows, successor)) continue;
    const predecessors = await loadAll(repo, graph.predecessors(successor.id));
    if (predecessors.every((p) => isResolved(flows, p))) {
      result.push(successor.id);
    }
  }
  return result;
}

/** Blocked/ready partition of the open tasks. */
export interface DependencyOverview {
  blocked: Array<{ taskId: string; blockers: string[] }>;
  ready: string[];
}

/** Partition every open task into blocked and ready. */
export async function dependencyOverview(
  repo: WorkRepository,
  flows: FlowStore,
): Promise<DependencyOverview> {
  const graph = await loadGraph(repo);
  const items = await repo.listItems();
  const tasks = items.filter((item) => item.kind === 'task' && isOpen(flows, item));
  const byId = new Map(items.map((item) => [item.id, item]));

  const overview: DependencyOverview = { blocked: [], ready: [] };
  for (const task of tasks) {
    const open = graph.predecessors(task.id).filter((id) => {
      const blocker = byId.get(id);
      return blocker !== undefined && !isResolved(flows, blocker);
    });
    if (open.length > 0) {
      overview.blocked.push({ taskId: task.id, blockers: open });
    } else {
      overview.ready.push(task.id);
    }
  }
  return overview;
}

export class DependencyService {
  constructor(
    private readonly repository: WorkRepository,
    private readonly flows: FlowStore,
    private readonly locks: KeyedLock = new KeyedLock(),
  ) {}

  /**
   * Add `fromTaskId` BLOCKS `toTaskId`.
   * @throws {WaypointError} NOT_FOUND, INVALID_KIND, CYCLE_DETECTED or DUPLICATE_EDGE
   */
  async addEdge(fromTaskId: string, toTaskId: string): Promise<DependencyEdge> {
    const [edge] = await this.persist([{ fromTaskId, toTaskId }]);
    if (!edge) {
      throw new WaypointError(ExitCode.GENERAL_ERROR, 'Dependency was not recorded');
    }
    return edge;
  }

  /**
   * Add a batch of edges expanded from a pattern. All or nothing.
   * @throws {WaypointError} INVALID_INPUT for fewer than two ids, or any addEdge error
   */
  async addBatch(pattern: DependencyPattern, taskIds: readonly string[]): Promise<DependencyEdge[]> {
    return this.persist(expandPattern(pattern, taskIds), pattern);
  }

  /**
   * Remove a single edge.
   * @throws {WaypointError} NOT_FOUND if the edge does not exist
   */
  async removeEdge(fromTaskId: string, toTaskId: string): Promise<void> {
    await this.locks.run(GRAPH_LOCK_KEY, () =>
      this.repository.transaction(async (tx) => {
        const removed = await tx.removeEdges([{ fromTaskId, toTaskId }]);
        if (removed === 0) {
          throw new WaypointError(
            ExitCode.NOT_FOUND,
            `No dependency ${fromTaskId} -> ${toTaskId}`,
          );
        }
      }),
    );
    getLogger('dependencies').info({ fromTaskId, toTaskId }, 'Dependency removed');
  }

  /** Whether any direct predecessor has not reached terminal success. */
  async isBlocked(taskId: string): Promise<boolean> {
    await this.requireTask(this.repository, taskId);
    return (await openBlockers(this.repository, this.flows, taskId)).length > 0;
  }

  async unblockedBy(taskId: string): Promise<string[]> {
    return unblockedBy(this.repository, this.flows, taskId);
  }

  /** Ids of the open direct blockers of a task. */
  async blockers(taskId: string): Promise<string[]> {
    await this.requireTask(this.repository, taskId);
    return (await openBlockers(this.repository, this.flows, taskId)).map((item) => item.id);
  }

  /** Every upstream task, nearest first, that has not reached terminal success. */
  async transitiveBlockers(taskId: string): Promise<string[]> {
    await this.requireTask(this.repository, taskId);
    const graph = await loadGraph(this.repository);
    const upstream = await loadAll(this.repository, graph.ancestors(taskId));
    return upstream.filter((item) => !isResolved(this.flows, item)).map((item) => item.id);
  }

  /** Partition every open task into blocked and ready. */
  async overview(): Promise<DependencyOverview> {
    return dependencyOverview(this.repository, this.flows);
  }

  async blockedTasks(): Promise<DependencyOverview['blocked']> {
    return (await this.overview()).blocked;
  }

  async readyTasks(): Promise<string[]> {
    return (await this.overview()).ready;
  }

  async listEdges(): Promise<DependencyEdge[]> {
    return this.repository.loadEdges();
  }

  private async persist(specs: EdgeSpec[], pattern?: DependencyPattern): Promise<DependencyEdge[]> {
    const edges = await this.locks.run(GRAPH_LOCK_KEY, () =>
      this.repository.transaction(async (tx) => {
        for (const id of new Set(specs.flatMap((s) => [s.fromTaskId, s.toTaskId]))) {
          await this.requireTask(tx, id);
        }
        // Throws before anything is written.
        (await loadGraph(tx)).withEdges(specs);
        const stamped = toDependencyEdges(specs);
        await tx.addEdges(stamped);
        return stamped;
      }),
    );
    getLogger('dependencies').info({ pattern, count: edges.length }, 'Dependencies added');
    return edges;
  }

  private async requireTask(repo: WorkRepository, id: string): Promise<WorkItem> {
    const item = await repo.findItem(id);
    if (!item) {
      throw new WaypointError(ExitCode.NOT_FOUND, `Task not found: ${id}`);
    }
    if (item.kind !== 'task') {
      throw new WaypointError(
        ExitCode.INVALID_KIND,
        `Dependencies link tasks only; ${id} is a ${item.kind}`,
      );
    }
    return item;
  }
}
