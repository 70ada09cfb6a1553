/**
 * Orchestration façade.
 *
 * Single entry point for status transitions, dependency management and the
 * item lifecycle. A transition runs under the lock of its ancestor chain (keyed
 * by the root item) inside one repository transaction, so the item's new
 * status, every cascaded parent update and any completion cleanup commit
 * together. Lock order is always chain, then graph, then transaction.
 */

import { WaypointError, toSerializedError } from '../errors.js';
import { getLogger } from '../logger.js';
import { GRAPH_LOCK_KEY, KeyedLock, chainLockKey } from '../locks.js';
import { CascadeEngine, type CascadeEvent, type CascadeFailure } from '../cascade/engine.js';
import { runCompletionCleanup, type CleanupResult } from '../cascade/cleanup.js';
import { DependencyService, unblockedBy, type DependencyOverview } from '../dependencies/service.js';
import { ProgressionEngine, type NextStatus } from '../progression/engine.js';
import { SectionVerificationGate, type VerificationGate } from '../verification/gate.js';
import { hasStatus, isTerminal, isTerminalSuccess } from '../workflow/flow.js';
import type { FlowStore } from '../workflow/store.js';
import type { FlowPath, Trigger } from '../workflow/types.js';
import { ExitCode } from '../../types/exit-codes.js';
import {
  PARENT_KIND,
  normalizeTags,
  type DependencyEdge,
  type DependencyPattern,
  type Section,
  type WorkItem,
  type WorkItemKind,
} from '../../types/work-item.js';
import type { WorkRepository } from '../../store/repository.js';
import { generateItemId } from './ids.js';

export interface AppliedChange {
  itemId: string;
  kind: WorkItemKind;
  previousStatus: string;
  newStatus: string;
  trigger: Trigger;
  flow: string;
}

/** Consolidated outcome of requestTransition. */
export interface TransitionResult {
  appliedChange: AppliedChange;
  /** Ancestor updates, bottom-up. */
  cascadeEvents: CascadeEvent[];
  /**
   * Tasks left without open blockers: by the transitioned task reaching
   * terminal success, or by completion cleanup deleting their blockers.
   */
  unblockedTaskIds: string[];
  /** Cleanup run because the transitioned item is a feature that became terminal. */
  cleanup?: CleanupResult;
  degraded: CascadeFailure[];
}

export interface CreateItemInput {
  kind: WorkItemKind;
  title: string;
  tags?: string[];
  parentId?: string;
  requiresVerification?: boolean;
  /** Explicit id; generated (P001, F001, T001...) when omitted. */
  id?: string;
}

export interface DeleteResult {
  itemId: string;
  sectionsDeleted: number;
  dependenciesDeleted: number;
}

export interface OrchestratorOptions {
  repository: WorkRepository;
  flows: FlowStore;
  /** Defaults to a SectionVerificationGate over `repository`. */
  gate?: VerificationGate;
  locks?: KeyedLock;
}

export class Orchestrator {
  readonly repository: WorkRepository;
  readonly flows: FlowStore;
  readonly progression: ProgressionEngine;
  readonly cascade: CascadeEngine;
  readonly dependencies: DependencyService;
  private readonly locks: KeyedLock;

  constructor(options: OrchestratorOptions) {
    this.repository = options.repository;
    this.flows = options.flows;
    this.locks = options.locks ?? new KeyedLock();
    this.progression = new ProgressionEngine(this.flows, {
      gate: options.gate ?? new SectionVerificationGate(this.repository),
    });
    this.cascade = new CascadeEngine(this.flows, this.progression);
    this.dependencies = new DependencyService(this.repository, this.flows, this.locks);
  }

  // ── Items ─────────────────────────────────────────────────────────

  /**
   * Create a work item in the entry status of its resolved flow.
   * @throws {WaypointError} INVALID_INPUT, PARENT_NOT_FOUND or INVALID_PARENT_TYPE
   */
  async createItem(input: CreateItemInput): Promise<WorkItem> {
    const title = input.title.trim();
    if (title.length === 0) {
      throw new WaypointError(ExitCode.INVALID_INPUT, 'Title is required');
    }
    const tags = normalizeTags(input.tags ?? []);

    const item = await this.repository.transaction(async (tx) => {
      if (input.parentId !== undefined) {
        const parent = await tx.findItem(input.parentId);
        if (!parent) {
          throw new WaypointError(ExitCode.PARENT_NOT_FOUND, `Parent not found: ${input.parentId}`);
        }
        const expected = PARENT_KIND[input.kind];
        if (parent.kind !== expected) {
          throw new WaypointError(
            ExitCode.INVALID_PARENT_TYPE,
            expected === null
              ? `A ${input.kind} cannot have a parent`
              : `The parent of a ${input.kind} must be a ${expected}; ${parent.id} is a ${parent.kind}`,
          );
        }
      }

      const existing = (await tx.listItems()).map((i) => i.id);
      if (input.id !== undefined && existing.includes(input.id)) {
        throw new WaypointError(ExitCode.INVALID_INPUT, `Work item already exists: ${input.id}`);
      }
      const { flow } = this.flows.resolveFlow(input.kind, tags);
      const now = new Date().toISOString();
      const created: WorkItem = {
        id: input.id ?? generateItemId(input.kind, existing),
        kind: input.kind,
        title,
        status: flow.entryStatus,
        tags,
        ...(input.parentId !== undefined && { parentId: input.parentId }),
        requiresVerification: input.requiresVerification ?? false,
        createdAt: now,
        updatedAt: now,
      };
      await tx.saveItem(created);
      return created;
    });

    getLogger('orchestration').info(
      { itemId: item.id, kind: item.kind, status: item.status },
      'Work item created',
    );
    return item;
  }

  async getItem(id: string, kind?: WorkItemKind): Promise<WorkItem> {
    const item = await this.repository.loadItem(id);
    if (kind !== undefined) this.requireKind(item, kind);
    return item;
  }

  /**
   * Replace an item's tags. The status must still belong to the flow the new
   * tags resolve to.
   * @throws {WaypointError} STATUS_NOT_IN_FLOW
   */
  async updateTags(id: string, tags: readonly string[]): Promise<WorkItem> {
    return this.withChain(id, (tx) => this.retag(tx, id, normalizeTags(tags)));
  }

  /**
   * Delete an item with its sections and dependency edges.
   * @throws {WaypointError} NOT_FOUND or HAS_CHILDREN
   */
  async deleteItem(id: string): Promise<DeleteResult> {
    const result = await this.withChain(id, (tx) => this.remove(tx, id), true);
    getLogger('orchestration').info({ ...result }, 'Work item deleted');
    return result;
  }

  /** Add or replace the section with `title` on an item. */
  async setSection(entityId: string, title: string, content: string): Promise<Section> {
    return this.repository.transaction(async (tx) => {
      await tx.loadItem(entityId);
      const sections = await tx.loadSections(entityId);
      const existing = sections.find((s) => s.title === title);
      const ordinal = sections.reduce((max, s) => Math.max(max, s.ordinal), 0) + 1;
      const section: Section = existing
        ? { ...existing, content }
        : { id: `${entityId}:${ordinal}`, entityId, title, content, ordinal };
      await tx.saveSection(section);
      return section;
    });
  }

  // ── Status ────────────────────────────────────────────────────────

  /**
   * Validate and apply `trigger`, then propagate the change to ancestors.
   * @throws {WaypointError} NOT_FOUND, INVALID_KIND or any progression error;
   *   nothing is persisted in that case
   */
  async requestTransition(id: string, kind: WorkItemKind, trigger: string): Promise<TransitionResult> {
    const result = await this.withChain(id, async (tx) => {
      const item = this.requireKind(await tx.loadItem(id), kind);
      const applied = await this.progression.apply(item, trigger, tx);
      await tx.saveItem(applied.item);

      const flow = this.progression.flowFor(applied.item);
      const unblocked =
        item.kind === 'task' && isTerminalSuccess(flow, applied.newStatus)
          ? await unblockedBy(tx, this.flows, id)
          : [];

      let cleanup: CleanupResult | undefined;
      const degraded: CascadeFailure[] = [];
      if (item.kind === 'feature' && isTerminal(flow, applied.newStatus)) {
        try {
          cleanup = await runCompletionCleanup(tx, applied.item, this.flows);
        } catch (err) {
          getLogger('orchestration').warn({ itemId: id, err }, 'Completion cleanup failed');
          degraded.push({ itemId: id, stage: 'cleanup', error: toSerializedError(err) });
        }
      }

      const report = await this.cascade.evaluate(applied.item, tx);
      const unblockedTaskIds = [
        ...new Set([
          ...unblocked,
          ...(cleanup?.unblockedTaskIds ?? []),
          ...report.events.flatMap((event) => event.unblockedTaskIds),
        ]),
      ];
      const transition: TransitionResult = {
        appliedChange: {
          itemId: id,
          kind: item.kind,
          previousStatus: applied.previousStatus,
          newStatus: applied.newStatus,
          trigger: applied.trigger,
          flow: applied.flow,
        },
        cascadeEvents: report.events,
        unblockedTaskIds,
        ...(cleanup && { cleanup }),
        degraded: [...degraded, ...report.degraded],
      };
      return transition;
    });

    getLogger('orchestration').info(
      {
        itemId: id,
        from: result.appliedChange.previousStatus,
        to: result.appliedChange.newStatus,
        trigger: result.appliedChange.trigger,
        cascades: result.cascadeEvents.length,
        unblocked: result.unblockedTaskIds,
      },
      'Transition applied',
    );
    return result;
  }

  async getNextStatus(id: string, kind: WorkItemKind): Promise<NextStatus> {
    const item = await this.getItem(id, kind);
    return this.progression.getNextStatus(item, this.repository);
  }

  async getFlowPath(id: string): Promise<FlowPath> {
    const item = await this.repository.loadItem(id);
    return this.flows.getFlowPath(item.kind, item.tags, item.status);
  }

  // ── Dependencies ──────────────────────────────────────────────────

  async addDependency(fromTaskId: string, toTaskId: string): Promise<DependencyEdge> {
    return this.dependencies.addEdge(fromTaskId, toTaskId);
  }

  async addDependencyBatch(
    pattern: DependencyPattern,
    taskIds: readonly string[],
  ): Promise<DependencyEdge[]> {
    return this.dependencies.addBatch(pattern, taskIds);
  }

  async removeDependency(fromTaskId: string, toTaskId: string): Promise<void> {
    await this.dependencies.removeEdge(fromTaskId, toTaskId);
  }

  async queryBlocked(taskId: string): Promise<boolean> {
    return this.dependencies.isBlocked(taskId);
  }

  async getBlockers(taskId: string): Promise<{ direct: string[]; transitive: string[] }> {
    return {
      direct: await this.dependencies.blockers(taskId),
      transitive: await this.dependencies.transitiveBlockers(taskId),
    };
  }

  async listBlocked(): Promise<DependencyOverview['blocked']> {
    return this.dependencies.blockedTasks();
  }

  async listReady(): Promise<string[]> {
    return this.dependencies.readyTasks();
  }

  // ── Internals ─────────────────────────────────────────────────────

  private requireKind(item: WorkItem, kind: WorkItemKind): WorkItem {
    if (item.kind !== kind) {
      throw new WaypointError(
        ExitCode.INVALID_KIND,
        `${item.id} is a ${item.kind}, not a ${kind}`,
        { details: { itemId: item.id, expected: kind, actual: item.kind } },
      );
    }
    return item;
  }

  /** Topmost ancestor of an item (the item itself for roots). */
  private async rootOf(id: string): Promise<string> {
    let current = await this.repository.loadItem(id);
    const seen = new Set([current.id]);
    while (current.parentId !== undefined) {
      const parent = await this.repository.findItem(current.parentId);
      if (!parent || seen.has(parent.id)) break;
      seen.add(parent.id);
      current = parent;
    }
    return current.id;
  }

  /** Run `fn` in a transaction under the chain lock (and the graph lock when asked). */
  private async withChain<T>(
    id: string,
    fn: (tx: WorkRepository) => Promise<T>,
    graph = false,
  ): Promise<T> {
    const root = await this.rootOf(id);
    const inTransaction = () => this.repository.transaction(fn);
    return this.locks.run(chainLockKey(root), () =>
      graph ? this.locks.run(GRAPH_LOCK_KEY, inTransaction) : inTransaction(),
    );
  }

  private async retag(tx: WorkRepository, id: string, tags: string[]): Promise<WorkItem> {
    const item = await tx.loadItem(id);
    const { flow } = this.flows.resolveFlow(item.kind, tags);
    if (!hasStatus(flow, item.status)) {
      throw new WaypointError(
        ExitCode.STATUS_NOT_IN_FLOW,
        `Status '${item.status}' of ${id} is not part of flow '${flow.name}' selected by the new tags`,
        { details: { itemId: id, status: item.status, flow: flow.name, tags } },
      );
    }
    const updated: WorkItem = { ...item, tags, updatedAt: new Date().toISOString() };
    await tx.saveItem(updated);
    return updated;
  }

  private async remove(tx: WorkRepository, id: string): Promise<DeleteResult> {
    await tx.loadItem(id);
    const children = await tx.loadChildren(id);
    if (children.length > 0) {
      throw new WaypointError(
        ExitCode.HAS_CHILDREN,
        `${id} has ${children.length} child item(s)`,
        { fix: 'Delete the children first', details: { children: children.map((c) => c.id) } },
      );
    }
    const sectionsDeleted = await tx.deleteSections(id);
    const dependenciesDeleted = await tx.removeEdgesFor(id);
    await tx.deleteItem(id);
    return { itemId: id, sectionsDeleted, dependenciesDeleted };
  }
}
