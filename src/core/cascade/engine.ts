/**
 * Cascade engine: propagates a child's status change up the hierarchy.
 *
 * Aggregation rules are matched per parent in class order (failure, success,
 * progress). A matching rule whose target differs from the parent's status is
 * turned into a trigger and run through the progression engine, so cascades
 * obey the same flow rules as direct requests. The walk stops at the root, at
 * the first parent that does not change, or after `auto_cascade.max_depth`
 * levels.
 *
 * Cascade problems never undo the originating transition: rejected moves are
 * reported as `skipped` events, unexpected errors as `failed` events plus a
 * degraded entry.
 */

import { WaypointError, toSerializedError, type SerializedError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { AppliedTransition, ProgressionEngine } from '../progression/engine.js';
import { isTerminal, isTerminalFailure, isTerminalSuccess, triggerFor } from '../workflow/flow.js';
import type { FlowStore } from '../workflow/store.js';
import {
  CLASS_ORDER,
  PREDICATE_CLASS,
  type AggregationPredicate,
  type AggregationRule,
  type Trigger,
} from '../workflow/types.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { WorkItem, WorkItemKind } from '../../types/work-item.js';
import type { WorkRepository } from '../../store/repository.js';
import { runCompletionCleanup, type CleanupResult } from './cleanup.js';

export type CascadeOutcome = 'applied' | 'skipped' | 'failed';

export interface CascadeEvent {
  itemId: string;
  kind: WorkItemKind;
  rule?: AggregationPredicate;
  trigger?: Trigger;
  previousStatus: string;
  targetStatus?: string;
  outcome: CascadeOutcome;
  reason: string;
  /** Tasks unblocked by the completion cleanup this event ran. */
  unblockedTaskIds: string[];
  cleanup?: CleanupResult;
}

export interface CascadeFailure {
  itemId: string;
  stage: 'cascade' | 'cleanup';
  error: SerializedError;
}

export interface CascadeReport {
  events: CascadeEvent[];
  degraded: CascadeFailure[];
}

/** First rule for the parent's kind that holds, checked in class order. */
export function matchRule(
  flows: FlowStore,
  rules: readonly AggregationRule[],
  parent: WorkItem,
  children: readonly WorkItem[],
): AggregationRule | null {
  if (children.length === 0) return null;
  const childFlow = (child: WorkItem) => flows.resolveFlow(child.kind, child.tags).flow;

  const holds = (rule: AggregationRule): boolean => {
    switch (rule.when) {
      case 'all_terminal_failure':
        return children.every((c) => isTerminalFailure(childFlow(c), c.status));
      case 'all_terminal_success':
        return children.every((c) => isTerminalSuccess(childFlow(c), c.status));
      case 'all_terminal':
        return children.every((c) => isTerminal(childFlow(c), c.status));
      case 'any_in_status': {
        const statuses = rule.statuses ?? [];
        return children.some((c) => statuses.includes(c.status));
      }
    }
  };

  for (const cls of CLASS_ORDER) {
    for (const rule of rules) {
      if (rule.parentKind !== parent.kind || PREDICATE_CLASS[rule.when] !== cls) continue;
      if (rule.from && !rule.from.includes(parent.status)) continue;
      if (holds(rule)) return rule;
    }
  }
  return null;
}

export class CascadeEngine {
  constructor(
    private readonly flows: FlowStore,
    private readonly progression: ProgressionEngine,
  ) {}

  /**
   * Evaluate the ancestors of `child` inside an open transaction.
   * Never throws; problems are reported in the returned events.
   */
  async evaluate(child: WorkItem, tx: WorkRepository): Promise<CascadeReport> {
    const report: CascadeReport = { events: [], degraded: [] };
    const { enabled, maxDepth } = this.flows.autoCascade;
    if (!enabled) return report;

    const log = getLogger('cascade');
    let current = child;
    for (let depth = 0; depth < maxDepth; depth++) {
      const parentId = current.parentId;
      if (parentId === undefined) break;
      let parent: WorkItem | null = null;
      try {
        parent = await tx.findItem(parentId);
        if (!parent) {
          throw new WaypointError(
            ExitCode.PARENT_NOT_FOUND,
            `Parent ${parentId} of ${current.id} not found`,
          );
        }
        const next = await this.step(parent, tx, report);
        if (!next) break;
        current = next;
      } catch (err) {
        const error =
          err instanceof WaypointError
            ? err.toSerialized()
            : new WaypointError(
                ExitCode.CASCADE_FAILED,
                `Cascade from ${current.id} failed: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err },
              ).toSerialized();
        log.warn({ itemId: parentId, err }, 'Cascade evaluation failed');
        report.events.push({
          itemId: parentId,
          kind: parent?.kind ?? 'feature',
          previousStatus: parent?.status ?? '',
          outcome: 'failed',
          reason: error.message,
          unblockedTaskIds: [],
        });
        report.degraded.push({ itemId: parentId, stage: 'cascade', error });
        break;
      }
    }
    return report;
  }

  /** One level of the walk. Returns the updated parent when the walk should continue. */
  private async step(
    parent: WorkItem,
    tx: WorkRepository,
    report: CascadeReport,
  ): Promise<WorkItem | null> {
    const log = getLogger('cascade');
    const children = await tx.loadChildren(parent.id);
    const rule = matchRule(this.flows, this.flows.aggregationRules, parent, children);
    if (!rule || rule.status === parent.status) return null;

    const base = {
      itemId: parent.id,
      kind: parent.kind,
      rule: rule.when,
      previousStatus: parent.status,
      targetStatus: rule.status,
      unblockedTaskIds: [],
    };

    const flow = this.progression.flowFor(parent);
    const trigger = triggerFor(flow, parent.status, rule.status);
    if (trigger === null) {
      const reason = `No transition from '${parent.status}' to '${rule.status}' in flow '${flow.name}'`;
      log.warn({ itemId: parent.id, rule: rule.when }, reason);
      report.events.push({ ...base, outcome: 'skipped', reason });
      return null;
    }

    let applied: AppliedTransition;
    try {
      applied = await this.progression.apply(parent, trigger, tx);
    } catch (err) {
      if (!(err instanceof WaypointError)) throw err;
      log.warn({ itemId: parent.id, trigger, code: err.code }, 'Cascade transition rejected');
      report.events.push({ ...base, trigger, outcome: 'skipped', reason: err.message });
      return null;
    }

    await tx.saveItem(applied.item);
    log.info(
      { itemId: parent.id, from: parent.status, to: applied.newStatus, rule: rule.when },
      'Cascade applied',
    );

    const event: CascadeEvent = {
      ...base,
      trigger,
      outcome: 'applied',
      reason: `Rule ${rule.when} matched`,
    };
    report.events.push(event);

    if (parent.kind === 'feature' && isTerminal(flow, applied.newStatus)) {
      try {
        event.cleanup = await runCompletionCleanup(tx, applied.item, this.flows);
        event.unblockedTaskIds = event.cleanup.unblockedTaskIds;
      } catch (err) {
        log.warn({ itemId: parent.id, err }, 'Completion cleanup failed');
        report.degraded.push({ itemId: parent.id, stage: 'cleanup', error: toSerializedError(err) });
      }
    }
    return applied.item;
  }
}
