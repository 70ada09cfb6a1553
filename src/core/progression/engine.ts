/**
 * Status progression engine.
 *
 * Recommends the next status of a work item and validates a trigger against
 * the item's resolved flow. `apply` computes the transition but does not
 * persist it; callers save the returned item inside their own transaction.
 */

import { WaypointError } from '../errors.js';
import { getLogger } from '../logger.js';
import { openBlockers } from '../dependencies/service.js';
import {
  forwardOptions,
  hasStatus,
  holdingStatuses,
  isTerminal,
  isTerminalSuccess,
  type ForwardOption,
} from '../workflow/flow.js';
import type { FlowStore } from '../workflow/store.js';
import {
  TRIGGERS,
  isEmergencyTrigger,
  isForwardTrigger,
  isTrigger,
  type FlowDefinition,
  type Trigger,
} from '../workflow/types.js';
import type { VerificationGate } from '../verification/gate.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { WorkItem } from '../../types/work-item.js';
import type { WorkRepository } from '../../store/repository.js';

/** Recommendation returned by getNextStatus. */
export type NextStatus =
  | { type: 'ready'; flow: string; status: string; trigger: Trigger }
  | { type: 'multiple'; flow: string; options: ForwardOption[] }
  | { type: 'terminal'; flow: string; status: string }
  | { type: 'blocked'; flow: string; status: string; blockers: string[] }
  | { type: 'none'; flow: string; status: string; reason: string };

/** A validated, not yet persisted transition. */
export interface AppliedTransition {
  /** The item with its new status, previousStatus and updatedAt. */
  item: WorkItem;
  previousStatus: string;
  newStatus: string;
  trigger: Trigger;
  flow: string;
}

export interface ProgressionOptions {
  /** Consulted before items with requiresVerification complete. Absent = never satisfied. */
  gate?: VerificationGate;
}

export class ProgressionEngine {
  constructor(
    private readonly flows: FlowStore,
    private readonly options: ProgressionOptions = {},
  ) {}

  /** Flow resolved from the item's tags, checked to still contain its status. */
  flowFor(item: WorkItem): FlowDefinition {
    const { flow } = this.flows.resolveFlow(item.kind, item.tags);
    if (!hasStatus(flow, item.status)) {
      throw new WaypointError(
        ExitCode.STATUS_NOT_IN_FLOW,
        `Status '${item.status}' of ${item.id} is not part of the ${item.kind} flow '${flow.name}'`,
        { details: { itemId: item.id, status: item.status, flow: flow.name } },
      );
    }
    return flow;
  }

  /** Recommend the next status. Read-only. */
  async getNextStatus(item: WorkItem, repo: WorkRepository): Promise<NextStatus> {
    const flow = this.flowFor(item);
    if (isTerminal(flow, item.status)) {
      return { type: 'terminal', flow: flow.name, status: item.status };
    }

    if (item.kind === 'task') {
      const blockers = await openBlockers(repo, this.flows, item.id);
      if (blockers.length > 0) {
        return {
          type: 'blocked',
          flow: flow.name,
          status: item.status,
          blockers: blockers.map((b) => b.id),
        };
      }
    }

    if (holdingStatuses(flow).has(item.status) && item.previousStatus !== undefined) {
      return { type: 'ready', flow: flow.name, status: item.previousStatus, trigger: 'resume' };
    }

    const options = forwardOptions(flow, item.status);
    const targets = new Set(options.map((o) => o.status));
    const [first] = options;
    if (!first) {
      return {
        type: 'none',
        flow: flow.name,
        status: item.status,
        reason: `No forward transition out of '${item.status}'`,
      };
    }
    if (targets.size === 1) {
      return { type: 'ready', flow: flow.name, status: first.status, trigger: first.trigger };
    }
    return { type: 'multiple', flow: flow.name, options };
  }

  /**
   * Validate `trigger` for `item` and compute the resulting status.
   *
   * @param repo - Repository (or open transaction) used for dependency and verification reads
   * @throws {WaypointError} STATUS_NOT_IN_FLOW, INVALID_TRIGGER, TERMINAL_STATE,
   *   DEPENDENCY_BLOCKED or VERIFICATION_REQUIRED
   */
  async apply(item: WorkItem, trigger: string, repo: WorkRepository): Promise<AppliedTransition> {
    const flow = this.flowFor(item);
    if (!isTrigger(trigger)) {
      throw new WaypointError(ExitCode.INVALID_TRIGGER, `Unknown trigger: ${trigger}`, {
        fix: `Valid triggers: ${TRIGGERS.join(', ')}`,
      });
    }
    const current = item.status;

    if (isTerminal(flow, current)) {
      if (!isEmergencyTrigger(trigger) || !flow.emergencyFromTerminal.has(trigger)) {
        throw new WaypointError(
          ExitCode.TERMINAL_STATE,
          `${item.id} is in terminal status '${current}'; '${trigger}' is not allowed`,
          { details: { itemId: item.id, status: current, trigger } },
        );
      }
      const target = flow.emergencyTransitions.get(trigger);
      if (target === undefined || target === current) {
        throw new WaypointError(
          ExitCode.TERMINAL_STATE,
          `${item.id} is already '${current}'`,
          { details: { itemId: item.id, status: current, trigger } },
        );
      }
      return this.transition(item, flow, trigger, target);
    }

    if (isEmergencyTrigger(trigger)) {
      const target = flow.emergencyTransitions.get(trigger);
      if (target === undefined) {
        throw new WaypointError(
          ExitCode.INVALID_TRIGGER,
          `Flow '${flow.name}' has no '${trigger}' transition`,
        );
      }
      if (target === current) {
        throw new WaypointError(
          ExitCode.TERMINAL_STATE,
          `${item.id} is already '${current}'`,
          { details: { itemId: item.id, status: current, trigger } },
        );
      }
      return this.transition(item, flow, trigger, target);
    }

    if (trigger === 'resume') {
      const restore = item.previousStatus;
      if (!holdingStatuses(flow).has(current) || restore === undefined) {
        throw new WaypointError(
          ExitCode.INVALID_TRIGGER,
          `${item.id} is not on hold or blocked; nothing to resume`,
        );
      }
      if (!hasStatus(flow, restore)) {
        throw new WaypointError(
          ExitCode.STATUS_NOT_IN_FLOW,
          `Cannot resume ${item.id}: '${restore}' is not part of flow '${flow.name}'`,
        );
      }
      return this.transition(item, flow, trigger, restore);
    }

    const target = isForwardTrigger(trigger) ? flow.transitions.get(current)?.get(trigger) : undefined;
    if (target === undefined) {
      const valid = forwardOptions(flow, current).map((o) => o.trigger);
      throw new WaypointError(
        ExitCode.INVALID_TRIGGER,
        `No '${trigger}' transition from '${current}' in flow '${flow.name}'`,
        {
          fix: valid.length > 0 ? `Valid triggers from '${current}': ${valid.join(', ')}` : undefined,
          details: { itemId: item.id, status: current, trigger, flow: flow.name },
        },
      );
    }

    if (trigger === 'start' && item.kind === 'task') {
      const blockers = await openBlockers(repo, this.flows, item.id);
      if (blockers.length > 0) {
        const ids = blockers.map((b) => b.id);
        throw new WaypointError(
          ExitCode.DEPENDENCY_BLOCKED,
          `${item.id} is blocked by ${ids.join(', ')}`,
          { details: { itemId: item.id, blockers: ids } },
        );
      }
    }

    if (item.requiresVerification && (trigger === 'complete' || isTerminalSuccess(flow, target))) {
      const satisfied = this.options.gate
        ? await this.options.gate.allCriteriaSatisfied(item.id)
        : false;
      if (!satisfied) {
        throw new WaypointError(
          ExitCode.VERIFICATION_REQUIRED,
          `${item.id} requires verification before it can complete`,
          {
            fix: "Record passing criteria in the item's Verification section",
            details: { itemId: item.id },
          },
        );
      }
    }

    return this.transition(item, flow, trigger, target);
  }

  private transition(
    item: WorkItem,
    flow: FlowDefinition,
    trigger: Trigger,
    target: string,
  ): AppliedTransition {
    const next: WorkItem = { ...item, status: target, updatedAt: new Date().toISOString() };
    const holding = holdingStatuses(flow);
    if (isEmergencyTrigger(trigger) && holding.has(target)) {
      // Moving between holding statuses keeps the original resume point.
      next.previousStatus = holding.has(item.status) && item.previousStatus !== undefined
        ? item.previousStatus
        : item.status;
    } else {
      delete next.previousStatus;
    }

    getLogger('progression').debug(
      { itemId: item.id, flow: flow.name, from: item.status, to: target, trigger },
      'Transition validated',
    );
    return { item: next, previousStatus: item.status, newStatus: target, trigger, flow: flow.name };
  }
}
