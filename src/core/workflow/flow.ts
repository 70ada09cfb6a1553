/**
 * Read-only queries over a compiled FlowDefinition.
 */

import type { EmergencyTrigger, FlowDefinition, ForwardTrigger } from './types.js';
import { FORWARD_TRIGGERS } from './types.js';

export function hasStatus(flow: FlowDefinition, status: string): boolean {
  return flow.statuses.includes(status);
}

export function isTerminal(flow: FlowDefinition, status: string): boolean {
  return flow.terminalStatuses.has(status);
}

export function isTerminalSuccess(flow: FlowDefinition, status: string): boolean {
  return flow.terminalStatuses.get(status) === 'success';
}

export function isTerminalFailure(flow: FlowDefinition, status: string): boolean {
  return flow.terminalStatuses.get(status) === 'failure';
}

/**
 * Non-terminal emergency targets (e.g. `blocked`, `on-hold`).
 * Items parked here leave with `resume`.
 */
export function holdingStatuses(flow: FlowDefinition): Set<string> {
  const result = new Set<string>();
  for (const target of flow.emergencyTransitions.values()) {
    if (!isTerminal(flow, target)) result.add(target);
  }
  return result;
}

/** A forward move available from a status. */
export interface ForwardOption {
  trigger: ForwardTrigger;
  status: string;
}

/** Forward transitions out of a status, in trigger vocabulary order. */
export function forwardOptions(flow: FlowDefinition, status: string): ForwardOption[] {
  const out = flow.transitions.get(status);
  if (!out) return [];
  const options: ForwardOption[] = [];
  for (const trigger of FORWARD_TRIGGERS) {
    const target = out.get(trigger);
    if (target !== undefined) options.push({ trigger, status: target });
  }
  return options;
}

/** Distinct forward target statuses out of a status. */
export function forwardTargets(flow: FlowDefinition, status: string): string[] {
  return [...new Set(forwardOptions(flow, status).map((o) => o.status))];
}

/**
 * Find a trigger that moves an item from `from` to `to`.
 * Forward transitions are preferred over emergency ones.
 */
export function triggerFor(
  flow: FlowDefinition,
  from: string,
  to: string,
): ForwardTrigger | EmergencyTrigger | null {
  const forward = forwardOptions(flow, from).find((o) => o.status === to);
  if (forward) return forward.trigger;
  for (const [trigger, target] of flow.emergencyTransitions) {
    if (target === to) return trigger;
  }
  return null;
}
