/**
 * Workflow definition types.
 *
 * A flow is compiled once from configuration and never mutated afterwards; every
 * collection on it is exposed read-only.
 */

import type { WorkItemKind } from '../../types/work-item.js';

/** Triggers that move an item forward along its flow. */
export const FORWARD_TRIGGERS = ['start', 'complete'] as const;
export type ForwardTrigger = (typeof FORWARD_TRIGGERS)[number];

/** Triggers valid from any non-terminal status. */
export const EMERGENCY_TRIGGERS = ['cancel', 'block', 'hold'] as const;
export type EmergencyTrigger = (typeof EMERGENCY_TRIGGERS)[number];

/** Full trigger vocabulary. */
export const TRIGGERS = [...FORWARD_TRIGGERS, ...EMERGENCY_TRIGGERS, 'resume'] as const;
export type Trigger = (typeof TRIGGERS)[number];

/** Name of the fallback flow every kind must define. */
export const DEFAULT_FLOW = 'default';

/** Whether reaching a terminal status counts as success (unblocks dependents). */
export type TerminalOutcome = 'success' | 'failure';

/** A named, ordered workflow for one kind of work item. */
export interface FlowDefinition {
  readonly name: string;
  readonly kind: WorkItemKind;
  readonly entryStatus: string;
  readonly statuses: readonly string[];
  readonly terminalStatuses: ReadonlyMap<string, TerminalOutcome>;
  readonly transitions: ReadonlyMap<string, ReadonlyMap<ForwardTrigger, string>>;
  readonly emergencyTransitions: ReadonlyMap<EmergencyTrigger, string>;
  /** Emergency triggers explicitly allowed out of a terminal status. */
  readonly emergencyFromTerminal: ReadonlySet<EmergencyTrigger>;
}

/** One entry of the priority-ordered tag → flow list. */
export interface FlowMapping {
  readonly tags: readonly string[];
  readonly flow: string;
}

/** Aggregation predicates, evaluated over all children of a parent. */
export type AggregationPredicate =
  | 'all_terminal_failure'
  | 'all_terminal_success'
  | 'all_terminal'
  | 'any_in_status';

/** Evaluation class of a predicate; classes are checked failure → success → progress. */
export type AggregationClass = 'failure' | 'success' | 'progress';

export const PREDICATE_CLASS: Readonly<Record<AggregationPredicate, AggregationClass>> = {
  all_terminal_failure: 'failure',
  all_terminal_success: 'success',
  all_terminal: 'success',
  any_in_status: 'progress',
};

export const CLASS_ORDER: readonly AggregationClass[] = ['failure', 'success', 'progress'];

/** Declarative parent-status rule used by the cascade engine. */
export interface AggregationRule {
  readonly parentKind: Exclude<WorkItemKind, 'task'>;
  readonly when: AggregationPredicate;
  /** Child statuses for `any_in_status`. */
  readonly statuses?: readonly string[];
  /** Only applies while the parent is in one of these statuses. */
  readonly from?: readonly string[];
  readonly status: string;
}

export interface CleanupSettings {
  readonly enabled: boolean;
  readonly retainTags: readonly string[];
}

export interface AutoCascadeSettings {
  readonly enabled: boolean;
  readonly maxDepth: number;
}

/** Fully validated workflow configuration. */
export interface WorkflowConfig {
  readonly flows: ReadonlyMap<WorkItemKind, ReadonlyMap<string, FlowDefinition>>;
  readonly mappings: ReadonlyMap<WorkItemKind, readonly FlowMapping[]>;
  readonly aggregationRules: readonly AggregationRule[];
  readonly cleanup: CleanupSettings;
  readonly autoCascade: AutoCascadeSettings;
}

/** A flow chosen for an item, with the tags that selected it. */
export interface ResolvedFlow {
  readonly flow: FlowDefinition;
  /** Empty when the default flow was used. */
  readonly matchedTags: readonly string[];
}

/** Complete workflow path for display and progress tracking. */
export interface FlowPath {
  activeFlow: string;
  flowSequence: string[];
  currentPosition: number | null;
  matchedTags: string[];
  terminalStatuses: string[];
  emergencyTriggers: EmergencyTrigger[];
}

export function isTrigger(value: string): value is Trigger {
  return TRIGGERS.some((known) => known === value);
}

export function isEmergencyTrigger(value: string): value is EmergencyTrigger {
  return EMERGENCY_TRIGGERS.some((known) => known === value);
}

export function isForwardTrigger(value: string): value is ForwardTrigger {
  return FORWARD_TRIGGERS.some((known) => known === value);
}
