/**
 * Workflow configuration schema and compiler.
 *
 * The raw YAML document is checked structurally with zod, then compiled into
 * frozen FlowDefinitions. Semantic problems (unknown statuses, missing entry
 * status, transitions out of terminal statuses...) are collected and reported
 * together as a single CONFIG_ERROR; nothing is partially loaded.
 */

import { z } from 'zod';
import { WaypointError } from '../errors.js';
import { formatZodIssues } from '../zod-issues.js';
import { ExitCode } from '../../types/exit-codes.js';
import { WORK_ITEM_KINDS, normalizeTags, type WorkItemKind } from '../../types/work-item.js';
import {
  DEFAULT_FLOW,
  EMERGENCY_TRIGGERS,
  FORWARD_TRIGGERS,
  type AggregationRule,
  type EmergencyTrigger,
  type FlowDefinition,
  type FlowMapping,
  type ForwardTrigger,
  type TerminalOutcome,
  type WorkflowConfig,
} from './types.js';

// ── Schemas ──────────────────────────────────────────────────────────

const StatusNameSchema = z
  .string()
  .regex(/^[a-z][a-z0-9-]*$/, 'status names are lowercase kebab-case');

const ForwardMapSchema = z
  .object({
    start: StatusNameSchema.optional(),
    complete: StatusNameSchema.optional(),
  })
  .strict();

const EmergencyMapSchema = z
  .object({
    cancel: StatusNameSchema.optional(),
    block: StatusNameSchema.optional(),
    hold: StatusNameSchema.optional(),
  })
  .strict();

export const FlowSchema = z
  .object({
    entry: StatusNameSchema.optional(),
    statuses: z.array(StatusNameSchema).min(1),
    terminal: z.record(StatusNameSchema, z.enum(['success', 'failure'])).default({}),
    transitions: z.record(StatusNameSchema, ForwardMapSchema).default({}),
    emergency: EmergencyMapSchema.default({}),
    emergency_from_terminal: z.array(z.enum(EMERGENCY_TRIGGERS)).default([]),
  })
  .strict();
export type RawFlow = z.infer<typeof FlowSchema>;

const FlowMappingSchema = z
  .object({
    tags: z.array(z.string().min(1)).min(1),
    flow: z.string().min(1),
  })
  .strict();

const ParentKindSchema = z.enum(['project', 'feature']);

const RuleBase = {
  parent: ParentKindSchema,
  status: StatusNameSchema,
  from: z.array(StatusNameSchema).min(1).optional(),
};

export const AggregationRuleSchema = z.discriminatedUnion('when', [
  z.object({ ...RuleBase, when: z.literal('all_terminal_failure') }).strict(),
  z.object({ ...RuleBase, when: z.literal('all_terminal_success') }).strict(),
  z.object({ ...RuleBase, when: z.literal('all_terminal') }).strict(),
  z
    .object({
      ...RuleBase,
      when: z.literal('any_in_status'),
      statuses: z.array(StatusNameSchema).min(1),
    })
    .strict(),
]);

export const DEFAULT_RETAIN_TAGS = ['bug', 'bugfix', 'fix', 'hotfix', 'critical'] as const;

export const WorkflowConfigSchema = z.object({
  version: z.string().optional(),
  flows: z
    .object({
      project: z.record(z.string().min(1), FlowSchema),
      feature: z.record(z.string().min(1), FlowSchema),
      task: z.record(z.string().min(1), FlowSchema),
    })
    .strict(),
  flow_mappings: z
    .object({
      project: z.array(FlowMappingSchema).default([]),
      feature: z.array(FlowMappingSchema).default([]),
      task: z.array(FlowMappingSchema).default([]),
    })
    .strict()
    .default({}),
  aggregation_rules: z.array(AggregationRuleSchema).default([]),
  completion_cleanup: z
    .object({
      enabled: z.boolean().default(true),
      retain_tags: z.array(z.string().min(1)).default([...DEFAULT_RETAIN_TAGS]),
    })
    .default({}),
  auto_cascade: z
    .object({
      enabled: z.boolean().default(true),
      max_depth: z.number().int().min(0).max(2).default(2),
    })
    .default({}),
});
export type RawWorkflowConfig = z.infer<typeof WorkflowConfigSchema>;

// ── Compilation ──────────────────────────────────────────────────────

function compileFlow(
  kind: WorkItemKind,
  name: string,
  raw: RawFlow,
  problems: string[],
): FlowDefinition {
  const where = `flows.${kind}.${name}`;
  const statuses = new Set(raw.statuses);
  const requireStatus = (status: string, context: string): void => {
    if (!statuses.has(status)) {
      problems.push(`${where}: ${context} '${status}' is not one of its statuses`);
    }
  };

  if (statuses.size !== raw.statuses.length) {
    problems.push(`${where}: statuses contain duplicates`);
  }

  let entryStatus = raw.entry ?? '';
  if (raw.entry === undefined) {
    problems.push(`${where}: no entry status defined`);
    entryStatus = raw.statuses[0] ?? '';
  } else {
    requireStatus(raw.entry, 'entry status');
  }

  const terminalStatuses = new Map<string, TerminalOutcome>();
  for (const [status, outcome] of Object.entries(raw.terminal)) {
    requireStatus(status, 'terminal status');
    terminalStatuses.set(status, outcome);
  }
  if (terminalStatuses.size === 0) {
    problems.push(`${where}: at least one terminal status is required`);
  }
  if (terminalStatuses.has(entryStatus)) {
    problems.push(`${where}: entry status '${entryStatus}' cannot be terminal`);
  }

  const transitions = new Map<string, ReadonlyMap<ForwardTrigger, string>>();
  for (const [from, triggers] of Object.entries(raw.transitions)) {
    requireStatus(from, 'transition source');
    if (terminalStatuses.has(from)) {
      problems.push(`${where}: terminal status '${from}' cannot have forward transitions`);
    }
    const out = new Map<ForwardTrigger, string>();
    for (const trigger of FORWARD_TRIGGERS) {
      const target = triggers[trigger];
      if (target === undefined) continue;
      requireStatus(target, `target of ${from} --${trigger}->`);
      out.set(trigger, target);
    }
    transitions.set(from, out);
  }

  const emergencyTransitions = new Map<EmergencyTrigger, string>();
  for (const trigger of EMERGENCY_TRIGGERS) {
    const target = raw.emergency[trigger];
    if (target === undefined) continue;
    requireStatus(target, `emergency '${trigger}' target`);
    emergencyTransitions.set(trigger, target);
  }

  const emergencyFromTerminal = new Set<EmergencyTrigger>();
  for (const trigger of raw.emergency_from_terminal) {
    if (!emergencyTransitions.has(trigger)) {
      problems.push(`${where}: emergency_from_terminal lists '${trigger}' which has no emergency transition`);
    }
    emergencyFromTerminal.add(trigger);
  }

  return Object.freeze({
    name,
    kind,
    entryStatus,
    statuses: Object.freeze([...raw.statuses]),
    terminalStatuses,
    transitions,
    emergencyTransitions,
    emergencyFromTerminal,
  });
}

function compileRule(
  raw: RawWorkflowConfig['aggregation_rules'][number],
  index: number,
  flows: ReadonlyMap<WorkItemKind, ReadonlyMap<string, FlowDefinition>>,
  problems: string[],
): AggregationRule {
  const where = `aggregation_rules[${index}]`;
  const parentFlows = [...(flows.get(raw.parent)?.values() ?? [])];
  const knownParentStatus = (status: string): boolean =>
    parentFlows.some((flow) => flow.statuses.includes(status));

  if (!knownParentStatus(raw.status)) {
    problems.push(`${where}: status '${raw.status}' is not used by any ${raw.parent} flow`);
  }
  for (const status of raw.from ?? []) {
    if (!knownParentStatus(status)) {
      problems.push(`${where}: from status '${status}' is not used by any ${raw.parent} flow`);
    }
  }

  const childKind: WorkItemKind = raw.parent === 'project' ? 'feature' : 'task';
  const childFlows = [...(flows.get(childKind)?.values() ?? [])];
  if (raw.when === 'any_in_status') {
    for (const status of raw.statuses) {
      if (!childFlows.some((flow) => flow.statuses.includes(status))) {
        problems.push(`${where}: child status '${status}' is not used by any ${childKind} flow`);
      }
    }
  }

  return Object.freeze({
    parentKind: raw.parent,
    when: raw.when,
    status: raw.status,
    ...(raw.from && { from: Object.freeze([...raw.from]) }),
    ...(raw.when === 'any_in_status' && { statuses: Object.freeze([...raw.statuses]) }),
  });
}

/**
 * Validate a parsed YAML document and compile it into a WorkflowConfig.
 *
 * @param input  - Parsed YAML (unknown shape)
 * @param source - File path or label used in error messages
 * @throws {WaypointError} CONFIG_ERROR listing every problem found
 */
export function compileWorkflowConfig(input: unknown, source = 'workflow config'): WorkflowConfig {
  const parsed = WorkflowConfigSchema.safeParse(input);
  if (!parsed.success) {
    const problems = formatZodIssues(parsed.error);
    throw new WaypointError(
      ExitCode.CONFIG_ERROR,
      `Invalid workflow configuration in ${source}:\n  ${problems.join('\n  ')}`,
      { details: { source, problems } },
    );
  }
  const raw = parsed.data;
  const problems: string[] = [];

  const flows = new Map<WorkItemKind, ReadonlyMap<string, FlowDefinition>>();
  for (const kind of WORK_ITEM_KINDS) {
    const byName = new Map<string, FlowDefinition>();
    for (const [name, rawFlow] of Object.entries(raw.flows[kind])) {
      byName.set(name, compileFlow(kind, name, rawFlow, problems));
    }
    if (!byName.has(DEFAULT_FLOW)) {
      problems.push(`flows.${kind}: a '${DEFAULT_FLOW}' flow is required`);
    }
    flows.set(kind, byName);
  }

  const mappings = new Map<WorkItemKind, readonly FlowMapping[]>();
  for (const kind of WORK_ITEM_KINDS) {
    const list = raw.flow_mappings[kind].map((mapping, index) => {
      if (!flows.get(kind)?.has(mapping.flow)) {
        problems.push(`flow_mappings.${kind}[${index}]: unknown ${kind} flow '${mapping.flow}'`);
      }
      return Object.freeze({ tags: Object.freeze(normalizeTags(mapping.tags)), flow: mapping.flow });
    });
    mappings.set(kind, Object.freeze(list));
  }

  const aggregationRules = raw.aggregation_rules.map((rule, index) =>
    compileRule(rule, index, flows, problems),
  );

  if (problems.length > 0) {
    throw new WaypointError(
      ExitCode.CONFIG_ERROR,
      `Invalid workflow configuration in ${source}:\n  ${problems.join('\n  ')}`,
      { details: { source, problems } },
    );
  }

  return Object.freeze({
    flows,
    mappings,
    aggregationRules: Object.freeze(aggregationRules),
    cleanup: Object.freeze({
      enabled: raw.completion_cleanup.enabled,
      retainTags: Object.freeze(normalizeTags(raw.completion_cleanup.retain_tags)),
    }),
    autoCascade: Object.freeze({
      enabled: raw.auto_cascade.enabled,
      maxDepth: raw.auto_cascade.max_depth,
    }),
  });
}
