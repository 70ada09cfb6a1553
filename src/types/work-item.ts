/**
 * Work item type definitions: projects, features, tasks and their sections.
 */

/** Kinds of work item, outermost first. */
export const WORK_ITEM_KINDS = ['project', 'feature', 'task'] as const;

/** Work item kind in the containment hierarchy. */
export type WorkItemKind = (typeof WORK_ITEM_KINDS)[number];

/** The kind a parent of each kind must have (null = must be a root). */
export const PARENT_KIND: Readonly<Record<WorkItemKind, WorkItemKind | null>> = {
  project: null,
  feature: 'project',
  task: 'feature',
};

/** A project, feature or task. */
export interface WorkItem {
  id: string;
  kind: WorkItemKind;
  title: string;
  status: string;
  /** Set semantics; compared case-insensitively. */
  tags: string[];
  parentId?: string;
  requiresVerification: boolean;
  /** Status held before an emergency move into a holding status; restored by `resume`. */
  previousStatus?: string;
  createdAt: string;
  updatedAt: string;
}

/** A titled block of content attached to a work item. */
export interface Section {
  id: string;
  entityId: string;
  title: string;
  content: string;
  ordinal: number;
}

/** Dependency edge type. Only blocking edges are modelled. */
export type DependencyType = 'BLOCKS';

/** A directed edge: `fromTaskId` must succeed before `toTaskId` may start. */
export interface DependencyEdge {
  fromTaskId: string;
  toTaskId: string;
  type: DependencyType;
  createdAt: string;
}

/** Batch dependency patterns. */
export type DependencyPattern = 'linear' | 'fan-out' | 'fan-in';

/** Check whether a string is a known work item kind. */
export function isWorkItemKind(value: string): value is WorkItemKind {
  return WORK_ITEM_KINDS.some((known) => known === value);
}

/** Lowercased, de-duplicated copy of a tag list, original order kept. */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const normalized = tag.trim().toLowerCase();
    if (normalized.length === 0 || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(normalized);
  }
  return result;
}
