/**
 * Dependency graph over task ids.
 *
 * Arena layout: node ids live in one array and are addressed by index; edges
 * are index pairs with per-node forward and backward adjacency lists. The graph
 * is immutable: `withEdges` builds a new graph and leaves the receiver as it was,
 * so a rejected batch never changes anything.
 */

import { WaypointError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { DependencyEdge, DependencyPattern } from '../../types/work-item.js';

/** A proposed edge, before it is stamped and persisted. */
export interface EdgeSpec {
  fromTaskId: string;
  toTaskId: string;
}

export class DependencyGraph {
  private readonly nodes: string[] = [];
  private readonly index = new Map<string, number>();
  private readonly edges: Array<[from: number, to: number]> = [];
  private readonly out: number[][] = [];
  private readonly in: number[][] = [];

  private constructor() {}

  /** Build a graph from persisted edges (assumed acyclic). */
  static fromEdges(edges: readonly EdgeSpec[]): DependencyGraph {
    const graph = new DependencyGraph();
    for (const edge of edges) {
      graph.link(edge.fromTaskId, edge.toTaskId);
    }
    return graph;
  }

  get size(): { nodes: number; edges: number } {
    return { nodes: this.nodes.length, edges: this.edges.length };
  }

  hasEdge(fromTaskId: string, toTaskId: string): boolean {
    const from = this.index.get(fromTaskId);
    const to = this.index.get(toTaskId);
    if (from === undefined || to === undefined) return false;
    return (this.out[from] ?? []).includes(to);
  }

  /** Direct predecessors (blockers) of a task. */
  predecessors(taskId: string): string[] {
    const node = this.index.get(taskId);
    if (node === undefined) return [];
    return (this.in[node] ?? []).map((i) => this.idAt(i));
  }

  /** Direct successors (tasks blocked by) of a task. */
  successors(taskId: string): string[] {
    const node = this.index.get(taskId);
    if (node === undefined) return [];
    return (this.out[node] ?? []).map((i) => this.idAt(i));
  }

  /** All edges as id pairs, in insertion order. */
  edgeList(): EdgeSpec[] {
    return this.edges.map(([from, to]) => ({ fromTaskId: this.idAt(from), toTaskId: this.idAt(to) }));
  }

  /**
   * Whether `target` is reachable from `start` by following edges forward.
   * Iterative DFS, O(V+E).
   */
  reaches(start: string, target: string): boolean {
    if (start === target) return true;
    const from = this.index.get(start);
    const goal = this.index.get(target);
    if (from === undefined || goal === undefined) return false;

    const visited = new Uint8Array(this.nodes.length);
    const stack = [from];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === goal) return true;
      if (visited[current]) continue;
      visited[current] = 1;
      for (const next of this.out[current] ?? []) {
        if (!visited[next]) stack.push(next);
      }
    }
    return false;
  }

  /** Adding from → to closes a cycle when `from` is reachable from `to`. */
  wouldCreateCycle(fromTaskId: string, toTaskId: string): boolean {
    return this.reaches(toTaskId, fromTaskId);
  }

  /**
   * Path `to → … → from` that the proposed edge would close, for error reporting.
   * Empty when no cycle would form.
   */
  cyclePath(fromTaskId: string, toTaskId: string): string[] {
    if (fromTaskId === toTaskId) return [fromTaskId, toTaskId];
    const start = this.index.get(toTaskId);
    const goal = this.index.get(fromTaskId);
    if (start === undefined || goal === undefined) return [];

    const parent = new Map<number, number>();
    const queue = [start];
    const seen = new Set([start]);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      if (current === goal) {
        const path = [this.idAt(current)];
        let step = parent.get(current);
        while (step !== undefined) {
          path.unshift(this.idAt(step));
          step = parent.get(step);
        }
        return [fromTaskId, ...path];
      }
      for (const next of this.out[current] ?? []) {
        if (seen.has(next)) continue;
        seen.add(next);
        parent.set(next, current);
        queue.push(next);
      }
    }
    return [];
  }

  /**
   * New graph with `specs` added, checked edge by edge in order.
   * @throws {WaypointError} CYCLE_DETECTED or DUPLICATE_EDGE; the receiver is unchanged
   */
  withEdges(specs: readonly EdgeSpec[]): DependencyGraph {
    const next = DependencyGraph.fromEdges(this.edgeList());
    for (const { fromTaskId, toTaskId } of specs) {
      if (next.hasEdge(fromTaskId, toTaskId)) {
        throw new WaypointError(
          ExitCode.DUPLICATE_EDGE,
          `Dependency already exists: ${fromTaskId} blocks ${toTaskId}`,
          { details: { fromTaskId, toTaskId } },
        );
      }
      if (next.wouldCreateCycle(fromTaskId, toTaskId)) {
        const cycle = next.cyclePath(fromTaskId, toTaskId);
        throw new WaypointError(
          ExitCode.CYCLE_DETECTED,
          `Adding ${fromTaskId} -> ${toTaskId} would create a cycle: ${cycle.join(' -> ')}`,
          { details: { fromTaskId, toTaskId, cycle } },
        );
      }
      next.link(fromTaskId, toTaskId);
    }
    return next;
  }

  /** Upstream tasks of `taskId` (transitively), nearest first. */
  ancestors(taskId: string): string[] {
    const start = this.index.get(taskId);
    if (start === undefined) return [];
    const result: string[] = [];
    const seen = new Set([start]);
    const queue = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const prev of this.in[current] ?? []) {
        if (seen.has(prev)) continue;
        seen.add(prev);
        result.push(this.idAt(prev));
        queue.push(prev);
      }
    }
    return result;
  }

  private node(id: string): number {
    const existing = this.index.get(id);
    if (existing !== undefined) return existing;
    const created = this.nodes.length;
    this.nodes.push(id);
    this.index.set(id, created);
    this.out.push([]);
    this.in.push([]);
    return created;
  }

  private link(fromTaskId: string, toTaskId: string): void {
    const from = this.node(fromTaskId);
    const to = this.node(toTaskId);
    this.edges.push([from, to]);
    this.out[from]?.push(to);
    this.in[to]?.push(from);
  }

  private idAt(index: number): string {
    const id = this.nodes[index];
    if (id === undefined) {
      throw new WaypointError(ExitCode.GENERAL_ERROR, `Dependency graph node ${index} out of range`);
    }
    return id;
  }
}

/**
 * Expand a batch pattern into edges.
 *
 * - linear:  ids[i] → ids[i+1]
 * - fan-out: ids[0] → each of ids[1:]
 * - fan-in:  each of ids[:-1] → ids[last]
 *
 * @throws {WaypointError} INVALID_INPUT with fewer than two ids
 */
export function expandPattern(pattern: DependencyPattern, taskIds: readonly string[]): EdgeSpec[] {
  if (taskIds.length < 2) {
    throw new WaypointError(
      ExitCode.INVALID_INPUT,
      `A ${pattern} dependency batch needs at least two task ids (got ${taskIds.length})`,
    );
  }
  const [first] = taskIds;
  const last = taskIds[taskIds.length - 1];
  if (first === undefined || last === undefined) return [];

  switch (pattern) {
    case 'linear':
      return taskIds.slice(1).map((toTaskId, i) => ({ fromTaskId: taskIds[i] ?? first, toTaskId }));
    case 'fan-out':
      return taskIds.slice(1).map((toTaskId) => ({ fromTaskId: first, toTaskId }));
    case 'fan-in':
      return taskIds.slice(0, -1).map((fromTaskId) => ({ fromTaskId, toTaskId: last }));
  }
}

/** Stamp edge specs as persisted BLOCKS edges. */
export function toDependencyEdges(specs: readonly EdgeSpec[], now = new Date()): DependencyEdge[] {
  const createdAt = now.toISOString();
  return specs.map(({ fromTaskId, toTaskId }) => ({ fromTaskId, toTaskId, type: 'BLOCKS', createdAt }));
}
