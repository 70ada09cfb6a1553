/**
 * Tests for the dependency graph and batch pattern expansion.
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph, expandPattern, toDependencyEdges } from '../graph.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { captureError } from '../../__tests__/fixtures.js';

const edge = (fromTaskId: string, toTaskId: string) => ({ fromTaskId, toTaskId });

describe('expandPattern', () => {
  it('chains ids for linear', () => {
    expect(expandPattern('linear', ['a', 'b', 'c'])).toEqual([edge('a', 'b'), edge('b', 'c')]);
  });

  it('fans out from the first id', () => {
    expect(expandPattern('fan-out', ['a', 'b', 'c'])).toEqual([edge('a', 'b'), edge('a', 'c')]);
  });

  it('fans in to the last id', () => {
    expect(expandPattern('fan-in', ['a', 'b', 'c'])).toEqual([edge('a', 'c'), edge('b', 'c')]);
  });

  it('rejects fewer than two ids', async () => {
    const err = await captureError(() => expandPattern('linear', ['a']));
    expect(err.code).toBe(ExitCode.INVALID_INPUT);
  });
});

describe('DependencyGraph', () => {
  const chain = () => DependencyGraph.fromEdges([edge('a', 'b'), edge('b', 'c')]);

  it('answers adjacency queries', () => {
    const graph = DependencyGraph.fromEdges([edge('a', 'c'), edge('b', 'c'), edge('c', 'd')]);
    expect(graph.predecessors('c')).toEqual(['a', 'b']);
    expect(graph.successors('c')).toEqual(['d']);
    expect(graph.ancestors('d')).toEqual(['c', 'a', 'b']);
    expect(graph.size).toEqual({ nodes: 4, edges: 3 });
  });

  it('detects reachability in the edge direction only', () => {
    const graph = chain();
    expect(graph.reaches('a', 'c')).toBe(true);
    expect(graph.reaches('c', 'a')).toBe(false);
    expect(graph.wouldCreateCycle('c', 'a')).toBe(true);
    expect(graph.wouldCreateCycle('a', 'c')).toBe(false);
  });

  it('rejects an edge that closes a cycle and reports the path', async () => {
    const err = await captureError(() => chain().withEdges([edge('c', 'a')]));
    expect(err.code).toBe(ExitCode.CYCLE_DETECTED);
    expect(err.details?.['cycle']).toEqual(['c', 'a', 'b', 'c']);
    expect(err.message).toBe('Adding c -> a would create a cycle: c -> a -> b -> c');
  });

  it('treats a self-edge as a cycle', async () => {
    const err = await captureError(() => DependencyGraph.fromEdges([]).withEdges([edge('a', 'a')]));
    expect(err.code).toBe(ExitCode.CYCLE_DETECTED);
  });

  it('rejects a duplicate edge', async () => {
    const err = await captureError(() => chain().withEdges([edge('a', 'b')]));
    expect(err.code).toBe(ExitCode.DUPLICATE_EDGE);
  });

  it('leaves the receiver unchanged when a batch fails part-way', async () => {
    const graph = chain();
    const err = await captureError(() => graph.withEdges([edge('c', 'd'), edge('d', 'a')]));
    expect(err.code).toBe(ExitCode.CYCLE_DETECTED);
    expect(graph.hasEdge('c', 'd')).toBe(false);
    expect(graph.size.edges).toBe(2);
  });

  it('returns a new graph containing the added edges', () => {
    const graph = chain();
    const next = graph.withEdges([edge('c', 'd')]);
    expect(next.hasEdge('c', 'd')).toBe(true);
    expect(next.edgeList()).toEqual([edge('a', 'b'), edge('b', 'c'), edge('c', 'd')]);
    expect(graph.hasEdge('c', 'd')).toBe(false);
  });
});

describe('toDependencyEdges', () => {
  it('stamps BLOCKS edges with one timestamp', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    expect(toDependencyEdges([edge('a', 'b')], now)).toEqual([
      { fromTaskId: 'a', toTaskId: 'b', type: 'BLOCKS', createdAt: '2026-03-01T12:00:00.000Z' },
    ]);
  });
});
