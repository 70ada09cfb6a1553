/**
 * Tests for DependencyService against the in-memory repository.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DependencyService } from '../service.js';
import { MemoryRepository } from '../../../store/memory-repository.js';
import { ExitCode } from '../../../types/exit-codes.js';
import type { WorkItem } from '../../../types/work-item.js';
import { bundledFlows, captureError, makeItem } from '../../__tests__/fixtures.js';

const pairs = (edges: Array<{ fromTaskId: string; toTaskId: string }>) =>
  edges.map((e) => `${e.fromTaskId}->${e.toTaskId}`);

describe('DependencyService', () => {
  let repo: MemoryRepository;
  let service: DependencyService;

  async function seed(...items: WorkItem[]): Promise<void> {
    for (const item of items) await repo.saveItem(item);
  }

  beforeEach(async () => {
    repo = new MemoryRepository();
    service = new DependencyService(repo, bundledFlows());
    await seed(
      makeItem({ id: 'T1' }),
      makeItem({ id: 'T2' }),
      makeItem({ id: 'T3' }),
      makeItem({ id: 'T4' }),
      makeItem({ id: 'F1', kind: 'feature', status: 'planning' }),
    );
  });

  it('adds an edge and reports the target as blocked', async () => {
    const edge = await service.addEdge('T1', 'T2');
    expect(edge).toMatchObject({ fromTaskId: 'T1', toTaskId: 'T2', type: 'BLOCKS' });
    expect(await service.isBlocked('T2')).toBe(true);
    expect(await service.isBlocked('T1')).toBe(false);
    expect(await service.blockers('T2')).toEqual(['T1']);
  });

  it('rejects the reverse edge as a cycle and keeps only the first', async () => {
    await service.addEdge('T1', 'T2');
    const err = await captureError(() => service.addEdge('T2', 'T1'));
    expect(err.code).toBe(ExitCode.CYCLE_DETECTED);
    expect(pairs(await repo.loadEdges())).toEqual(['T1->T2']);
  });

  it('rejects a duplicate edge', async () => {
    await service.addEdge('T1', 'T2');
    const err = await captureError(() => service.addEdge('T1', 'T2'));
    expect(err.code).toBe(ExitCode.DUPLICATE_EDGE);
    expect(await repo.loadEdges()).toHaveLength(1);
  });

  it('only links existing tasks', async () => {
    expect((await captureError(() => service.addEdge('T1', 'T9'))).code).toBe(ExitCode.NOT_FOUND);
    expect((await captureError(() => service.addEdge('F1', 'T1'))).code).toBe(ExitCode.INVALID_KIND);
  });

  it('persists nothing when any edge of a batch is rejected', async () => {
    await service.addEdge('T3', 'T1');
    const err = await captureError(() => service.addBatch('linear', ['T1', 'T2', 'T3']));
    expect(err.code).toBe(ExitCode.CYCLE_DETECTED);
    expect(pairs(await repo.loadEdges())).toEqual(['T3->T1']);
  });

  it('adds fan-in batches', async () => {
    const edges = await service.addBatch('fan-in', ['T1', 'T2', 'T3']);
    expect(pairs(edges)).toEqual(['T1->T3', 'T2->T3']);
    expect(await service.blockers('T3')).toEqual(['T1', 'T2']);
  });

  it('counts only terminal-success predecessors as resolved', async () => {
    await service.addBatch('fan-in', ['T1', 'T2', 'T3']);
    await repo.saveItem(makeItem({ id: 'T1', status: 'completed' }));
    await repo.saveItem(makeItem({ id: 'T2', status: 'cancelled' }));
    expect(await service.blockers('T3')).toEqual(['T2']);
    expect(await service.isBlocked('T3')).toBe(true);
  });

  it('reports successors whose last blocker just succeeded', async () => {
    await service.addBatch('fan-out', ['T1', 'T2', 'T3']);
    await service.addEdge('T4', 'T3');
    await repo.saveItem(makeItem({ id: 'T1', status: 'completed' }));
    expect(await service.unblockedBy('T1')).toEqual(['T2']);
  });

  it('lists transitive blockers nearest first', async () => {
    await service.addBatch('linear', ['T1', 'T2', 'T3']);
    expect(await service.transitiveBlockers('T3')).toEqual(['T2', 'T1']);
    await repo.saveItem(makeItem({ id: 'T1', status: 'completed' }));
    expect(await service.transitiveBlockers('T3')).toEqual(['T2']);
  });

  it('partitions open tasks into blocked and ready', async () => {
    await service.addBatch('linear', ['T1', 'T2', 'T3']);
    expect(await service.blockedTasks()).toEqual([
      { taskId: 'T2', blockers: ['T1'] },
      { taskId: 'T3', blockers: ['T2'] },
    ]);
    expect(await service.readyTasks()).toEqual(['T1', 'T4']);
  });

  it('removes an edge, and reports a missing one', async () => {
    await service.addEdge('T1', 'T2');
    await service.removeEdge('T1', 'T2');
    expect(await repo.loadEdges()).toEqual([]);
    const err = await captureError(() => service.removeEdge('T1', 'T2'));
    expect(err.code).toBe(ExitCode.NOT_FOUND);
  });
});
