/**
 * Tests for the JSON-file repository.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonFileRepository } from '../json-repository.js';
import { safeReadFile } from '../atomic.js';
import { ExitCode } from '../../types/exit-codes.js';
import { captureError, makeItem } from '../../core/__tests__/fixtures.js';

describe('JsonFileRepository', () => {
  let tempDir: string;
  let filePath: string;
  let repo: JsonFileRepository;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'waypoint-test-'));
    filePath = join(tempDir, '.waypoint', 'work.json');
    repo = new JsonFileRepository(filePath);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('treats a missing file as an empty document', async () => {
    expect(await repo.listItems()).toEqual([]);
    expect(await safeReadFile(filePath)).toBeNull();
  });

  it('persists items, edges and sections across instances', async () => {
    await repo.transaction(async (tx) => {
      await tx.saveItem(makeItem({ id: 'T1', tags: ['bug'] }));
      await tx.saveItem(makeItem({ id: 'T2' }));
      await tx.addEdges([
        { fromTaskId: 'T1', toTaskId: 'T2', type: 'BLOCKS', createdAt: '2026-01-01T00:00:00.000Z' },
      ]);
      await tx.saveSection({ id: 'T1:1', entityId: 'T1', title: 'Notes', content: 'x', ordinal: 1 });
    });

    const reopened = new JsonFileRepository(filePath);
    expect(await reopened.loadItem('T1')).toEqual(makeItem({ id: 'T1', tags: ['bug'] }));
    expect(await reopened.loadEdges()).toEqual([
      { fromTaskId: 'T1', toTaskId: 'T2', type: 'BLOCKS', createdAt: '2026-01-01T00:00:00.000Z' },
    ]);
    expect((await reopened.loadSections('T1')).map((s) => s.title)).toEqual(['Notes']);
  });

  it('writes formatted JSON with a trailing newline', async () => {
    await repo.saveItem(makeItem({ id: 'T1' }));
    const content = await readFile(filePath, 'utf8');
    expect(content.startsWith('{\n  "version": "1.0.0",\n')).toBe(true);
    expect(content.endsWith('}\n')).toBe(true);
  });

  it('leaves the file untouched when a transaction throws', async () => {
    await repo.saveItem(makeItem({ id: 'T1' }));
    const before = await readFile(filePath, 'utf8');

    await expect(
      repo.transaction(async (tx) => {
        await tx.deleteItem('T1');
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect(await readFile(filePath, 'utf8')).toBe(before);
  });

  it('serializes concurrent transactions within one process', async () => {
    await repo.saveItem(makeItem({ id: 'T1', tags: [] }));
    await Promise.all(
      ['a', 'b', 'c'].map((tag) =>
        repo.transaction(async (tx) => {
          const item = await tx.loadItem('T1');
          await tx.saveItem({ ...item, tags: [...item.tags, tag] });
        }),
      ),
    );
    expect((await repo.loadItem('T1')).tags).toEqual(['a', 'b', 'c']);
  });

  it('rejects invalid JSON', async () => {
    await repo.saveItem(makeItem({ id: 'T1' }));
    await writeFile(filePath, '{not json');
    const err = await captureError(() => repo.listItems());
    expect(err.code).toBe(ExitCode.VALIDATION_ERROR);
    expect(err.message).toBe(`Invalid JSON in: ${filePath}`);
  });

  it('rejects documents that do not match the schema', async () => {
    await repo.saveItem(makeItem({ id: 'T1' }));
    await writeFile(filePath, JSON.stringify({ version: '1.0.0', items: [] }));
    const err = await captureError(() => repo.listItems());
    expect(err.code).toBe(ExitCode.VALIDATION_ERROR);
    expect(err.message).toMatch(/^Malformed work document /);
  });
});
