/**
 * JSON-file WorkRepository backed by `.waypoint/work.json`.
 *
 * Each transaction follows the atomic write pattern:
 *   1. Acquire the in-process lock, then the file lock
 *   2. Load and validate the document
 *   3. Run the callback against an in-memory working copy
 *   4. Atomic write (temp file -> rename) if the callback resolved and the
 *      file lock is still held
 *   5. Release locks
 * A callback that throws leaves the file untouched.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { WaypointError } from '../core/errors.js';
import { KeyedLock } from '../core/locks.js';
import { formatZodIssues } from '../core/zod-issues.js';
import { ExitCode } from '../types/exit-codes.js';
import type { DependencyEdge, Section, WorkItem } from '../types/work-item.js';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { withLock, type LockOptions } from './lock.js';
import { MemoryRepository } from './memory-repository.js';
import type { WorkRepository } from './repository.js';
import { WorkDocumentSchema, emptyWorkDocument, type WorkDocument } from './work-document.js';

export class JsonFileRepository implements WorkRepository {
  private readonly local = new KeyedLock();

  constructor(
    readonly filePath: string,
    private readonly lockOptions: LockOptions = {},
  ) {}

  /**
   * Read and validate the document. A missing file is an empty document.
   * @throws {WaypointError} VALIDATION_ERROR for malformed content
   */
  async readDocument(): Promise<WorkDocument> {
    const content = await safeReadFile(this.filePath);
    if (content === null) return emptyWorkDocument();

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw new WaypointError(ExitCode.VALIDATION_ERROR, `Invalid JSON in: ${this.filePath}`, {
        cause: err,
      });
    }
    const parsed = WorkDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new WaypointError(
        ExitCode.VALIDATION_ERROR,
        `Malformed work document ${this.filePath}: ${formatZodIssues(parsed.error).join('; ')}`,
      );
    }
    return parsed.data;
  }

  async transaction<T>(fn: (tx: WorkRepository) => Promise<T>): Promise<T> {
    return this.local.run(this.filePath, async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      return withLock(this.filePath, async (lock) => {
        const working = new MemoryRepository(await this.readDocument());
        const result = await fn(working);
        lock.assertHeld();
        await atomicWriteJson(this.filePath, working.snapshot());
        return result;
      }, this.lockOptions);
    });
  }

  private async view(): Promise<MemoryRepository> {
    return new MemoryRepository(await this.readDocument());
  }

  async loadItem(id: string): Promise<WorkItem> {
    return (await this.view()).loadItem(id);
  }

  async findItem(id: string): Promise<WorkItem | null> {
    return (await this.view()).findItem(id);
  }

  async saveItem(item: WorkItem): Promise<void> {
    await this.transaction((tx) => tx.saveItem(item));
  }

  async loadChildren(parentId: string): Promise<WorkItem[]> {
    return (await this.view()).loadChildren(parentId);
  }

  async deleteItem(id: string): Promise<void> {
    await this.transaction((tx) => tx.deleteItem(id));
  }

  async listItems(): Promise<WorkItem[]> {
    return (await this.view()).listItems();
  }

  async loadEdges(): Promise<DependencyEdge[]> {
    return (await this.view()).loadEdges();
  }

  async addEdges(edges: readonly DependencyEdge[]): Promise<void> {
    await this.transaction((tx) => tx.addEdges(edges));
  }

  async removeEdges(
    edges: readonly Pick<DependencyEdge, 'fromTaskId' | 'toTaskId'>[],
  ): Promise<number> {
    return this.transaction((tx) => tx.removeEdges(edges));
  }

  async removeEdgesFor(taskId: string): Promise<number> {
    return this.transaction((tx) => tx.removeEdgesFor(taskId));
  }

  async loadSections(entityId: string): Promise<Section[]> {
    return (await this.view()).loadSections(entityId);
  }

  async saveSection(section: Section): Promise<void> {
    await this.transaction((tx) => tx.saveSection(section));
  }

  async deleteSections(entityId: string): Promise<number> {
    return this.transaction((tx) => tx.deleteSections(entityId));
  }
}
