/**
 * In-memory WorkRepository.
 *
 * Backs tests and embedded use, and is the working copy JsonFileRepository
 * loads each transaction into. Values are cloned on the way in and out so
 * callers never hold references into stored state.
 */

import { WaypointError } from '../core/errors.js';
import { KeyedLock } from '../core/locks.js';
import { ExitCode } from '../types/exit-codes.js';
import type { DependencyEdge, Section, WorkItem } from '../types/work-item.js';
import type { WorkRepository } from './repository.js';
import { emptyWorkDocument, type WorkDocument } from './work-document.js';

const TX_KEY = 'transaction';

export class MemoryRepository implements WorkRepository {
  private doc: WorkDocument;
  private readonly lock = new KeyedLock();

  constructor(doc: WorkDocument = emptyWorkDocument()) {
    this.doc = structuredClone(doc);
  }

  /** Deep copy of the current state. */
  snapshot(): WorkDocument {
    return structuredClone(this.doc);
  }

  async loadItem(id: string): Promise<WorkItem> {
    const item = await this.findItem(id);
    if (!item) {
      throw new WaypointError(ExitCode.NOT_FOUND, `Work item not found: ${id}`);
    }
    return item;
  }

  async findItem(id: string): Promise<WorkItem | null> {
    const item = this.doc.items.find((i) => i.id === id);
    return item ? structuredClone(item) : null;
  }

  async saveItem(item: WorkItem): Promise<void> {
    const copy = structuredClone(item);
    const index = this.doc.items.findIndex((i) => i.id === item.id);
    if (index === -1) {
      this.doc.items.push(copy);
    } else {
      this.doc.items[index] = copy;
    }
    this.touch();
  }

  async loadChildren(parentId: string): Promise<WorkItem[]> {
    return this.doc.items.filter((i) => i.parentId === parentId).map((i) => structuredClone(i));
  }

  async deleteItem(id: string): Promise<void> {
    const index = this.doc.items.findIndex((i) => i.id === id);
    if (index === -1) {
      throw new WaypointError(ExitCode.NOT_FOUND, `Work item not found: ${id}`);
    }
    this.doc.items.splice(index, 1);
    this.touch();
  }

  async listItems(): Promise<WorkItem[]> {
    return this.doc.items.map((i) => structuredClone(i));
  }

  async loadEdges(): Promise<DependencyEdge[]> {
    return this.doc.dependencies.map((e) => ({ ...e }));
  }

  async addEdges(edges: readonly DependencyEdge[]): Promise<void> {
    this.doc.dependencies.push(...edges.map((e) => ({ ...e })));
    this.touch();
  }

  async removeEdges(
    edges: readonly Pick<DependencyEdge, 'fromTaskId' | 'toTaskId'>[],
  ): Promise<number> {
    const before = this.doc.dependencies.length;
    this.doc.dependencies = this.doc.dependencies.filter(
      (e) => !edges.some((r) => r.fromTaskId === e.fromTaskId && r.toTaskId === e.toTaskId),
    );
    const removed = before - this.doc.dependencies.length;
    if (removed > 0) this.touch();
    return removed;
  }

  async removeEdgesFor(taskId: string): Promise<number> {
    const before = this.doc.dependencies.length;
    this.doc.dependencies = this.doc.dependencies.filter(
      (e) => e.fromTaskId !== taskId && e.toTaskId !== taskId,
    );
    const removed = before - this.doc.dependencies.length;
    if (removed > 0) this.touch();
    return removed;
  }

  async loadSections(entityId: string): Promise<Section[]> {
    return this.doc.sections
      .filter((s) => s.entityId === entityId)
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((s) => ({ ...s }));
  }

  async saveSection(section: Section): Promise<void> {
    const index = this.doc.sections.findIndex((s) => s.id === section.id);
    if (index === -1) {
      this.doc.sections.push({ ...section });
    } else {
      this.doc.sections[index] = { ...section };
    }
    this.touch();
  }

  async deleteSections(entityId: string): Promise<number> {
    const before = this.doc.sections.length;
    this.doc.sections = this.doc.sections.filter((s) => s.entityId !== entityId);
    const removed = before - this.doc.sections.length;
    if (removed > 0) this.touch();
    return removed;
  }

  /**
   * Transactions run one at a time against a private working copy that
   * replaces the live state only when `fn` resolves.
   */
  async transaction<T>(fn: (tx: WorkRepository) => Promise<T>): Promise<T> {
    return this.lock.run(TX_KEY, async () => {
      const working = new NestedMemoryTransaction(this.doc);
      const result = await fn(working);
      this.doc = working.snapshot();
      return result;
    });
  }

  private touch(): void {
    this.doc.lastUpdated = new Date().toISOString();
  }
}

/** Working copy handed to transaction callbacks; nested transactions run inline. */
class NestedMemoryTransaction extends MemoryRepository {
  override async transaction<T>(fn: (tx: WorkRepository) => Promise<T>): Promise<T> {
    return fn(this);
  }
}
