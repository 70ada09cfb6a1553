/**
 * Repository contract consumed by the orchestration engine.
 *
 * Implementations: MemoryRepository (tests, embedding) and JsonFileRepository
 * (`.waypoint/work.json`). `transaction` gives all-or-nothing semantics: if the
 * callback throws, none of the writes made through `tx` are kept.
 */

import type { DependencyEdge, Section, WorkItem } from '../types/work-item.js';

export interface WorkRepository {
  /** @throws {WaypointError} NOT_FOUND when the item does not exist */
  loadItem(id: string): Promise<WorkItem>;
  findItem(id: string): Promise<WorkItem | null>;
  saveItem(item: WorkItem): Promise<void>;
  loadChildren(parentId: string): Promise<WorkItem[]>;
  /** @throws {WaypointError} NOT_FOUND when the item does not exist */
  deleteItem(id: string): Promise<void>;
  listItems(): Promise<WorkItem[]>;

  loadEdges(): Promise<DependencyEdge[]>;
  addEdges(edges: readonly DependencyEdge[]): Promise<void>;
  /** Remove the listed edges; returns how many existed. */
  removeEdges(edges: readonly Pick<DependencyEdge, 'fromTaskId' | 'toTaskId'>[]): Promise<number>;
  /** Remove every edge touching a task; returns how many were removed. */
  removeEdgesFor(taskId: string): Promise<number>;

  loadSections(entityId: string): Promise<Section[]>;
  saveSection(section: Section): Promise<void>;
  /** Remove every section of an entity; returns how many were removed. */
  deleteSections(entityId: string): Promise<number>;

  transaction<T>(fn: (tx: WorkRepository) => Promise<T>): Promise<T>;
}
