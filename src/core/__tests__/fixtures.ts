/**
 * Shared test fixtures: the bundled workflow configuration, work item
 * builders and an error-capturing helper.
 */

import { readFileSync } from 'node:fs';
import { WaypointError } from '../errors.js';
import { FlowStore, getBundledConfigPath } from '../workflow/store.js';
import type { WorkItem } from '../../types/work-item.js';

/** Bundled configuration text, for tests that derive variants from it. */
export const bundledYaml = readFileSync(getBundledConfigPath(), 'utf8');

export function bundledFlows(): FlowStore {
  return FlowStore.fromYaml(bundledYaml, 'bundled');
}

export function makeItem(overrides: Partial<WorkItem> & Pick<WorkItem, 'id'>): WorkItem {
  return {
    kind: 'task',
    title: `Item ${overrides.id}`,
    status: 'pending',
    tags: [],
    requiresVerification: false,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/** Run `fn` and return the WaypointError it throws (fails the test otherwise). */
export async function captureError(fn: () => unknown): Promise<WaypointError> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof WaypointError) return err;
    throw err;
  }
  throw new Error('Expected a WaypointError to be thrown');
}
