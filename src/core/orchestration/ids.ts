/**
 * Sequential work item ids: P001 for projects, F001 for features, T001 for tasks.
 */

import type { WorkItemKind } from '../../types/work-item.js';

export const ID_PREFIX: Readonly<Record<WorkItemKind, string>> = {
  project: 'P',
  feature: 'F',
  task: 'T',
};

/** Next free id for `kind`, one past the highest numbered id in use. */
export function generateItemId(kind: WorkItemKind, existingIds: Iterable<string>): string {
  const prefix = ID_PREFIX[kind];
  let maxNum = 0;
  for (const id of existingIds) {
    if (!id.startsWith(prefix)) continue;
    const num = parseInt(id.slice(prefix.length), 10);
    if (!isNaN(num) && num > maxNum) maxNum = num;
  }
  return `${prefix}${String(maxNum + 1).padStart(3, '0')}`;
}
