/**
 * On-disk document holding all work items, dependency edges and sections.
 */

import { z } from 'zod';
import { WORK_ITEM_KINDS } from '../types/work-item.js';

export const WORK_DOCUMENT_VERSION = '1.0.0';

export const WorkItemSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(WORK_ITEM_KINDS),
  title: z.string(),
  status: z.string().min(1),
  tags: z.array(z.string()),
  parentId: z.string().min(1).optional(),
  requiresVerification: z.boolean(),
  previousStatus: z.string().min(1).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const DependencyEdgeSchema = z.object({
  fromTaskId: z.string().min(1),
  toTaskId: z.string().min(1),
  type: z.literal('BLOCKS'),
  createdAt: z.string(),
});

export const SectionSchema = z.object({
  id: z.string().min(1),
  entityId: z.string().min(1),
  title: z.string(),
  content: z.string(),
  ordinal: z.number().int(),
});

export const WorkDocumentSchema = z.object({
  version: z.string(),
  lastUpdated: z.string(),
  items: z.array(WorkItemSchema),
  dependencies: z.array(DependencyEdgeSchema),
  sections: z.array(SectionSchema),
});
export type WorkDocument = z.infer<typeof WorkDocumentSchema>;

/** An empty document stamped with the current time. */
export function emptyWorkDocument(): WorkDocument {
  return {
    version: WORK_DOCUMENT_VERSION,
    lastUpdated: new Date().toISOString(),
    items: [],
    dependencies: [],
    sections: [],
  };
}
