/**
 * Verification gate consulted before a work item that requires verification
 * may complete.
 *
 * SectionVerificationGate reads the item's `Verification` section, a JSON array
 * of acceptance criteria:
 *
 * ```json
 * [{ "criteria": "Unit tests pass", "pass": true }]
 * ```
 *
 * Every entry must be marked `pass: true`. A missing, blank, unparsable or empty
 * section counts as unsatisfied.
 */

import { z } from 'zod';
import { getLogger } from '../logger.js';
import type { WorkRepository } from '../../store/repository.js';

export interface VerificationGate {
  allCriteriaSatisfied(itemId: string): Promise<boolean>;
}

export const VERIFICATION_SECTION_TITLE = 'Verification';

const CriteriaSchema = z
  .array(
    z.object({
      criteria: z.string().min(1),
      pass: z.boolean(),
    }),
  )
  .min(1);

export type VerificationCriteria = z.infer<typeof CriteriaSchema>;

/** Parse a Verification section body; null when it is not a usable criteria list. */
export function parseCriteria(content: string): VerificationCriteria | null {
  if (content.trim().length === 0) return null;
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = CriteriaSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export class SectionVerificationGate implements VerificationGate {
  constructor(private readonly repository: WorkRepository) {}

  async allCriteriaSatisfied(itemId: string): Promise<boolean> {
    const sections = await this.repository.loadSections(itemId);
    const section = sections.find(
      (s) => s.title.trim().toLowerCase() === VERIFICATION_SECTION_TITLE.toLowerCase(),
    );
    if (!section) {
      getLogger('verification').debug({ itemId }, 'No verification section');
      return false;
    }
    const criteria = parseCriteria(section.content);
    if (!criteria) {
      getLogger('verification').warn({ itemId }, 'Verification section is not a criteria list');
      return false;
    }
    return criteria.every((c) => c.pass);
  }
}
