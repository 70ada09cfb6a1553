/**
 * Tests for the section-based verification gate.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SectionVerificationGate, parseCriteria } from '../gate.js';
import { MemoryRepository } from '../../../store/memory-repository.js';

describe('SectionVerificationGate', () => {
  let repo: MemoryRepository;
  let gate: SectionVerificationGate;

  async function verification(content: string, title = 'Verification'): Promise<void> {
    await repo.saveSection({ id: 'T1:1', entityId: 'T1', title, content, ordinal: 1 });
  }

  beforeEach(() => {
    repo = new MemoryRepository();
    gate = new SectionVerificationGate(repo);
  });

  it('is unsatisfied without a Verification section', async () => {
    expect(await gate.allCriteriaSatisfied('T1')).toBe(false);
  });

  it('is unsatisfied for blank, malformed or empty criteria', async () => {
    for (const content of ['   ', '{not json', '[]', '{"criteria":"x","pass":true}']) {
      await verification(content);
      expect(await gate.allCriteriaSatisfied('T1')).toBe(false);
    }
  });

  it('requires every criterion to pass', async () => {
    await verification('[{"criteria":"unit tests","pass":true},{"criteria":"review","pass":false}]');
    expect(await gate.allCriteriaSatisfied('T1')).toBe(false);

    await verification('[{"criteria":"unit tests","pass":true},{"criteria":"review","pass":true}]');
    expect(await gate.allCriteriaSatisfied('T1')).toBe(true);
  });

  it('matches the section title case-insensitively', async () => {
    await verification('[{"criteria":"unit tests","pass":true}]', 'verification');
    expect(await gate.allCriteriaSatisfied('T1')).toBe(true);
  });
});

describe('parseCriteria', () => {
  it('returns the parsed list', () => {
    expect(parseCriteria('[{"criteria":"lint","pass":true}]')).toEqual([
      { criteria: 'lint', pass: true },
    ]);
  });

  it('returns null for entries without a pass flag', () => {
    expect(parseCriteria('[{"criteria":"lint"}]')).toBeNull();
  });
});
