import { describe, it, expect } from 'vitest';
import { generateItemId } from '../ids.js';

describe('generateItemId', () => {
  it('starts at 001 for each kind', () => {
    expect(generateItemId('task', [])).toBe('T001');
    expect(generateItemId('feature', ['T001', 'T002'])).toBe('F001');
  });

  it('continues past the highest number in use', () => {
    expect(generateItemId('task', ['T001', 'T007', 'T003', 'P010'])).toBe('T008');
    expect(generateItemId('project', ['P999'])).toBe('P1000');
  });

  it('ignores ids that do not follow the pattern', () => {
    expect(generateItemId('task', ['Tabc', 'setup'])).toBe('T001');
  });
});
