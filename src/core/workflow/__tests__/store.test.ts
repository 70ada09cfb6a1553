/**
 * Tests for flow resolution and flow paths over the bundled configuration.
 */

import { describe, it, expect } from 'vitest';
import { FlowStore } from '../store.js';
import { isForwardTrigger, isEmergencyTrigger } from '../types.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { bundledFlows } from '../../__tests__/fixtures.js';

describe('FlowStore.resolveFlow', () => {
  const flows = bundledFlows();

  it('falls back to the default flow for untagged or unmatched items', () => {
    expect(flows.resolveFlow('task', []).flow.name).toBe('default');
    expect(flows.resolveFlow('task', ['frontend']).flow.name).toBe('default');
    expect(flows.resolveFlow('feature', ['bug']).flow.name).toBe('default');
  });

  it('matches tags case-insensitively and reports the matched tags', () => {
    const resolved = flows.resolveFlow('task', ['UI', 'Bug']);
    expect(resolved.flow.name).toBe('bug');
    expect(resolved.matchedTags).toEqual(['bug']);
  });

  it('takes the first mapping in priority order', () => {
    expect(flows.resolveFlow('task', ['hotfix', 'bug']).flow.name).toBe('bug');
    expect(flows.resolveFlow('task', ['docs', 'emergency']).flow.name).toBe('hotfix');
  });

  it('rejects unknown flow names', () => {
    expect(() => flows.getFlow('task', 'research')).toThrowError(
      expect.objectContaining({ code: ExitCode.UNKNOWN_FLOW }),
    );
  });
});

describe('FlowStore.getFlowPath', () => {
  const flows = bundledFlows();

  it('describes the active flow and the current position', () => {
    expect(flows.getFlowPath('task', ['hotfix'], 'in-progress')).toEqual({
      activeFlow: 'hotfix',
      flowSequence: ['pending', 'in-progress', 'completed', 'cancelled', 'blocked'],
      currentPosition: 1,
      matchedTags: ['hotfix'],
      terminalStatuses: ['completed', 'cancelled'],
      emergencyTriggers: ['cancel', 'block'],
    });
  });

  it('has no position for a status outside the flow', () => {
    expect(flows.getFlowPath('task', ['bug'], 'backlog').currentPosition).toBeNull();
  });
});

describe('FlowStore settings', () => {
  it('exposes cleanup and cascade settings', () => {
    const flows = bundledFlows();
    expect(flows.cleanup).toEqual({
      enabled: true,
      retainTags: ['bug', 'bugfix', 'fix', 'hotfix', 'critical'],
    });
    expect(flows.autoCascade).toEqual({ enabled: true, maxDepth: 2 });
    expect(flows.aggregationRules).toHaveLength(6);
  });

  it('fails to load a missing file', () => {
    expect(() => FlowStore.load('/nonexistent/waypoint/config.yaml')).toThrowError(
      expect.objectContaining({ code: ExitCode.CONFIG_ERROR }),
    );
  });
});

describe('trigger guards', () => {
  it('classifies triggers', () => {
    expect(isForwardTrigger('start')).toBe(true);
    expect(isForwardTrigger('cancel')).toBe(false);
    expect(isEmergencyTrigger('hold')).toBe(true);
    expect(isEmergencyTrigger('resume')).toBe(false);
  });
});
