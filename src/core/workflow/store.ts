/**
 * Workflow Definition Store.
 *
 * Holds the compiled, immutable workflow configuration and answers which flow
 * applies to a work item. Resolution is first-match-wins over the kind's
 * priority-ordered tag mappings, falling back to the kind's default flow, so it
 * never fails for a well-formed item.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { WaypointError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { normalizeTags, type WorkItemKind } from '../../types/work-item.js';
import { getLogger } from '../logger.js';
import { compileWorkflowConfig } from './schema.js';
import {
  DEFAULT_FLOW,
  type AggregationRule,
  type AutoCascadeSettings,
  type CleanupSettings,
  type FlowDefinition,
  type FlowPath,
  type ResolvedFlow,
  type WorkflowConfig,
} from './types.js';

/** Path of the workflow configuration bundled with the package. */
export function getBundledConfigPath(): string {
  return fileURLToPath(new URL('../../../config/default-config.yaml', import.meta.url));
}

export class FlowStore {
  private readonly config: WorkflowConfig;

  constructor(config: WorkflowConfig) {
    this.config = config;
  }

  /**
   * Parse and compile a YAML document.
   * @throws {WaypointError} CONFIG_ERROR on YAML or schema problems
   */
  static fromYaml(text: string, source = 'workflow config'): FlowStore {
    let document: unknown;
    try {
      document = parseYaml(text);
    } catch (err) {
      throw new WaypointError(ExitCode.CONFIG_ERROR, `Malformed YAML in ${source}`, {
        cause: err,
        fix: 'Check indentation and quoting in the workflow configuration file',
      });
    }
    return new FlowStore(compileWorkflowConfig(document, source));
  }

  /**
   * Load a workflow configuration file (defaults to the bundled one).
   * @throws {WaypointError} CONFIG_ERROR when the file is missing or invalid
   */
  static load(path: string = getBundledConfigPath()): FlowStore {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (err) {
      throw new WaypointError(ExitCode.CONFIG_ERROR, `Cannot read workflow configuration: ${path}`, {
        cause: err,
      });
    }
    const store = FlowStore.fromYaml(text, path);
    getLogger('workflow').debug({ path }, 'Workflow configuration loaded');
    return store;
  }

  get aggregationRules(): readonly AggregationRule[] {
    return this.config.aggregationRules;
  }

  get cleanup(): CleanupSettings {
    return this.config.cleanup;
  }

  get autoCascade(): AutoCascadeSettings {
    return this.config.autoCascade;
  }

  /** Names of the flows loaded for a kind, in configuration order. */
  flowNames(kind: WorkItemKind): string[] {
    return [...(this.config.flows.get(kind)?.keys() ?? [])];
  }

  /**
   * Look up a flow by name.
   * @throws {WaypointError} UNKNOWN_FLOW if no such flow is loaded for the kind
   */
  getFlow(kind: WorkItemKind, name: string): FlowDefinition {
    const flow = this.config.flows.get(kind)?.get(name);
    if (!flow) {
      throw new WaypointError(ExitCode.UNKNOWN_FLOW, `Unknown ${kind} flow: ${name}`, {
        fix: `Known ${kind} flows: ${this.flowNames(kind).join(', ')}`,
      });
    }
    return flow;
  }

  /** Resolve the flow that applies to an item of `kind` carrying `tags`. */
  resolveFlow(kind: WorkItemKind, tags: readonly string[]): ResolvedFlow {
    const normalized = normalizeTags(tags);
    if (normalized.length > 0) {
      for (const mapping of this.config.mappings.get(kind) ?? []) {
        const matched = normalized.filter((tag) => mapping.tags.includes(tag));
        if (matched.length > 0) {
          return { flow: this.getFlow(kind, mapping.flow), matchedTags: matched };
        }
      }
    }
    return { flow: this.getFlow(kind, DEFAULT_FLOW), matchedTags: [] };
  }

  /** Full path of the flow resolved for `tags`, with the position of `currentStatus`. */
  getFlowPath(kind: WorkItemKind, tags: readonly string[], currentStatus?: string): FlowPath {
    const { flow, matchedTags } = this.resolveFlow(kind, tags);
    const position = currentStatus === undefined ? -1 : flow.statuses.indexOf(currentStatus);
    return {
      activeFlow: flow.name,
      flowSequence: [...flow.statuses],
      currentPosition: position >= 0 ? position : null,
      matchedTags: [...matchedTags],
      terminalStatuses: [...flow.terminalStatuses.keys()],
      emergencyTriggers: [...flow.emergencyTransitions.keys()],
    };
  }
}
