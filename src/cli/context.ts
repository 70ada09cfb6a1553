/**
 * Per-process wiring for CLI commands: settings, workflow configuration,
 * the file-backed repository and the orchestrator built from them.
 */

import { loadSettings } from '../core/config.js';
import { Orchestrator } from '../core/orchestration/orchestrator.js';
import { getWorkPath, resolveFlowConfigPath } from '../core/paths.js';
import { FlowStore } from '../core/workflow/store.js';
import { JsonFileRepository } from '../store/json-repository.js';

let orchestrator: Orchestrator | null = null;

/** Orchestrator for the project in the current working directory. */
export async function getOrchestrator(cwd?: string): Promise<Orchestrator> {
  if (orchestrator) return orchestrator;
  const settings = await loadSettings(cwd);
  const flows = FlowStore.load(resolveFlowConfigPath(cwd));
  const repository = new JsonFileRepository(getWorkPath(cwd), settings.lock);
  orchestrator = new Orchestrator({ repository, flows });
  return orchestrator;
}
