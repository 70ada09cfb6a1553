/**
 * Waypoint public API.
 */

export { Orchestrator } from './core/orchestration/orchestrator.js';
export type {
  AppliedChange,
  CreateItemInput,
  DeleteResult,
  OrchestratorOptions,
  TransitionResult,
} from './core/orchestration/orchestrator.js';
export { ProgressionEngine } from './core/progression/engine.js';
export type { AppliedTransition, NextStatus } from './core/progression/engine.js';
export { CascadeEngine, matchRule } from './core/cascade/engine.js';
export type { CascadeEvent, CascadeFailure, CascadeReport } from './core/cascade/engine.js';
export type { CleanupResult } from './core/cascade/cleanup.js';
export { DependencyGraph, expandPattern } from './core/dependencies/graph.js';
export { DependencyService } from './core/dependencies/service.js';
export { SectionVerificationGate, type VerificationGate } from './core/verification/gate.js';
export { FlowStore, getBundledConfigPath } from './core/workflow/store.js';
export { compileWorkflowConfig } from './core/workflow/schema.js';
export * from './core/workflow/types.js';
export { KeyedLock } from './core/locks.js';
export { WaypointError, isWaypointError, type SerializedError } from './core/errors.js';
export { getLogger, initLogger, closeLogger } from './core/logger.js';
export { loadSettings, type WaypointSettings } from './core/config.js';
export { ExitCode } from './types/exit-codes.js';
export * from './types/work-item.js';
export type { WorkRepository } from './store/repository.js';
export { MemoryRepository } from './store/memory-repository.js';
export { JsonFileRepository } from './store/json-repository.js';
