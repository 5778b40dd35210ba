/**
 * Deep Analysis Engine
 *
 * Main entry point for the library.
 *
 * @example
 * ```typescript
 * import { createDeepAnalysisEngine, loadConfig } from 'deep-analysis-engine';
 *
 * const engine = createDeepAnalysisEngine(loadConfig());
 * const result = await engine.analyze(payload, preliminary);
 * if (result.success) {
 *   console.log(result.signal.action, result.signal.confidence);
 * }
 * ```
 */

// Re-export types
export * from './types/index.js';

export { loadConfig, parseConfig, applyEnvOverrides, type EngineConfig } from './core/config.js';
export {
  EngineError,
  ConfigurationError,
  PlanningError,
  TimeoutError,
  MalformedOutputError,
  ToolExecutionError,
  QuotaExceededError,
  type EngineErrorCode,
} from './core/errors.js';
export { Logger, type LogLevel } from './core/logger.js';
export { extractJson, extractJsonText } from './core/json.js';

export {
  createDeepAnalysisEngine,
  buildAnalysisSettings,
  type DeepAnalysisEngine,
  type EngineOverrides,
} from './agent/engine.js';
export { parseEventInput, type EventInput } from './agent/event_input.js';
export {
  analyzeEvent,
  runDeepAnalysis,
  routeAfterExecutor,
  routeAfterPlanner,
} from './agent/orchestrator/orchestrator.js';
export type {
  DeepAnalysisDeps,
  DeepAnalysisResult,
  OrchestrationState,
  AnalysisSettings,
} from './agent/orchestrator/types.js';
export {
  DailyToolQuota,
  getDailyToolQuota,
  resetDailyToolQuota,
  type QuotaStatus,
} from './agent/orchestrator/quota.js';
export { normalizeSignal, signalToJson, clampConfidence } from './agent/orchestrator/signal.js';

export type { Planner, ToolPlan, PlannerKind } from './agent/planning/types.js';
export { createPlanner, createPlannerWithFallback } from './agent/planning/factory.js';
export { StructuredPlanner } from './agent/planning/structured.js';
export { CliPlanner } from './agent/planning/cli.js';
export { TextPlanner } from './agent/planning/text.js';

export { EvidenceToolRegistry } from './agent/tools/registry.js';
export type {
  EvidenceTool,
  ToolName,
  ToolResultEnvelope,
  ToolInputMap,
} from './agent/tools/types.js';

export { createMemoryFetcher, formatMemoryEvidence } from './memory/fetcher.js';
export { LocalMemoryStore } from './memory/local_store.js';
export { SqliteMemoryStore, openMemoryDatabase } from './memory/sqlite_store.js';
export type { MemoryEntry, MemoryFetcher, MemorySource } from './memory/types.js';

// Version
export const VERSION = '0.1.0';
