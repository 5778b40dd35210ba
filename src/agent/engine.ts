/**
 * Deep Analysis Engine
 *
 * Wires config into a ready-to-run graph: planner (with fallback), evidence
 * tool registry, memory fetcher, shared daily quota and logger.
 */

import { randomUUID } from 'node:crypto';

import type { EngineConfig } from '../core/config.js';
import { toErrorMessage } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import {
  createMemoryFetcher,
  disabledMemoryFetcher,
} from '../memory/fetcher.js';
import { LocalMemoryStore } from '../memory/local_store.js';
import { SqliteMemoryStore, openMemoryDatabase } from '../memory/sqlite_store.js';
import type { MemoryFetcher, MemorySource } from '../memory/types.js';
import type { EventPayload, FinalSignal, PreliminaryAnalysis } from '../types/index.js';
import { analyzeEvent } from './orchestrator/orchestrator.js';
import { getDailyToolQuota, type DailyToolQuota, type QuotaStatus } from './orchestrator/quota.js';
import type { AnalysisSettings, DeepAnalysisResult } from './orchestrator/types.js';
import { createPlannerWithFallback, type PlannerFactoryDeps } from './planning/factory.js';
import type { Planner } from './planning/types.js';
import { registerConfiguredTools } from './tools/adapters/index.js';
import { normalizeAssetCodes } from './tools/inputs.js';
import { EvidenceToolRegistry } from './tools/registry.js';
import { TOOL_NAMES, type EvidenceTool, type ToolName } from './tools/types.js';

export type EngineOverrides = {
  planner?: Planner;
  /** Extra tools, registered before the configured ones */
  tools?: EvidenceTool[];
  memorySource?: MemorySource;
  quota?: DailyToolQuota;
  logger?: Logger;
  clients?: PlannerFactoryDeps['clients'];
};

type SignalRecorder = (
  payload: EventPayload,
  preliminary: PreliminaryAnalysis,
  signal: FinalSignal
) => void;

export interface DeepAnalysisEngine {
  readonly planner: Planner;
  readonly tools: EvidenceToolRegistry;
  readonly memory: MemoryFetcher;
  readonly quota: DailyToolQuota;
  readonly settings: AnalysisSettings;
  analyze(payload: EventPayload, preliminary: PreliminaryAnalysis): Promise<DeepAnalysisResult>;
  quotaStatus(): QuotaStatus;
}

export function buildAnalysisSettings(config: EngineConfig): AnalysisSettings {
  const { analysis, tools } = config;
  const enabledTools = TOOL_NAMES.filter((name: ToolName) => tools[name].enabled);
  return {
    maxToolCalls: analysis.maxToolCalls,
    neverSearch: analysis.neverSearch,
    forceSearch: analysis.forceSearch,
    keywordGeneration: analysis.keywordGeneration,
    planTimeoutMs: analysis.planTimeoutMs,
    synthesisTimeoutMs: analysis.synthesisTimeoutMs,
    enabledTools,
    search: {
      maxResults: tools.search.maxResults,
      eventDomains: tools.search.eventDomains,
    },
  };
}

function buildMemory(
  config: EngineConfig,
  logger: Logger,
  override?: MemorySource
): { fetcher: MemoryFetcher; recorder: SignalRecorder | null } {
  const { memory } = config;
  const options = { limit: memory.limit, minConfidence: memory.minConfidence };

  if (override) {
    return { fetcher: createMemoryFetcher(override, options), recorder: null };
  }
  if (!memory.enabled) {
    return { fetcher: disabledMemoryFetcher, recorder: null };
  }

  if (memory.backend === 'sqlite') {
    const store = new SqliteMemoryStore(openMemoryDatabase(memory.sqlite.dbPath), {
      lookbackHours: memory.local.lookbackHours,
    });
    const recorder: SignalRecorder = (payload, preliminary, signal) => {
      store.record({
        summary: signal.summary,
        eventType: signal.eventType,
        assets: normalizeAssetCodes(signal.asset),
        keywords: preliminary.keywords.length > 0 ? preliminary.keywords : payload.keywordsHit,
        action: signal.action,
        confidence: signal.confidence,
      });
    };
    return {
      fetcher: createMemoryFetcher({ kind: 'sync', store }, options),
      recorder: memory.record ? recorder : null,
    };
  }

  const store = new LocalMemoryStore({
    basePath: memory.local.basePath,
    lookbackHours: memory.local.lookbackHours,
    logger: logger.child('memory'),
  });
  const recorder: SignalRecorder = (_payload, _preliminary, signal) => {
    store.savePattern(signal.eventType, {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      assets: normalizeAssetCodes(signal.asset),
      action: signal.action,
      confidence: signal.confidence,
      summary: signal.summary,
    });
  };
  return {
    fetcher: createMemoryFetcher({ kind: 'sync', store }, options),
    recorder: memory.record ? recorder : null,
  };
}

export function createDeepAnalysisEngine(
  config: EngineConfig,
  overrides: EngineOverrides = {}
): DeepAnalysisEngine {
  const logger = overrides.logger ?? new Logger(config.logging.level);

  const planner =
    overrides.planner ??
    createPlannerWithFallback(config.planner.type, config.planner.fallback, {
      config,
      logger,
      clients: overrides.clients,
    });

  const tools = new EvidenceToolRegistry({
    timeoutMs: config.tools.timeoutMs,
    logger: logger.child('tools'),
  });
  for (const tool of overrides.tools ?? []) {
    tools.register(tool);
  }
  registerConfiguredTools(tools, config, logger);

  const { fetcher: memory, recorder } = buildMemory(config, logger, overrides.memorySource);
  const quota = overrides.quota ?? getDailyToolQuota(config.analysis.toolDailyLimit);
  const settings = buildAnalysisSettings(config);

  logger.debug(
    `Engine ready: planner=${planner.kind}, tools=[${tools.listNames().join(', ')}]`
  );

  return {
    planner,
    tools,
    memory,
    quota,
    settings,
    async analyze(payload, preliminary) {
      const result = await analyzeEvent(payload, preliminary, {
        planner,
        tools,
        memory,
        quota,
        settings,
        logger: logger.child('graph'),
      });
      if (result.success && recorder) {
        try {
          recorder(payload, preliminary, result.signal);
        } catch (error) {
          logger.warn(`Failed to record signal to memory: ${toErrorMessage(error)}`);
        }
      }
      return result;
    },
    quotaStatus() {
      return quota.status();
    },
  };
}
