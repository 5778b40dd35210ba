/**
 * Orchestrator Types
 *
 * Per-event state carried through the deep analysis graph.
 */

import type { Logger } from '../../core/logger.js';
import type {
  EventPayload,
  EventType,
  FinalSignal,
  PreliminaryAnalysis,
} from '../../types/index.js';
import type { MemoryEntry, MemoryFetcher } from '../../memory/types.js';
import type { Planner, ToolPlan } from '../planning/types.js';
import type { EvidenceToolRegistry } from '../tools/registry.js';
import type { ToolExecution, ToolName, ToolResultEnvelope } from '../tools/types.js';
import type { DailyToolQuota } from './quota.js';

/**
 * Graph states.
 */
export type GraphNode = 'context_gather' | 'planner' | 'executor' | 'synthesis' | 'terminal';

/**
 * Latest successful result per tool.
 */
export type Evidence = Partial<Record<ToolName, ToolResultEnvelope>>;

export interface MemoryEvidence {
  entries: MemoryEntry[];
  /** Prompt-ready text */
  formatted: string;
  count: number;
}

/**
 * State for one event. Created when deep analysis starts, discarded once the
 * signal is emitted or the run fails; never shared between events.
 */
export interface OrchestrationState {
  eventId: string;
  payload: EventPayload;
  preliminary: PreliminaryAnalysis;

  /** Fetched once by context gathering */
  memoryEvidence: MemoryEvidence;

  /** Grows across turns; entries are replaced only by the same tool */
  evidence: Evidence;

  /** Most recent planner decision */
  nextTools: string[];
  lastPlan: ToolPlan | null;
  searchKeywords: string;

  /** Incremented once per executor turn, not per tool */
  toolCallCount: number;
  maxToolCalls: number;

  toolExecutions: ToolExecution[];

  /** Graph states in visit order */
  trace: GraphNode[];

  /** Raw synthesis JSON, set at the terminal state */
  finalResponse: string | null;
  signal: FinalSignal | null;

  warnings: string[];
  startedAt: string;
  updatedAt: string;
}

export interface SearchSettings {
  maxResults: number;
  eventDomains: Record<string, string[]>;
}

export interface AnalysisSettings {
  maxToolCalls: number;
  neverSearch: EventType[];
  forceSearch: EventType[];
  /** Ask the planner for forced-search keywords instead of deriving them */
  keywordGeneration: boolean;
  planTimeoutMs: number;
  synthesisTimeoutMs: number;
  /** Tools offered to the planner; defaults to every registered tool */
  enabledTools?: ToolName[];
  search: SearchSettings;
}

export interface DeepAnalysisDeps {
  planner: Planner;
  tools: EvidenceToolRegistry;
  memory: MemoryFetcher;
  quota: DailyToolQuota;
  settings: AnalysisSettings;
  logger?: Logger;
}

export type DeepAnalysisResult =
  | { success: true; signal: FinalSignal; state: OrchestrationState }
  | { success: false; error: Error };
