import { EvidenceToolRegistry } from '../../src/agent/tools/registry.js';
import { createOrchestrationState } from '../../src/agent/orchestrator/state.js';
import type { AnalysisSettings, OrchestrationState } from '../../src/agent/orchestrator/types.js';
import type { Planner, ToolPlan } from '../../src/agent/planning/types.js';
import type { EvidenceTool, ToolName, ToolResultEnvelope } from '../../src/agent/tools/types.js';
import { Logger } from '../../src/core/logger.js';
import type { EventPayload, PreliminaryAnalysis } from '../../src/types/index.js';

export const quietLogger = new Logger('error');

export function makePayload(overrides: Partial<EventPayload> = {}): EventPayload {
  return {
    text: 'Circle reports an exploit affecting USDC bridge contracts',
    source: 'test-feed',
    keywordsHit: ['exploit', 'usdc', 'bridge', 'circle'],
    language: 'en',
    ...overrides,
  };
}

export function makePreliminary(overrides: Partial<PreliminaryAnalysis> = {}): PreliminaryAnalysis {
  return {
    eventType: 'hack',
    asset: 'USDC',
    action: 'sell',
    confidence: 0.7,
    summary: 'USDC bridge exploit reported',
    keywords: ['usdc', 'exploit'],
    ...overrides,
  };
}

export function makeState(
  overrides: Partial<OrchestrationState> = {},
  prelim: Partial<PreliminaryAnalysis> = {}
): OrchestrationState {
  return {
    ...createOrchestrationState(makePayload(), makePreliminary(prelim), 3),
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<AnalysisSettings> = {}): AnalysisSettings {
  return {
    maxToolCalls: 3,
    neverSearch: ['macro', 'governance', 'airdrop', 'celebrity'],
    forceSearch: ['hack', 'regulation', 'partnership'],
    keywordGeneration: false,
    planTimeoutMs: 1_000,
    synthesisTimeoutMs: 1_000,
    search: { maxResults: 5, eventDomains: {} },
    ...overrides,
  };
}

export function envelope(overrides: Partial<ToolResultEnvelope> = {}): ToolResultEnvelope {
  return {
    source: 'test',
    timestamp: '2026-01-01T00:00:00.000Z',
    success: true,
    data: {},
    confidence: 0.9,
    triggered: false,
    error: null,
    ...overrides,
  };
}

/**
 * Planner whose replies are scripted per call.
 */
export class ScriptedPlanner implements Planner {
  readonly kind = 'structured';
  planCalls: OrchestrationState[] = [];
  synthesizeCalls: OrchestrationState[] = [];
  keywordCalls = 0;

  constructor(
    private plans: Array<ToolPlan | Error> = [],
    private synthesis: string | Error = '{"summary": "ok", "action": "observe", "confidence": 0.5}',
    private keywords: string | Error = 'generated keywords'
  ) {}

  async plan(state: OrchestrationState): Promise<ToolPlan> {
    this.planCalls.push(state);
    const next = this.plans.shift();
    if (next instanceof Error) throw next;
    if (!next) {
      return {
        tools: [],
        searchKeywords: '',
        macroIndicators: [],
        onchainAssets: [],
        protocolSlugs: [],
        reason: 'done',
        confidence: 1,
      };
    }
    return next;
  }

  async synthesize(state: OrchestrationState): Promise<string> {
    this.synthesizeCalls.push(state);
    if (this.synthesis instanceof Error) throw this.synthesis;
    return this.synthesis;
  }

  async generateSearchKeywords(): Promise<string> {
    this.keywordCalls += 1;
    if (this.keywords instanceof Error) throw this.keywords;
    return this.keywords;
  }
}

/**
 * Tool that returns a fixed envelope and records its inputs.
 */
export function stubTool<K extends ToolName>(
  name: K,
  schema: EvidenceTool<K>['schema'],
  respond: (input: Parameters<EvidenceTool<K>['run']>[0]) => ToolResultEnvelope
): EvidenceTool<K> & { inputs: Array<Parameters<EvidenceTool<K>['run']>[0]> } {
  const inputs: Array<Parameters<EvidenceTool<K>['run']>[0]> = [];
  return {
    name,
    description: `stub ${name}`,
    schema,
    inputs,
    async run(input) {
      inputs.push(input);
      return respond(input);
    },
  };
}

export function makeRegistry(tools: EvidenceTool[] = [], timeoutMs = 500): EvidenceToolRegistry {
  const registry = new EvidenceToolRegistry({ timeoutMs, logger: quietLogger });
  for (const tool of tools) {
    registry.register(tool);
  }
  return registry;
}
