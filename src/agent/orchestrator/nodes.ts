/**
 * Graph nodes
 *
 * Each node takes the current state and returns the next one. Only
 * synthesis is allowed to fail; every other node absorbs its errors.
 */

import { MalformedOutputError, QuotaExceededError, toErrorMessage } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { formatMemoryEvidence } from '../../memory/fetcher.js';
import { createToolPlan, emptyPlan } from '../planning/plan.js';
import type { ToolPlan } from '../planning/types.js';
import {
  fallbackSearchKeywords,
  normalizeAssetCodes,
  resolveMacroIndicators,
  resolveOnchainAssets,
  resolvePriceAsset,
  resolveProtocolSlugs,
  resolveSearchInput,
} from '../tools/inputs.js';
import { isToolName, type ToolExecution, type ToolName } from '../tools/types.js';
import { normalizeSignal } from './signal.js';
import {
  addToolExecutions,
  addWarning,
  completeState,
  enterNode,
  incrementToolCallCount,
  mergeEvidence,
  setMemoryEvidence,
  setPlan,
} from './state.js';
import type { DeepAnalysisDeps, OrchestrationState } from './types.js';

type NodeDeps = DeepAnalysisDeps & { logger: Logger };

function describeFailure(error: unknown): string {
  const message = toErrorMessage(error);
  if (error instanceof MalformedOutputError && error.rawOutput) {
    return `${message} (raw: ${error.rawOutput})`;
  }
  return message;
}

/**
 * Tools the planner may choose from: registered and enabled.
 */
export function availableTools(deps: DeepAnalysisDeps): ToolName[] {
  const registered = deps.tools.listNames();
  const enabled = deps.settings.enabledTools;
  return enabled ? registered.filter((name) => enabled.includes(name)) : registered;
}

// ============================================================================
// Context gathering
// ============================================================================

export async function contextGatherNode(
  state: OrchestrationState,
  deps: NodeDeps
): Promise<OrchestrationState> {
  let next = enterNode(state, 'context_gather');
  const assetCodes = normalizeAssetCodes(next.preliminary.asset);

  try {
    const entries = await deps.memory.fetch(next.preliminary.keywords, assetCodes);
    next = setMemoryEvidence(next, {
      entries,
      formatted: formatMemoryEvidence(entries),
      count: entries.length,
    });
    deps.logger.debug(`Loaded ${entries.length} memory entries`);
  } catch (error) {
    deps.logger.warn(`Memory fetch failed: ${toErrorMessage(error)}`);
    next = setMemoryEvidence(next, {
      entries: [],
      formatted: formatMemoryEvidence([]),
      count: 0,
    });
  }
  return next;
}

// ============================================================================
// Planner
// ============================================================================

function deterministicKeywords(state: OrchestrationState): string {
  const hits = state.payload.keywordsHit
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0)
    .slice(0, 3);
  return hits.length > 0 ? hits.join(' ') : fallbackSearchKeywords(state.preliminary);
}

async function forcedSearchKeywords(
  state: OrchestrationState,
  deps: NodeDeps
): Promise<string> {
  const fallback = deterministicKeywords(state);
  if (!deps.settings.keywordGeneration) {
    return fallback;
  }
  try {
    const generated = await deps.planner.generateSearchKeywords(state, {
      timeoutMs: deps.settings.planTimeoutMs,
    });
    return generated.trim() || fallback;
  } catch (error) {
    deps.logger.warn(
      `Keyword generation (${deps.planner.kind}) failed: ${describeFailure(error)}; using "${fallback}"`
    );
    return fallback;
  }
}

async function decidePlan(state: OrchestrationState, deps: NodeDeps): Promise<ToolPlan> {
  const { eventType } = state.preliminary;
  const { neverSearch, forceSearch } = deps.settings;

  if (neverSearch.includes(eventType)) {
    return emptyPlan(`Event type ${eventType} never needs evidence`);
  }

  if (forceSearch.includes(eventType) && state.toolCallCount === 0) {
    return createToolPlan({
      tools: ['search'],
      searchKeywords: await forcedSearchKeywords(state, deps),
      reason: `Event type ${eventType} requires search verification`,
    });
  }

  if (state.evidence.search) {
    return emptyPlan('Search evidence already collected');
  }

  const tools = availableTools(deps);
  if (tools.length === 0) {
    return emptyPlan('No evidence tools available');
  }

  try {
    return await deps.planner.plan(state, tools, { timeoutMs: deps.settings.planTimeoutMs });
  } catch (error) {
    deps.logger.warn(
      `Planner (${deps.planner.kind}) failed on turn ${state.toolCallCount + 1}: ${describeFailure(
        error
      )}`
    );
    return emptyPlan(`Planner failed: ${toErrorMessage(error)}`);
  }
}

export async function plannerNode(
  state: OrchestrationState,
  deps: NodeDeps
): Promise<OrchestrationState> {
  const entered = enterNode(state, 'planner');
  const plan = await decidePlan(entered, deps);
  deps.logger.debug(
    `Plan: [${plan.tools.join(', ') || 'none'}] ${plan.reason ? `(${plan.reason})` : ''}`.trim()
  );
  return setPlan(entered, plan);
}

// ============================================================================
// Executor
// ============================================================================

type ToolRun = {
  executions: ToolExecution[];
  warning?: string;
};

/**
 * Try each candidate input in order; stop at the first success.
 */
async function runCandidates(
  candidates: string[],
  invoke: (candidate: string) => Promise<ToolExecution>
): Promise<ToolExecution[]> {
  const executions: ToolExecution[] = [];
  for (const candidate of candidates) {
    const execution = await invoke(candidate);
    executions.push(execution);
    if (execution.result.success) break;
  }
  return executions;
}

async function runTool(
  name: ToolName,
  plan: ToolPlan,
  state: OrchestrationState,
  deps: NodeDeps
): Promise<ToolRun> {
  const { tools } = deps;
  const ctx = {
    payload: state.payload,
    preliminary: state.preliminary,
    searchKeywords: state.searchKeywords,
  };

  switch (name) {
    case 'search': {
      const input = resolveSearchInput(plan, ctx, deps.settings.search);
      return { executions: [await tools.execute('search', input)] };
    }
    case 'price': {
      const asset = resolvePriceAsset(ctx);
      if (!asset) {
        return { executions: [], warning: 'Skipped price: event has no asset' };
      }
      return { executions: [await tools.execute('price', { asset })] };
    }
    case 'macro': {
      const indicator = resolveMacroIndicators(plan, ctx)[0];
      if (!indicator) {
        return { executions: [], warning: 'Skipped macro: no indicator resolved' };
      }
      return { executions: [await tools.execute('macro', { indicator })] };
    }
    case 'onchain': {
      const assets = resolveOnchainAssets(plan, ctx);
      if (assets.length === 0) {
        return { executions: [], warning: 'Skipped onchain: no asset resolved' };
      }
      return {
        executions: await runCandidates(assets, (asset) => tools.execute('onchain', { asset })),
      };
    }
    case 'protocol': {
      const slugs = resolveProtocolSlugs(plan, ctx);
      if (slugs.length === 0) {
        return { executions: [], warning: 'Skipped protocol: no slug resolved' };
      }
      return {
        executions: await runCandidates(slugs, (slug) => tools.execute('protocol', { slug })),
      };
    }
  }
}

export async function executorNode(
  state: OrchestrationState,
  deps: NodeDeps
): Promise<OrchestrationState> {
  let next = enterNode(state, 'executor');
  const turn = next.toolCallCount + 1;

  if (!deps.quota.tryConsume()) {
    const warning = new QuotaExceededError(deps.quota.status().limit).message;
    deps.logger.warn(`${warning}; skipping tools on turn ${turn}`);
    return incrementToolCallCount(addWarning(next, warning));
  }

  const plan = next.lastPlan ?? emptyPlan('No plan');
  const offered = availableTools(deps);
  const runnable: ToolName[] = [];
  for (const name of new Set(next.nextTools)) {
    if (!isToolName(name)) {
      deps.logger.warn(`Unknown tool requested: ${name}`);
      next = addWarning(next, `Unknown tool: ${name}`);
      continue;
    }
    if (!offered.includes(name)) {
      deps.logger.warn(`Tool not initialized: ${name}`);
      next = addWarning(next, `Tool not initialized: ${name}`);
      continue;
    }
    runnable.push(name);
  }

  const snapshot = next;
  const runs = await Promise.all(runnable.map((name) => runTool(name, plan, snapshot, deps)));

  for (const run of runs) {
    if (run.warning) {
      deps.logger.warn(run.warning);
      next = addWarning(next, run.warning);
    }
    next = addToolExecutions(next, run.executions);
    for (const execution of run.executions) {
      if (execution.result.success) {
        next = mergeEvidence(next, execution.toolName, execution.result);
      } else {
        deps.logger.warn(
          `Tool ${execution.toolName} returned no evidence on turn ${turn}: ${
            execution.result.error ?? 'unknown error'
          }`
        );
      }
    }
  }

  return incrementToolCallCount(next);
}

// ============================================================================
// Synthesis
// ============================================================================

/**
 * Failures here propagate; the caller decides what to do without a signal.
 */
export async function synthesisNode(
  state: OrchestrationState,
  deps: NodeDeps
): Promise<OrchestrationState> {
  const entered = enterNode(state, 'synthesis');
  const raw = await deps.planner.synthesize(entered, {
    timeoutMs: deps.settings.synthesisTimeoutMs,
  });
  const signal = normalizeSignal(raw, entered.preliminary);
  return enterNode(completeState(entered, raw, signal), 'terminal');
}
