/**
 * Orchestration State Management
 *
 * Creates and updates the per-event state during deep analysis.
 */

import { randomUUID } from 'node:crypto';

import type { EventPayload, FinalSignal, PreliminaryAnalysis } from '../../types/index.js';
import type { ToolPlan } from '../planning/types.js';
import type { ToolExecution, ToolName, ToolResultEnvelope } from '../tools/types.js';
import type { GraphNode, MemoryEvidence, OrchestrationState } from './types.js';

/**
 * Create initial state for one event.
 */
export function createOrchestrationState(
  payload: EventPayload,
  preliminary: PreliminaryAnalysis,
  maxToolCalls: number
): OrchestrationState {
  const now = new Date().toISOString();
  return {
    eventId: randomUUID(),
    payload,
    preliminary,
    memoryEvidence: { entries: [], formatted: '', count: 0 },
    evidence: {},
    nextTools: [],
    lastPlan: null,
    searchKeywords: '',
    toolCallCount: 0,
    maxToolCalls: Math.max(0, Math.floor(maxToolCalls)),
    toolExecutions: [],
    trace: [],
    finalResponse: null,
    signal: null,
    warnings: [],
    startedAt: now,
    updatedAt: now,
  };
}

export function enterNode(state: OrchestrationState, node: GraphNode): OrchestrationState {
  return {
    ...state,
    trace: [...state.trace, node],
    updatedAt: new Date().toISOString(),
  };
}

export function setMemoryEvidence(
  state: OrchestrationState,
  memoryEvidence: MemoryEvidence
): OrchestrationState {
  return {
    ...state,
    memoryEvidence,
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Record the planner decision for this turn.
 */
export function setPlan(state: OrchestrationState, plan: ToolPlan): OrchestrationState {
  return {
    ...state,
    lastPlan: plan,
    nextTools: plan.tools,
    searchKeywords: plan.searchKeywords || state.searchKeywords,
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Merge a tool result. Only successful results land in evidence, and they
 * replace whatever that same tool produced earlier.
 */
export function mergeEvidence(
  state: OrchestrationState,
  toolName: ToolName,
  result: ToolResultEnvelope
): OrchestrationState {
  if (!result.success) {
    return state;
  }
  return {
    ...state,
    evidence: { ...state.evidence, [toolName]: result },
    updatedAt: new Date().toISOString(),
  };
}

export function addToolExecutions(
  state: OrchestrationState,
  executions: ToolExecution[]
): OrchestrationState {
  if (executions.length === 0) {
    return state;
  }
  return {
    ...state,
    toolExecutions: [...state.toolExecutions, ...executions],
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Count one executor turn.
 */
export function incrementToolCallCount(state: OrchestrationState): OrchestrationState {
  return {
    ...state,
    toolCallCount: state.toolCallCount + 1,
    updatedAt: new Date().toISOString(),
  };
}

export function completeState(
  state: OrchestrationState,
  finalResponse: string,
  signal: FinalSignal
): OrchestrationState {
  return {
    ...state,
    finalResponse,
    signal,
    updatedAt: new Date().toISOString(),
  };
}

export function addWarning(state: OrchestrationState, warning: string): OrchestrationState {
  return {
    ...state,
    warnings: [...state.warnings, warning],
    updatedAt: new Date().toISOString(),
  };
}
